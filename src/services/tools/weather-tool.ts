// Weather Tool
// Wraps the weather lookup service as a tool

import type { ToolDefinition, ToolResult } from './types.js';
import { fetchWeather, type TemperatureUnits } from '../weather.js';

export const weatherTool: ToolDefinition = {
  name: 'get_weather',
  description: 'Get the current weather for a city or place. Use this whenever the user asks about current temperature or conditions somewhere.',
  parameters: [
    {
      name: 'location',
      type: 'string',
      description: 'City or place name, e.g. "San Francisco"',
      required: true,
    },
    {
      name: 'units',
      type: 'string',
      description: 'Temperature units',
      required: false,
      enum: ['celsius', 'fahrenheit'],
      default: 'celsius',
    },
  ],
  execute: async (args, context): Promise<ToolResult> => {
    const location = String(args.location ?? '').trim();
    if (!location) {
      return {
        success: false,
        content: JSON.stringify({ error: 'Location is required' }),
      };
    }

    const units: TemperatureUnits = args.units === 'fahrenheit' ? 'fahrenheit' : 'celsius';
    const report = await fetchWeather(location, units, context.signal);

    if (!report) {
      return {
        success: false,
        content: JSON.stringify({ error: 'Weather lookup is not configured' }),
      };
    }

    return {
      success: true,
      content: JSON.stringify(report),
    };
  },
};
