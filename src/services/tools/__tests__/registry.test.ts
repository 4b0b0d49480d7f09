import { describe, it, expect, vi } from 'vitest';
import { ToolRegistry } from '../registry.js';
import type { ToolDefinition } from '../types.js';
import {
  DuplicateToolError,
  InvalidArgumentsError,
  RegistrySealedError,
  ToolExecutionError,
  UnknownToolError,
} from '../../../utils/errors.js';

function weatherLikeTool(execute: ToolDefinition['execute'] = async () => ({ success: true, content: 'ok' })): ToolDefinition {
  return {
    name: 'get_weather',
    description: 'Weather lookup',
    parameters: [
      { name: 'location', type: 'string', description: 'City', required: true },
      {
        name: 'units',
        type: 'string',
        description: 'Units',
        required: false,
        enum: ['celsius', 'fahrenheit'],
        default: 'celsius',
      },
      { name: 'days', type: 'integer', description: 'Forecast days', required: false },
    ],
    execute,
  };
}

describe('Tool Registry', () => {
  it('should register and retrieve tools', () => {
    const registry = new ToolRegistry();

    const testTool: ToolDefinition = {
      name: 'test_tool',
      description: 'A test tool',
      parameters: [
        {
          name: 'input',
          type: 'string',
          description: 'Test input',
          required: true,
        },
      ],
      execute: async () => ({
        success: true,
        content: 'test result',
      }),
    };

    registry.register(testTool);
    expect(registry.has('test_tool')).toBe(true);
    expect(registry.resolve('test_tool')).toBe(testTool);
  });

  it('should list all registered tools', () => {
    const registry = new ToolRegistry();

    registry.register({ name: 'tool1', description: 'Tool 1', parameters: [], execute: async () => ({ success: true, content: '' }) });
    registry.register({ name: 'tool2', description: 'Tool 2', parameters: [], execute: async () => ({ success: true, content: '' }) });

    expect(registry.getAll().map(t => t.name)).toEqual(['tool1', 'tool2']);
  });

  it('should reject a second tool with the same name', () => {
    const registry = new ToolRegistry();
    registry.register(weatherLikeTool());

    expect(() => registry.register(weatherLikeTool())).toThrow(DuplicateToolError);
    expect(registry.getAll().length).toBe(1);
  });

  it('should refuse registrations once sealed', () => {
    const registry = new ToolRegistry();
    registry.seal();

    expect(registry.isSealed()).toBe(true);
    expect(() => registry.register(weatherLikeTool())).toThrow(RegistrySealedError);
  });

  it('should throw UnknownToolError when resolving a missing tool', () => {
    const registry = new ToolRegistry();
    expect(() => registry.resolve('get_stock_price')).toThrow(UnknownToolError);
    expect(registry.get('get_stock_price')).toBeUndefined();
  });

  it('should convert tools to OpenAI function format', () => {
    const registry = new ToolRegistry();
    registry.register(weatherLikeTool());

    const [fn] = registry.toOpenAIFunctions();
    expect(fn.name).toBe('get_weather');
    expect(fn.parameters.type).toBe('object');
    expect(fn.parameters.required).toEqual(['location']);
    expect(fn.parameters.properties.units).toEqual({
      type: 'string',
      description: 'Units',
      enum: ['celsius', 'fahrenheit'],
      default: 'celsius',
    });
    expect(fn.parameters.properties.days.type).toBe('integer');
  });

  describe('argument validation', () => {
    it('fills in defaults for omitted optional parameters', () => {
      const registry = new ToolRegistry();
      registry.register(weatherLikeTool());

      expect(registry.validate('get_weather', { location: 'San Francisco' })).toEqual({
        location: 'San Francisco',
        units: 'celsius',
      });
    });

    it('lists missing, extra and mistyped fields together', () => {
      const registry = new ToolRegistry();
      registry.register(weatherLikeTool());

      let caught: unknown;
      try {
        registry.validate('get_weather', { units: 'kelvin', days: 1.5, city: 'Paris' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidArgumentsError);
      const problems = (caught instanceof InvalidArgumentsError) ? caught.problems : undefined;
      expect(problems).toEqual({
        missing: ['location'],
        extra: ['city'],
        mistyped: ['days', 'units'],
      });
    });

    it('gives the same answer for repeated identical calls', () => {
      const registry = new ToolRegistry();
      registry.register(weatherLikeTool());

      const first = registry.validate('get_weather', { location: 'Oslo', units: 'fahrenheit' });
      const second = registry.validate('get_weather', { location: 'Oslo', units: 'fahrenheit' });
      expect(second).toEqual(first);

      const failures = [1, 2].map(() => {
        try {
          registry.validate('get_weather', { location: 7 });
          return null;
        } catch (error) {
          return error instanceof InvalidArgumentsError ? error.message : 'other';
        }
      });
      expect(failures[0]).toBe('Invalid arguments for "get_weather": wrong type for location');
      expect(failures[1]).toBe(failures[0]);
    });
  });

  describe('invoke', () => {
    it('passes validated arguments to the capability', async () => {
      const execute = vi.fn(async () => ({ success: true, content: '{"temperature":18}' }));
      const registry = new ToolRegistry();
      registry.register(weatherLikeTool(execute));

      const result = await registry.invoke('get_weather', { location: 'San Francisco' });

      expect(result).toEqual({ success: true, content: '{"temperature":18}' });
      expect(execute).toHaveBeenCalledWith({ location: 'San Francisco', units: 'celsius' }, {});
    });

    it('does not run the capability when validation fails', async () => {
      const execute = vi.fn(async () => ({ success: true, content: '' }));
      const registry = new ToolRegistry();
      registry.register(weatherLikeTool(execute));

      await expect(registry.invoke('get_weather', {})).rejects.toBeInstanceOf(InvalidArgumentsError);
      expect(execute).not.toHaveBeenCalled();
    });

    it('wraps a thrown capability error in ToolExecutionError', async () => {
      const registry = new ToolRegistry();
      registry.register(weatherLikeTool(async () => {
        throw new Error('upstream 502');
      }));

      await expect(registry.invoke('get_weather', { location: 'Lima' })).rejects.toThrow(
        'Tool "get_weather" failed: upstream 502',
      );
      await expect(registry.invoke('get_weather', { location: 'Lima' })).rejects.toBeInstanceOf(ToolExecutionError);
    });

    it('rejects unknown tools', async () => {
      const registry = new ToolRegistry();
      await expect(registry.invoke('get_stock_price', { symbol: 'ACME' })).rejects.toBeInstanceOf(UnknownToolError);
    });
  });
});
