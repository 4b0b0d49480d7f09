import { z } from 'zod';
import { env } from '../env.js';

export type TemperatureUnits = 'celsius' | 'fahrenheit';

const WeatherPayloadSchema = z.object({
  location: z.string().optional(),
  temperature: z.number(),
  units: z.string().optional(),
  conditions: z.string().optional(),
  humidity: z.number().optional(),
  wind_kph: z.number().optional(),
});

export interface WeatherReport {
  location: string;
  temperature: number;
  units: string;
  conditions?: string;
  humidity?: number;
  windKph?: number;
}

/**
 * Looks up current conditions from the configured weather endpoint.
 * Returns null when no endpoint is configured.
 */
export async function fetchWeather(
  location: string,
  units: TemperatureUnits = 'celsius',
  signal?: AbortSignal,
): Promise<WeatherReport | null> {
  if (!env.WEATHER_API_URL) return null;

  const q = location.trim();
  if (!q) return null;

  const endpoint = new URL(env.WEATHER_API_URL);
  endpoint.searchParams.set('location', q);
  endpoint.searchParams.set('units', units);

  const headers: Record<string, string> = { Accept: 'application/json' };
  if (env.WEATHER_API_KEY) {
    headers.Authorization = `Bearer ${env.WEATHER_API_KEY}`;
  }

  const response = await fetch(endpoint.toString(), { method: 'GET', headers, signal });

  if (!response.ok) {
    throw new Error(`Weather API error (${response.status})`);
  }

  const payload = WeatherPayloadSchema.safeParse(await response.json());
  if (!payload.success) {
    throw new Error('Weather API returned an unexpected payload');
  }

  return {
    location: payload.data.location || q,
    temperature: payload.data.temperature,
    units: payload.data.units || units,
    conditions: payload.data.conditions,
    humidity: payload.data.humidity,
    windKph: payload.data.wind_kph,
  };
}
