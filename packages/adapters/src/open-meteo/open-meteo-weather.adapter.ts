import { fetch } from 'undici';
import { z } from 'zod';
import { FetchError, errorMessage } from '@feedgate/domain';
import type { RawWeatherObservation, WeatherProviderPort } from '@feedgate/domain';
import type { TtlCache } from '../cache/ttl-cache.js';

const currentWeatherResponseSchema = z.object({
  current_weather: z
    .object({
      time: z.string(),
      temperature: z.number(),
      windspeed: z.number(),
      weathercode: z.number().int(),
      precipitation: z.number().optional(),
    })
    .optional(),
});

export interface JsonResponseLike {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  json(): Promise<unknown>;
}

export type JsonFetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal },
) => Promise<JsonResponseLike>;

export interface OpenMeteoOptions {
  baseUrl: string;
  cache: TtlCache<RawWeatherObservation>;
  timeoutMs?: number;
  fetchImpl?: JsonFetchLike;
}

/** Cache key: coordinates rounded to 2 decimals (about 1 km). */
export function weatherCacheKey(latitude: number, longitude: number): string {
  return `${latitude.toFixed(2)},${longitude.toFixed(2)}`;
}

/**
 * Current conditions from the Open-Meteo forecast API.
 * Open-Meteo reports times in GMT without a zone suffix.
 */
export class OpenMeteoWeatherAdapter implements WeatherProviderPort {
  private readonly fetchImpl: JsonFetchLike;
  private readonly timeoutMs: number;

  constructor(private readonly opts: OpenMeteoOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async currentWeather(
    latitude: number,
    longitude: number,
    agencyId: string,
  ): Promise<RawWeatherObservation | null> {
    const key = weatherCacheKey(latitude, longitude);
    const cached = this.opts.cache.get(key);
    if (cached) return { ...cached, agencyId };

    const params = new URLSearchParams({
      latitude: String(latitude),
      longitude: String(longitude),
      current_weather: 'true',
      temperature_unit: 'celsius',
      windspeed_unit: 'kmh',
      precipitation_unit: 'mm',
    });
    const url = `${this.opts.baseUrl.replace(/\/$/, '')}/forecast?${params.toString()}`;

    let body: unknown;
    try {
      const resp = await this.fetchImpl(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!resp.ok) {
        throw new FetchError(`open-meteo responded ${resp.status} ${resp.statusText}`, resp.status);
      }
      body = await resp.json();
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(`open-meteo request failed: ${errorMessage(err)}`, undefined, { cause: err });
    }

    const parsed = currentWeatherResponseSchema.safeParse(body);
    if (!parsed.success || !parsed.data.current_weather) {
      console.warn(`[open-meteo] no current weather in response for ${key}`);
      return null;
    }

    const current = parsed.data.current_weather;
    const observation: RawWeatherObservation = {
      latitude,
      longitude,
      temperatureCelsius: current.temperature,
      precipitationMm: current.precipitation ?? 0,
      windSpeedKmh: current.windspeed,
      weatherCode: current.weathercode,
      observationTime: current.time,
      agencyId,
    };
    this.opts.cache.set(key, observation);
    return observation;
  }
}
