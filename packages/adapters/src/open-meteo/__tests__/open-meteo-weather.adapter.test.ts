import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { FetchError } from '@feedgate/domain';
import type { RawWeatherObservation } from '@feedgate/domain';
import { OpenMeteoWeatherAdapter, weatherCacheKey } from '../open-meteo-weather.adapter.js';
import type { JsonFetchLike, JsonResponseLike } from '../open-meteo-weather.adapter.js';
import { TtlCache } from '../../cache/ttl-cache.js';
import { DeterministicClock } from '../../clock/clock.js';

function jsonResponse(body: unknown, status = 200): JsonResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Bad Gateway',
    json: async () => body,
  };
}

const CURRENT = {
  current_weather: {
    time: '2024-03-10T14:00',
    temperature: 11.4,
    windspeed: 14.8,
    weathercode: 61,
  },
};

describe('weatherCacheKey', () => {
  it('rounds coordinates to two decimals', () => {
    expect(weatherCacheKey(45.5152, -122.6784)).toBe('45.52,-122.68');
  });
});

describe('OpenMeteoWeatherAdapter', () => {
  let cache: TtlCache<RawWeatherObservation>;

  beforeEach(() => {
    cache = new TtlCache<RawWeatherObservation>({
      ttlMs: 300_000,
      maxEntries: 16,
      clock: new DeterministicClock(Date.parse('2024-03-10T14:05:00Z')),
    });
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('requests current weather and maps it to an observation', async () => {
    const fetchImpl = jest.fn<JsonFetchLike>().mockResolvedValue(jsonResponse(CURRENT));
    const adapter = new OpenMeteoWeatherAdapter({ baseUrl: 'http://weather.test/v1/', cache, fetchImpl });

    const obs = await adapter.currentWeather(45.5152, -122.6784, 'trimet');

    expect(obs).toEqual({
      latitude: 45.5152,
      longitude: -122.6784,
      temperatureCelsius: 11.4,
      precipitationMm: 0,
      windSpeedKmh: 14.8,
      weatherCode: 61,
      observationTime: '2024-03-10T14:00',
      agencyId: 'trimet',
    });
    const url = new URL(String(fetchImpl.mock.calls[0]?.[0]));
    expect(url.origin + url.pathname).toBe('http://weather.test/v1/forecast');
    expect(url.searchParams.get('latitude')).toBe('45.5152');
    expect(url.searchParams.get('current_weather')).toBe('true');
    expect(url.searchParams.get('windspeed_unit')).toBe('kmh');
  });

  it('serves nearby coordinates from the cache under the caller agency', async () => {
    const fetchImpl = jest.fn<JsonFetchLike>().mockResolvedValue(jsonResponse(CURRENT));
    const adapter = new OpenMeteoWeatherAdapter({ baseUrl: 'http://weather.test/v1', cache, fetchImpl });

    await adapter.currentWeather(45.5152, -122.6784, 'trimet');
    const second = await adapter.currentWeather(45.5189, -122.6801, 'sim');

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(second?.agencyId).toBe('sim');
    expect(second?.latitude).toBe(45.5152);
    expect(cache.stats().hits).toBe(1);
  });

  it('keeps a reported precipitation value', async () => {
    const body = { current_weather: { ...CURRENT.current_weather, precipitation: 2.5 } };
    const fetchImpl = jest.fn<JsonFetchLike>().mockResolvedValue(jsonResponse(body));
    const adapter = new OpenMeteoWeatherAdapter({ baseUrl: 'http://weather.test/v1', cache, fetchImpl });

    const obs = await adapter.currentWeather(42.3601, -71.0589, 'mbta');
    expect(obs?.precipitationMm).toBe(2.5);
  });

  it('returns null when the response has no current weather', async () => {
    const fetchImpl = jest.fn<JsonFetchLike>().mockResolvedValue(jsonResponse({ hourly: {} }));
    const adapter = new OpenMeteoWeatherAdapter({ baseUrl: 'http://weather.test/v1', cache, fetchImpl });

    expect(await adapter.currentWeather(45.5, -122.6, 'trimet')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('raises FetchError on a non-2xx response', async () => {
    const fetchImpl = jest.fn<JsonFetchLike>().mockResolvedValue(jsonResponse({}, 502));
    const adapter = new OpenMeteoWeatherAdapter({ baseUrl: 'http://weather.test/v1', cache, fetchImpl });

    await expect(adapter.currentWeather(45.5, -122.6, 'trimet')).rejects.toThrow(
      new FetchError('open-meteo responded 502 Bad Gateway', 502),
    );
  });

  it('wraps transport failures in FetchError', async () => {
    const fetchImpl = jest.fn<JsonFetchLike>().mockRejectedValue(new Error('socket hang up'));
    const adapter = new OpenMeteoWeatherAdapter({ baseUrl: 'http://weather.test/v1', cache, fetchImpl });

    const err = await adapter.currentWeather(45.5, -122.6, 'trimet').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ message: 'open-meteo request failed: socket hang up' });
  });
});
