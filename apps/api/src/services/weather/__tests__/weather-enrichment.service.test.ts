import { jest, describe, it, expect, afterEach } from '@jest/globals';
import { FetchError, emptyRejectionCounts } from '@feedgate/domain';
import type {
  FeedIngestionPort,
  IngestResult,
  KindPromotionResult,
  RawWeatherObservation,
  WeatherIngestResult,
  WeatherProviderPort,
} from '@feedgate/domain';
import type { AgencyConfig } from '../../../config/pipeline-config.js';
import { WeatherEnrichment } from '../weather-enrichment.service.js';

const AGENCIES: AgencyConfig[] = [
  { agencyId: 'trimet', name: 'TriMet', weatherCenter: { latitude: 45.52, longitude: -122.68 } },
  { agencyId: 'feed-only', name: 'Feed only' },
  { agencyId: 'mbta', name: 'MBTA', weatherCenter: { latitude: 42.36, longitude: -71.06 } },
];

function kind(): KindPromotionResult {
  return {
    scanned: 1,
    promoted: 1,
    duplicates: 0,
    outsideWindow: 0,
    alerted: 0,
    rejected: emptyRejectionCounts(),
  };
}

const INGESTED: WeatherIngestResult = {
  accepted: true,
  rawInserted: { positions: 0, tripUpdates: 0, weather: 1, alerts: 0 },
  promotion: { vehicle_positions: kind(), trip_updates: kind(), weather_observations: kind() },
};

function observation(agencyId: string, weatherCode?: number): RawWeatherObservation {
  return {
    latitude: 45.52,
    longitude: -122.68,
    temperatureCelsius: 4,
    precipitationMm: 6,
    windSpeedKmh: 30,
    weatherCode,
    observationTime: '2024-03-10T14:00',
    agencyId,
  };
}

function pipeline(): FeedIngestionPort & { ingestWeather: jest.Mock<FeedIngestionPort['ingestWeather']> } {
  return {
    ingestFeed: async (): Promise<IngestResult> => {
      throw new Error('not used by weather enrichment');
    },
    ingestWeather: jest.fn<FeedIngestionPort['ingestWeather']>().mockResolvedValue(INGESTED),
  };
}

afterEach(() => {
  jest.restoreAllMocks();
});

describe('WeatherEnrichment.enrichAll', () => {
  it('ingests weather for every agency with a weather centre', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const currentWeather = jest
      .fn<WeatherProviderPort['currentWeather']>()
      .mockImplementation(async (_lat, _lon, agencyId) => (agencyId === 'trimet' ? observation(agencyId, 95) : null));
    const target = pipeline();
    const enrichment = new WeatherEnrichment({ provider: { currentWeather }, pipeline: target, agencies: AGENCIES });

    const outcomes = await enrichment.enrichAll();

    expect(currentWeather.mock.calls).toEqual([
      [45.52, -122.68, 'trimet'],
      [42.36, -71.06, 'mbta'],
    ]);
    expect(outcomes).toEqual([
      { agencyId: 'trimet', status: 'ingested', condition: 'THUNDERSTORM', result: INGESTED },
      { agencyId: 'mbta', status: 'unavailable' },
    ]);
    expect(target.ingestWeather).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[weather] severe conditions for trimet: THUNDERSTORM');
  });

  it('reports UNKNOWN when the provider sends no weather code', async () => {
    const currentWeather = jest
      .fn<WeatherProviderPort['currentWeather']>()
      .mockImplementation(async (_lat, _lon, agencyId) => observation(agencyId));
    const enrichment = new WeatherEnrichment({
      provider: { currentWeather },
      pipeline: pipeline(),
      agencies: AGENCIES.slice(0, 1),
    });

    const [outcome] = await enrichment.enrichAll();

    expect(outcome?.status === 'ingested' && outcome.condition).toBe('UNKNOWN');
  });

  it('keeps going after one agency fails', async () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const currentWeather = jest
      .fn<WeatherProviderPort['currentWeather']>()
      .mockRejectedValueOnce(new FetchError('open-meteo responded 502 Bad Gateway', 502))
      .mockResolvedValueOnce(observation('mbta', 0));
    const enrichment = new WeatherEnrichment({ provider: { currentWeather }, pipeline: pipeline(), agencies: AGENCIES });

    const outcomes = await enrichment.enrichAll();

    expect(outcomes.map((o) => o.status)).toEqual(['failed', 'ingested']);
    expect(outcomes[0]).toEqual({
      agencyId: 'trimet',
      status: 'failed',
      error: 'open-meteo responded 502 Bad Gateway',
    });
    expect(error).toHaveBeenCalledWith('[weather] enrichment failed for trimet: open-meteo responded 502 Bad Gateway');
  });
});

describe('WeatherEnrichment.cacheStats', () => {
  const provider: WeatherProviderPort = { currentWeather: async () => null };

  it('is null without a cache', () => {
    expect(new WeatherEnrichment({ provider, pipeline: pipeline(), agencies: [] }).cacheStats()).toBeNull();
  });

  it('reports the cache it was given', () => {
    const stats = { totalEntries: 2, validEntries: 1, hits: 3, misses: 1, hitRate: 0.75, ttlMs: 1000, maxEntries: 8 };
    const enrichment = new WeatherEnrichment({ provider, pipeline: pipeline(), agencies: [], cacheStats: () => stats });
    expect(enrichment.cacheStats()).toEqual(stats);
  });
});
