import { SEVERE_WEATHER_CONDITIONS, errorMessage, weatherConditionFromWmo } from '@feedgate/domain';
import type {
  FeedIngestionPort,
  WeatherCondition,
  WeatherIngestResult,
  WeatherProviderPort,
} from '@feedgate/domain';
import type { TtlCacheStats } from '@feedgate/adapters';
import type { AgencyConfig } from '../../config/pipeline-config.js';

export interface WeatherEnrichmentOptions {
  provider: WeatherProviderPort;
  pipeline: FeedIngestionPort;
  agencies: readonly AgencyConfig[];
  /** Stats of the cache in front of the provider, if any. */
  cacheStats?: () => TtlCacheStats;
}

export type AgencyWeatherOutcome =
  | { agencyId: string; status: 'ingested'; condition: WeatherCondition; result: WeatherIngestResult }
  | { agencyId: string; status: 'unavailable' }
  | { agencyId: string; status: 'failed'; error: string };

/** Pulls current weather for every agency weather centre into the pipeline. */
export class WeatherEnrichment {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<AgencyWeatherOutcome[]> | null = null;

  constructor(private readonly opts: WeatherEnrichmentOptions) {}

  async enrichAll(): Promise<AgencyWeatherOutcome[]> {
    const outcomes: AgencyWeatherOutcome[] = [];
    for (const agency of this.opts.agencies) {
      if (!agency.weatherCenter) continue;
      outcomes.push(await this.enrichAgency(agency.agencyId, agency.weatherCenter));
    }
    return outcomes;
  }

  cacheStats(): TtlCacheStats | null {
    return this.opts.cacheStats ? this.opts.cacheStats() : null;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.tick();
    this.timer = setInterval(() => this.tick(), intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  private tick(): void {
    if (this.inFlight) return;
    this.inFlight = this.enrichAll().finally(() => {
      this.inFlight = null;
    });
  }

  private async enrichAgency(
    agencyId: string,
    center: { latitude: number; longitude: number },
  ): Promise<AgencyWeatherOutcome> {
    try {
      const observation = await this.opts.provider.currentWeather(center.latitude, center.longitude, agencyId);
      if (!observation) return { agencyId, status: 'unavailable' };

      const condition =
        observation.weatherCode === undefined ? 'UNKNOWN' : weatherConditionFromWmo(observation.weatherCode);
      if (SEVERE_WEATHER_CONDITIONS.has(condition)) {
        console.warn(`[weather] severe conditions for ${agencyId}: ${condition}`);
      }
      const result = await this.opts.pipeline.ingestWeather(observation);
      return { agencyId, status: 'ingested', condition, result };
    } catch (err) {
      const error = errorMessage(err);
      console.error(`[weather] enrichment failed for ${agencyId}: ${error}`);
      return { agencyId, status: 'failed', error };
    }
  }
}
