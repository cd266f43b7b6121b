import type { RawWeatherObservation } from '../../entities/weather-observation.js';
import type { Rejection, RejectionCounts } from '../../entities/quality.js';
import type { PromotionResult } from '../../entities/layer-records.js';
import type { RawAppendResult } from '../outbound/layered-store.port.js';

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface IngestResult {
  agencyId: string;
  feedTimestamp: Date;
  decoded: {
    entities: number;
    positions: number;
    tripUpdates: number;
    skipped: number;
  };
  accepted: {
    positions: number;
    tripUpdates: number;
  };
  rejected: RejectionCounts;
  rawInserted: RawAppendResult;
  promotion: PromotionResult;
}

export interface WeatherIngestResult {
  accepted: boolean;
  rejection?: Rejection;
  rawInserted: RawAppendResult;
  promotion: PromotionResult;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface FeedIngestionPort {
  /** Decode, gate, append raw and promote. A DecodeError aborts before anything is stored. */
  ingestFeed(bytes: Uint8Array, agencyId: string): Promise<IngestResult>;
  ingestWeather(observation: RawWeatherObservation): Promise<WeatherIngestResult>;
}
