import type { AggregationResult, PromotionResult } from '../../entities/layer-records.js';

export interface LayerMaintenancePort {
  /** Raw → validated. Idempotent; serialized with aggregation. */
  promote(): Promise<PromotionResult>;
  /** Validated positions → per-bucket vehicle metrics (replace semantics). */
  aggregateWindow(bucketSeconds?: number): Promise<AggregationResult>;
  /** Validated trip updates → per-day route performance (replace semantics). */
  aggregateRoutePerformance(): Promise<AggregationResult>;
}
