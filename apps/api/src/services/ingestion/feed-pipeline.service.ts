import { emptyRejectionCounts, errorMessage } from '@feedgate/domain';
import type {
  ClockPort,
  EventSinkPort,
  FeedIngestionPort,
  IngestResult,
  PromotionResult,
  QualityAlert,
  RawAppendResult,
  RawBatch,
  RawWeatherObservation,
  TripUpdate,
  VehiclePosition,
  WeatherIngestResult,
} from '@feedgate/domain';
import { systemClock } from '@feedgate/adapters';
import { decodeFeed, totalSkipped } from '../decoder/feed-decoder.js';
import { toQualityAlert } from '../quality/quality-gate.js';
import type { QualityGate } from '../quality/quality-gate.js';

/** The layer transitions the pipeline drives. */
export interface LayerWriter {
  appendRaw(batch: RawBatch): Promise<RawAppendResult>;
  promote(): Promise<PromotionResult>;
}

export interface FeedPipelineOptions {
  gate: QualityGate;
  layers: LayerWriter;
  sink?: EventSinkPort;
  clock?: ClockPort;
}

/**
 * decode → gate → raw append → publish → promote.
 *
 * A DecodeError aborts before anything is appended. Sink failures are logged
 * and do not fail the cycle.
 */
export class FeedPipeline implements FeedIngestionPort {
  private readonly gate: QualityGate;
  private readonly layers: LayerWriter;
  private readonly sink: EventSinkPort | undefined;
  private readonly clock: ClockPort;

  constructor(opts: FeedPipelineOptions) {
    this.gate = opts.gate;
    this.layers = opts.layers;
    this.sink = opts.sink;
    this.clock = opts.clock ?? systemClock;
  }

  async ingestFeed(bytes: Uint8Array, agencyId: string): Promise<IngestResult> {
    const decoded = decodeFeed(bytes, agencyId);
    const now = this.clock.now();
    const rejected = emptyRejectionCounts();
    const alerts: QualityAlert[] = [];
    const positions: VehiclePosition[] = [];
    const tripUpdates: TripUpdate[] = [];

    for (const raw of decoded.positions) {
      const result = this.gate.validatePosition(raw, now);
      if (result.ok) {
        positions.push(result.record);
      } else {
        rejected[result.rejection.reason]++;
        alerts.push(
          toQualityAlert(result.rejection, { kind: 'vehicle_position', record: raw }, now, this.gate.config),
        );
      }
    }
    for (const raw of decoded.tripUpdates) {
      const result = this.gate.validateTripUpdate(raw, now);
      if (result.ok) {
        tripUpdates.push(result.record);
      } else {
        rejected[result.rejection.reason]++;
        alerts.push(
          toQualityAlert(result.rejection, { kind: 'trip_update', record: raw }, now, this.gate.config),
        );
      }
    }

    const rawInserted = await this.layers.appendRaw({
      positions: decoded.positions,
      tripUpdates: decoded.tripUpdates,
      alerts,
    });

    await this.publishAll([
      ...positions.map((p) => () => this.sinkCall((s) => s.publishVehiclePosition(p))),
      ...tripUpdates.map((u) => () => this.sinkCall((s) => s.publishTripUpdate(u))),
      ...alerts.map((a) => () => this.sinkCall((s) => s.publishQualityAlert(a))),
    ]);

    const promotion = await this.layers.promote();

    console.log(
      `[feed-pipeline] ${agencyId}: ${decoded.entityCount} entities, ` +
        `${positions.length}/${decoded.positions.length} positions and ` +
        `${tripUpdates.length}/${decoded.tripUpdates.length} trip updates accepted, ${alerts.length} alert(s)`,
    );

    return {
      agencyId,
      feedTimestamp: decoded.feedTimestamp,
      decoded: {
        entities: decoded.entityCount,
        positions: decoded.positions.length,
        tripUpdates: decoded.tripUpdates.length,
        skipped: totalSkipped(decoded.skipped),
      },
      accepted: { positions: positions.length, tripUpdates: tripUpdates.length },
      rejected,
      rawInserted,
      promotion,
    };
  }

  async ingestWeather(observation: RawWeatherObservation): Promise<WeatherIngestResult> {
    const now = this.clock.now();
    const result = this.gate.validateWeather(observation, now);
    const alerts = result.ok
      ? []
      : [
          toQualityAlert(
            result.rejection,
            { kind: 'weather_observation', record: observation },
            now,
            this.gate.config,
          ),
        ];

    const rawInserted = await this.layers.appendRaw({ weather: [observation], alerts });

    if (result.ok) {
      const record = result.record;
      await this.publishAll([() => this.sinkCall((s) => s.publishWeather(record))]);
    } else {
      await this.publishAll(alerts.map((a) => () => this.sinkCall((s) => s.publishQualityAlert(a))));
    }

    const promotion = await this.layers.promote();
    return result.ok
      ? { accepted: true, rawInserted, promotion }
      : { accepted: false, rejection: result.rejection, rawInserted, promotion };
  }

  // ─── Sink ───────────────────────────────────────────────────────────────────

  private sinkCall(fn: (sink: EventSinkPort) => Promise<void>): Promise<void> {
    return this.sink ? fn(this.sink) : Promise.resolve();
  }

  private async publishAll(calls: Array<() => Promise<void>>): Promise<void> {
    if (!this.sink) return;
    await Promise.all(
      calls.map((call) =>
        call().catch((err: unknown) => {
          console.warn('[feed-pipeline] publish failed', errorMessage(err));
        }),
      ),
    );
  }
}
