import { errorMessage } from '@feedgate/domain';
import type { ClockPort, FeedFetcherPort, FeedIngestionPort, IngestResult } from '@feedgate/domain';
import { systemClock } from '@feedgate/adapters';

export interface FeedPollerOptions {
  fetcher: FeedFetcherPort;
  pipeline: FeedIngestionPort;
  feedUrl: string;
  agencyId: string;
  intervalMs: number;
  clock?: ClockPort;
}

export interface PollerStats {
  agencyId: string;
  feedUrl: string;
  running: boolean;
  totalPolls: number;
  successfulPolls: number;
  failedPolls: number;
  /** Ticks dropped because the previous poll was still in flight. */
  skippedTicks: number;
  /** Decoded positions plus trip updates. */
  totalEntities: number;
  acceptedEntities: number;
  rejectedEntities: number;
  successRate: number;
  validationRate: number;
  lastPollAt: Date | null;
  lastError: string | null;
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

/** Fetches one feed on an interval and hands it to the pipeline; polls never overlap. */
export class FeedPoller {
  private readonly opts: FeedPollerOptions;
  private readonly clock: ClockPort;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<IngestResult | null> | null = null;

  private totalPolls = 0;
  private successfulPolls = 0;
  private failedPolls = 0;
  private skippedTicks = 0;
  private totalEntities = 0;
  private acceptedEntities = 0;
  private lastPollAt: Date | null = null;
  private lastError: string | null = null;

  constructor(opts: FeedPollerOptions) {
    this.opts = opts;
    this.clock = opts.clock ?? systemClock;
  }

  /**
   * One fetch + ingest cycle. Failures are counted and logged; the result is
   * null when the cycle failed.
   */
  async pollOnce(): Promise<IngestResult | null> {
    const { fetcher, pipeline, feedUrl, agencyId } = this.opts;
    this.totalPolls++;
    this.lastPollAt = this.clock.now();
    try {
      const bytes = await fetcher.fetchFeed(feedUrl);
      const result = await pipeline.ingestFeed(bytes, agencyId);
      const total = result.decoded.positions + result.decoded.tripUpdates;
      this.totalEntities += total;
      this.acceptedEntities += result.accepted.positions + result.accepted.tripUpdates;
      this.successfulPolls++;
      this.lastError = null;
      return result;
    } catch (err) {
      this.failedPolls++;
      this.lastError = errorMessage(err);
      console.error(`[feed-poller] ${agencyId} poll failed: ${this.lastError}`);
      return null;
    }
  }

  start(): void {
    if (this.timer) return;
    console.log(`[feed-poller] polling ${this.opts.feedUrl} every ${this.opts.intervalMs}ms`);
    this.tick();
    this.timer = setInterval(() => this.tick(), this.opts.intervalMs);
  }

  /** Stops the interval and waits for an in-flight poll to settle. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  stats(): PollerStats {
    return {
      agencyId: this.opts.agencyId,
      feedUrl: this.opts.feedUrl,
      running: this.timer !== null,
      totalPolls: this.totalPolls,
      successfulPolls: this.successfulPolls,
      failedPolls: this.failedPolls,
      skippedTicks: this.skippedTicks,
      totalEntities: this.totalEntities,
      acceptedEntities: this.acceptedEntities,
      rejectedEntities: this.totalEntities - this.acceptedEntities,
      successRate: ratio(this.successfulPolls, this.totalPolls),
      validationRate: ratio(this.acceptedEntities, this.totalEntities),
      lastPollAt: this.lastPollAt,
      lastError: this.lastError,
    };
  }

  private tick(): void {
    if (this.inFlight) {
      this.skippedTicks++;
      return;
    }
    this.inFlight = this.pollOnce().finally(() => {
      this.inFlight = null;
    });
  }
}
