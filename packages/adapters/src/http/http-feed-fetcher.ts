import { fetch } from 'undici';
import { FetchError, errorMessage } from '@feedgate/domain';
import type { FeedFetcherPort } from '@feedgate/domain';

/** The slice of a fetch Response the fetcher reads. */
export interface FetchResponseLike {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (
  url: string,
  init: { method: 'GET'; headers: Record<string, string>; signal: AbortSignal },
) => Promise<FetchResponseLike>;

export interface HttpFeedFetcherOptions {
  timeoutMs?: number;
  /** Total attempts, including the first. */
  maxRetries?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

/**
 * GETs a binary GTFS-Realtime feed. Failed attempts back off 1 s, 2 s, 4 s, …
 * and the last failure is rethrown as a FetchError.
 */
export class HttpFeedFetcher implements FeedFetcherPort {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: HttpFeedFetcherOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.maxRetries = Math.max(1, opts.maxRetries ?? 3);
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async fetchFeed(url: string): Promise<Uint8Array> {
    let lastError: FetchError | null = null;
    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        return await this.fetchOnce(url);
      } catch (err) {
        lastError =
          err instanceof FetchError
            ? err
            : new FetchError(`feed fetch failed: ${errorMessage(err)}`, undefined, { cause: err });
        console.warn(
          `[feed-fetcher] attempt ${attempt + 1}/${this.maxRetries} failed: ${lastError.message}`,
        );
        if (attempt < this.maxRetries - 1) {
          await this.sleep(2 ** attempt * 1000);
        }
      }
    }
    throw lastError ?? new FetchError('feed fetch failed');
  }

  private async fetchOnce(url: string): Promise<Uint8Array> {
    const resp = await this.fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/octet-stream' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!resp.ok) {
      throw new FetchError(`feed responded ${resp.status} ${resp.statusText}`, resp.status);
    }
    return new Uint8Array(await resp.arrayBuffer());
  }
}
