export interface FeedFetcherPort {
  /** Returns the raw binary feed; may fail transiently. */
  fetchFeed(url: string): Promise<Uint8Array>;
}
