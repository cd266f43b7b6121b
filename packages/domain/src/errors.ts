export type PipelineErrorCode = 'decode_error' | 'storage_error' | 'fetch_error' | 'config_error';

/** Base class for failures that abort a whole pipeline call. */
export class PipelineError extends Error {
  constructor(
    message: string,
    readonly code: PipelineErrorCode,
    readonly status: number,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The feed bytes could not be parsed; fatal for the current poll cycle. */
export class DecodeError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'decode_error', 422, false, options);
  }
}

/**
 * A layer transition failed and was rolled back.
 * Callers retry the whole batch unchanged, never a sub-slice.
 */
export class StorageError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'storage_error', 503, true, options);
  }
}

/** An upstream HTTP source (feed or weather) could not be reached. */
export class FetchError extends PipelineError {
  constructor(
    message: string,
    readonly upstreamStatus?: number,
    options?: { cause?: unknown },
  ) {
    super(message, 'fetch_error', 502, true, options);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'config_error', 500, false, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
