export class StreamsieveError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'StreamsieveError';
  }
}

export class ConfigError extends StreamsieveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class FetchError extends StreamsieveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export class DocumentFetchError extends StreamsieveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DOCUMENT_FETCH_ERROR', details);
    this.name = 'DocumentFetchError';
  }
}

export class PlaylistDownloadError extends StreamsieveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PLAYLIST_DOWNLOAD_ERROR', details);
    this.name = 'PlaylistDownloadError';
  }
}

export class PersistError extends StreamsieveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERSIST_ERROR', details);
    this.name = 'PersistError';
  }
}

export class RunAbortedError extends StreamsieveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RUN_ABORTED', details);
    this.name = 'RunAbortedError';
  }
}

/**
 * Error message including a nested cause, e.g. "fetch failed (connect ECONNREFUSED 127.0.0.1:80)".
 */
export function errorMessage(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  return err.cause instanceof Error ? `${err.message} (${err.cause.message})` : err.message;
}
