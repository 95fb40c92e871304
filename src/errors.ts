/**
 * Error taxonomy
 *
 * NetworkError and ParseError never leave the calendar source, filing search
 * or term extractor; ConfigError is the only one allowed to abort startup.
 */

export class NetworkError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, url: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
    this.url = url;
    this.status = status;
  }
}

export class ParseError extends Error {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
    this.source = source;
  }
}

export class ConfigError extends Error {
  readonly setting: string;

  constructor(message: string, setting: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    this.setting = setting;
  }
}

/**
 * True for the failures a best-effort component converts to an empty result
 */
export function isRecoverable(error: unknown): error is NetworkError | ParseError {
  return error instanceof NetworkError || error instanceof ParseError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
