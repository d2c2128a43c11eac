/**
 * Error thrown when an upstream answers with a non-success status,
 * or with an error payload embedded in an otherwise successful response.
 */
export class ProviderError extends Error {
  constructor(
    public readonly provider: string,
    public readonly status: number,
    public readonly headers: Record<string, string>,
    message: string,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * Single provider-level failure kind surfaced to callers of ask()/chat().
 * The transport or upstream error that caused it is kept in `cause`.
 */
export class FailedToGenerateResponseError extends Error {
  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FailedToGenerateResponseError';
  }
}

/**
 * Invalid options handed to the pipeline or a provider (bad pattern,
 * unknown encoding, unknown optimizer...). Raised before any I/O happens.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
