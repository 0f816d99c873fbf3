export class MalformedTrackError extends Error {
  readonly blockNumber: number | undefined;

  constructor(message: string, opts?: { blockNumber?: number; cause?: unknown }) {
    super(message);
    this.name = 'MalformedTrackError';
    this.blockNumber = opts?.blockNumber;
    if (opts?.cause !== undefined) {
      this.cause = opts.cause;
    }
  }
}

export class UnsupportedLanguagePairError extends Error {
  readonly providerId: string;
  readonly sourceLanguage: string;
  readonly targetLanguage: string;

  constructor(opts: { providerId: string; sourceLanguage: string; targetLanguage: string }) {
    super(
      `Provider "${opts.providerId}" does not support ${opts.sourceLanguage} -> ${opts.targetLanguage}.`
    );
    this.name = 'UnsupportedLanguagePairError';
    this.providerId = opts.providerId;
    this.sourceLanguage = opts.sourceLanguage;
    this.targetLanguage = opts.targetLanguage;
  }
}

interface ProviderErrorOptions {
  providerId: string;
  message: string;
  status?: number;
  cause?: unknown;
}

abstract class ProviderError extends Error {
  readonly providerId: string;
  readonly status: number | undefined;

  protected constructor(opts: ProviderErrorOptions) {
    super(opts.message);
    this.providerId = opts.providerId;
    this.status = opts.status;
    if (opts.cause !== undefined) {
      this.cause = opts.cause;
    }
  }
}

/** Timeout, rate limit, 5xx or an unreadable payload. Retried with backoff. */
export class ProviderTransientError extends ProviderError {
  readonly retryAfterMs: number | undefined;

  constructor(opts: ProviderErrorOptions & { retryAfterMs?: number }) {
    super(opts);
    this.name = 'ProviderTransientError';
    this.retryAfterMs = opts.retryAfterMs;
  }
}

/** Authentication failure or exhausted quota. The provider is skipped for the rest of the run. */
export class ProviderPermanentError extends ProviderError {
  constructor(opts: ProviderErrorOptions) {
    super(opts);
    this.name = 'ProviderPermanentError';
  }
}

/** The provider rejected this particular payload. Not retried; the next provider is tried. */
export class ProviderRequestError extends ProviderError {
  constructor(opts: ProviderErrorOptions) {
    super(opts);
    this.name = 'ProviderRequestError';
  }
}

export class ReconstructionInvariantError extends Error {
  readonly cueIndex: number | undefined;

  constructor(message: string, opts?: { cueIndex?: number }) {
    super(message);
    this.name = 'ReconstructionInvariantError';
    this.cueIndex = opts?.cueIndex;
  }
}

export function isProviderTransientError(value: unknown): value is ProviderTransientError {
  return value instanceof ProviderTransientError;
}

export function isProviderPermanentError(value: unknown): value is ProviderPermanentError {
  return value instanceof ProviderPermanentError;
}

export function isAbortError(value: unknown): boolean {
  return value instanceof Error && (value.name === 'AbortError' || value.name === 'TimeoutError');
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
