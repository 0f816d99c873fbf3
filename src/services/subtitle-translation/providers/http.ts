import {
  describeError,
  ProviderPermanentError,
  ProviderRequestError,
  ProviderTransientError
} from '@/services/subtitle-translation/errors';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

const PERMANENT_STATUSES = new Set([401, 402, 403, 456]);

function toStatusError(
  providerId: string,
  response: Response,
  detail: string
): ProviderTransientError | ProviderPermanentError | ProviderRequestError {
  const message = `${providerId} request failed (${response.status}): ${detail || response.statusText}`;
  const status = response.status;

  if (status === 408 || status === 429 || status >= 500) {
    return new ProviderTransientError({
      providerId,
      message,
      status,
      retryAfterMs: parseRetryAfter(response.headers.get('retry-after'))
    });
  }
  if (PERMANENT_STATUSES.has(status)) {
    return new ProviderPermanentError({ providerId, message, status });
  }
  return new ProviderRequestError({ providerId, message, status });
}

async function readDetail(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 500);
  } catch (error) {
    return error instanceof Error ? `(unreadable body: ${error.message})` : '(unreadable body)';
  }
}

export async function postJson(opts: {
  providerId: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<unknown> {
  opts.signal?.throwIfAborted();

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, opts.timeoutMs);
  const forwardAbort = () => controller.abort();
  opts.signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    const response = await fetch(opts.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...opts.headers
      },
      body: JSON.stringify(opts.body),
      signal: controller.signal
    });

    if (!response.ok) {
      throw toStatusError(opts.providerId, response, await readDetail(response));
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ProviderTransientError({
        providerId: opts.providerId,
        message: `${opts.providerId} returned a response that is not JSON.`,
        cause: error
      });
    }
  } catch (error) {
    if (
      error instanceof ProviderTransientError ||
      error instanceof ProviderPermanentError ||
      error instanceof ProviderRequestError
    ) {
      throw error;
    }

    if (opts.signal?.aborted) {
      throw opts.signal.reason;
    }

    if (timedOut) {
      throw new ProviderTransientError({
        providerId: opts.providerId,
        message: `${opts.providerId} request timed out after ${opts.timeoutMs}ms.`,
        cause: error
      });
    }

    throw new ProviderTransientError({
      providerId: opts.providerId,
      message: `${opts.providerId} request failed: ${describeError(error)}`,
      cause: error
    });
  } finally {
    clearTimeout(timeout);
    opts.signal?.removeEventListener('abort', forwardAbort);
  }
}

export function invalidPayload(providerId: string, detail: string): ProviderTransientError {
  return new ProviderTransientError({
    providerId,
    message: `${providerId} returned an unexpected payload: ${detail}`
  });
}
