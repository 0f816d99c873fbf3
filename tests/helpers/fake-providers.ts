import type { TranslationProvider } from '../../src/services/subtitle-translation/providers/types';
import type { ProviderCapability, RetryPolicy } from '../../src/services/subtitle-translation/types';

export interface ProviderCall {
  texts: string[];
  sourceLanguage: string;
  targetLanguage: string;
}

type Behavior = (
  texts: string[],
  sourceLanguage: string,
  targetLanguage: string,
  callNumber: number
) => string[] | Promise<string[]>;

export const prefixTranslate: Behavior = (texts, _sourceLanguage, targetLanguage) =>
  texts.map((text) => `[${targetLanguage}] ${text}`);

/** In-process provider that records every call and answers through `behavior`. */
export class ScriptedProvider implements TranslationProvider {
  readonly calls: ProviderCall[] = [];

  constructor(
    readonly id: string,
    private readonly behavior: Behavior = prefixTranslate
  ) {}

  async translate(
    texts: readonly string[],
    sourceLanguage: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<string[]> {
    signal?.throwIfAborted();
    this.calls.push({ texts: [...texts], sourceLanguage, targetLanguage });
    return this.behavior([...texts], sourceLanguage, targetLanguage, this.calls.length);
  }

  get translatedTexts(): string[] {
    return this.calls.flatMap((call) => call.texts);
  }
}

export function capability(
  provider: string,
  supportedTargetLanguages: string[],
  opts?: { maxBatchSize?: number; maxConcurrent?: number; requestsPerMinute?: number }
): ProviderCapability {
  return {
    provider,
    supportedTargetLanguages,
    maxBatchSize: opts?.maxBatchSize ?? 50,
    rateLimit: {
      maxConcurrent: opts?.maxConcurrent ?? 4,
      requestsPerMinute: opts?.requestsPerMinute ?? 0
    }
  };
}

export const TEST_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000 };

/** Sleep stand-in that records requested delays and returns immediately. */
export function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    }
  };
}
