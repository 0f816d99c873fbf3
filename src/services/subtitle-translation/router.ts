import {
  describeError,
  isAbortError,
  isProviderPermanentError,
  isProviderTransientError,
  ProviderTransientError,
  UnsupportedLanguagePairError
} from '@/services/subtitle-translation/errors';
import {
  hasExpectedScript,
  hasLetters,
  normalizeLanguageTag
} from '@/services/subtitle-translation/language-classifier';
import {
  abortableSleep,
  supportsTargetLanguage,
  type ProviderPool,
  type Sleep
} from '@/services/subtitle-translation/provider-pool';
import type {
  RetryPolicy,
  TranslatedText,
  TranslationUnit,
  UnitResolution,
  UnresolvedUnit
} from '@/services/subtitle-translation/types';

interface FailedUnit {
  unit: TranslationUnit;
  reason: string;
}

interface ChunkOutcome {
  resolved: TranslatedText[];
  failed: FailedUnit[];
}

export interface TranslationRouterOptions {
  pool: ProviderPool;
  retry: RetryPolicy;
  sleep?: Sleep;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step));
  }
  return chunks;
}

export function backoffDelay(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(exponential, retryAfterMs ?? 0));
}

function pairKey(unit: TranslationUnit): string {
  return `${normalizeLanguageTag(unit.sourceLanguage)}:${normalizeLanguageTag(unit.targetLanguage)}`;
}

function mergeOutcomes(outcomes: ChunkOutcome[]): ChunkOutcome {
  return {
    resolved: outcomes.flatMap((outcome) => outcome.resolved),
    failed: outcomes.flatMap((outcome) => outcome.failed)
  };
}

/**
 * Sends translation units to providers in priority order. A batch that fails
 * on a provider is retried unit by unit on that provider, so one bad cue
 * cannot sink its neighbours; units still failing fall through to the next
 * eligible provider and end up unresolved when none is left.
 */
export class TranslationRouter {
  private readonly pool: ProviderPool;
  private readonly retry: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(opts: TranslationRouterOptions) {
    this.pool = opts.pool;
    this.retry = opts.retry;
    this.sleep = opts.sleep ?? abortableSleep;
  }

  eligibleProviders(targetLanguage: string): string[] {
    return this.pool.eligibleFor(targetLanguage).map((capability) => capability.provider);
  }

  async translate(unit: TranslationUnit, signal?: AbortSignal): Promise<UnitResolution> {
    const results = await this.translateGroup([unit], signal);
    return (
      results.get(unit.cueIndex) ?? {
        kind: 'unresolved',
        cueIndex: unit.cueIndex,
        sourceText: unit.sourceText,
        attemptedProviders: [],
        reason: 'no result was produced'
      }
    );
  }

  /** Resolves units that share one source and target language. */
  async translateGroup(
    units: readonly TranslationUnit[],
    signal?: AbortSignal
  ): Promise<Map<number, UnitResolution>> {
    const results = new Map<number, UnitResolution>();
    const [first] = units;
    if (!first) {
      return results;
    }

    const { sourceLanguage, targetLanguage } = first;
    const pair = pairKey(first);
    const differentPair = units.some((unit) => pairKey(unit) !== pair);
    if (differentPair) {
      throw new Error('translateGroup expects units that share one language pair.');
    }

    const attempted = new Map<number, string[]>();
    const lastReason = new Map<number, string>();
    let pending = [...units];

    for (const capability of this.pool.eligibleFor(targetLanguage)) {
      if (pending.length === 0) {
        break;
      }
      // A concurrent group may have disabled this provider since eligibility was read.
      if (this.pool.isDisabled(capability.provider)) {
        continue;
      }

      for (const unit of pending) {
        attempted.set(unit.cueIndex, [...(attempted.get(unit.cueIndex) ?? []), capability.provider]);
      }

      const outcome = mergeOutcomes(
        await Promise.all(
          chunk(pending, capability.maxBatchSize).map((batch) =>
            this.resolveChunk(capability.provider, batch, signal)
          )
        )
      );

      for (const translated of outcome.resolved) {
        results.set(translated.cueIndex, translated);
      }
      pending = outcome.failed
        .map(({ unit, reason }) => {
          lastReason.set(unit.cueIndex, reason);
          return unit;
        })
        .sort((a, b) => a.cueIndex - b.cueIndex);
    }

    for (const unit of pending) {
      const unresolved: UnresolvedUnit = {
        kind: 'unresolved',
        cueIndex: unit.cueIndex,
        sourceText: unit.sourceText,
        attemptedProviders: attempted.get(unit.cueIndex) ?? [],
        reason:
          lastReason.get(unit.cueIndex) ??
          `no enabled provider supports target language "${targetLanguage}"`
      };
      results.set(unit.cueIndex, unresolved);
    }

    if (pending.length > 0) {
      console.warn(
        `[subtitle-translation][router] ${pending.length} unit(s) unresolved for ` +
          `${sourceLanguage} -> ${targetLanguage}.`
      );
    }

    return results;
  }

  private async resolveChunk(
    providerId: string,
    batch: TranslationUnit[],
    signal?: AbortSignal
  ): Promise<ChunkOutcome> {
    try {
      const output = await this.callWithRetry(providerId, batch, signal);
      return this.acceptOutput(providerId, batch, output);
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        throw error;
      }

      const isolate =
        batch.length > 1 &&
        !this.pool.isDisabled(providerId) &&
        !(error instanceof UnsupportedLanguagePairError);
      if (isolate) {
        console.warn(
          `[subtitle-translation][router] ${providerId} failed a batch of ${batch.length}; ` +
            `retrying units one by one. ${describeError(error)}`
        );
        return mergeOutcomes(
          await Promise.all(batch.map((unit) => this.resolveChunk(providerId, [unit], signal)))
        );
      }

      const reason = `${providerId}: ${describeError(error)}`;
      return { resolved: [], failed: batch.map((unit) => ({ unit, reason })) };
    }
  }

  private async callWithRetry(
    providerId: string,
    batch: TranslationUnit[],
    signal?: AbortSignal
  ): Promise<string[]> {
    const [first] = batch;
    const capability = this.pool.capabilityFor(providerId);
    if (!first || !capability) {
      throw new Error(`Provider "${providerId}" cannot take this batch.`);
    }
    if (!supportsTargetLanguage(capability, first.targetLanguage)) {
      throw new UnsupportedLanguagePairError({
        providerId,
        sourceLanguage: first.sourceLanguage,
        targetLanguage: first.targetLanguage
      });
    }

    const texts = batch.map((unit) => unit.sourceText);
    for (let attempt = 1; ; attempt += 1) {
      try {
        const output = await this.pool.run(
          providerId,
          texts,
          first.sourceLanguage,
          first.targetLanguage,
          signal
        );
        if (output.length !== texts.length) {
          throw new ProviderTransientError({
            providerId,
            message:
              `${providerId} returned ${output.length} translation(s) ` +
              `for ${texts.length} text(s).`
          });
        }
        return output;
      } catch (error) {
        if (isProviderPermanentError(error)) {
          this.pool.disable(providerId, error.message);
          throw error;
        }
        if (!isProviderTransientError(error) || attempt >= this.retry.maxAttempts) {
          throw error;
        }

        const wait = backoffDelay(this.retry, attempt, error.retryAfterMs);
        console.warn(
          `[subtitle-translation][router] ${providerId} attempt ${attempt}/${this.retry.maxAttempts} ` +
            `failed: ${error.message} Retrying in ${wait}ms.`
        );
        await this.sleep(wait, signal);
      }
    }
  }

  private acceptOutput(providerId: string, batch: TranslationUnit[], output: string[]): ChunkOutcome {
    const resolved: TranslatedText[] = [];
    const failed: FailedUnit[] = [];

    batch.forEach((unit, position) => {
      const text = (output[position] ?? '').trim();
      if (!text) {
        failed.push({ unit, reason: `${providerId}: returned an empty translation` });
        return;
      }
      if (hasLetters(unit.sourceText) && !hasExpectedScript(text, unit.targetLanguage)) {
        failed.push({
          unit,
          reason: `${providerId}: output is not written in the script of "${unit.targetLanguage}"`
        });
        return;
      }
      resolved.push({
        kind: 'translated',
        cueIndex: unit.cueIndex,
        text,
        providerId,
        fromMemory: false
      });
    });

    return { resolved, failed };
  }
}
