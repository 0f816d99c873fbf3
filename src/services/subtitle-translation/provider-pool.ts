import { setTimeout as delay } from 'node:timers/promises';
import pLimit, { type LimitFunction } from 'p-limit';
import {
  isProviderPermanentError,
  ProviderPermanentError
} from '@/services/subtitle-translation/errors';
import { normalizeLanguageTag } from '@/services/subtitle-translation/language-classifier';
import type { TranslationProvider } from '@/services/subtitle-translation/providers/types';
import type { ProviderCapability } from '@/services/subtitle-translation/types';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const abortableSleep: Sleep = async (ms, signal) => {
  signal?.throwIfAborted();
  if (ms <= 0) {
    return;
  }
  await delay(ms, undefined, { signal });
};

export function supportsTargetLanguage(capability: ProviderCapability, targetLanguage: string): boolean {
  const target = normalizeLanguageTag(targetLanguage);
  return capability.supportedTargetLanguages.some(
    (language) => normalizeLanguageTag(language) === target
  );
}

/** Spaces request starts so a provider never sees more than `requestsPerMinute`. */
class RequestPacer {
  private nextSlotAt = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly now: () => number
  ) {}

  reserve(): number {
    if (this.intervalMs <= 0) {
      return 0;
    }
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;
    return slot - now;
  }
}

export interface ProviderPoolOptions {
  providers: readonly TranslationProvider[];
  /** Capability entries in priority order. */
  capabilities: readonly ProviderCapability[];
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Shared state for every provider a batch run can use: concurrency limiters,
 * request pacing and the set of providers disabled after a permanent failure.
 * One pool is shared by all files and target languages of a run.
 */
export class ProviderPool {
  private readonly providers = new Map<string, TranslationProvider>();
  private readonly capabilities: ProviderCapability[] = [];
  private readonly limiters = new Map<string, LimitFunction>();
  private readonly pacers = new Map<string, RequestPacer>();
  private readonly disabled = new Map<string, string>();
  private readonly sleep: Sleep;

  constructor(opts: ProviderPoolOptions) {
    this.sleep = opts.sleep ?? abortableSleep;
    const now = opts.now ?? Date.now;

    for (const provider of opts.providers) {
      this.providers.set(provider.id, provider);
    }

    for (const capability of opts.capabilities) {
      if (!this.providers.has(capability.provider)) {
        continue;
      }
      this.capabilities.push(capability);
      this.limiters.set(capability.provider, pLimit(Math.max(1, capability.rateLimit.maxConcurrent)));
      const interval =
        capability.rateLimit.requestsPerMinute > 0 ? 60_000 / capability.rateLimit.requestsPerMinute : 0;
      this.pacers.set(capability.provider, new RequestPacer(interval, now));
    }

    for (const provider of opts.providers) {
      if (!this.limiters.has(provider.id)) {
        console.warn(
          `[subtitle-translation][pool] Provider "${provider.id}" has no capability entry ` +
            'and will not be used.'
        );
      }
    }
  }

  get providerIds(): string[] {
    return this.capabilities.map((capability) => capability.provider);
  }

  capabilityFor(providerId: string): ProviderCapability | undefined {
    return this.capabilities.find((capability) => capability.provider === providerId);
  }

  /** Enabled providers able to produce `targetLanguage`, in priority order. */
  eligibleFor(targetLanguage: string): ProviderCapability[] {
    return this.capabilities.filter(
      (capability) =>
        !this.disabled.has(capability.provider) && supportsTargetLanguage(capability, targetLanguage)
    );
  }

  isDisabled(providerId: string): boolean {
    return this.disabled.has(providerId);
  }

  disable(providerId: string, reason: string): void {
    if (this.disabled.has(providerId)) {
      return;
    }
    this.disabled.set(providerId, reason);
    console.warn(
      `[subtitle-translation][pool] Disabling provider "${providerId}" for this run: ${reason}`
    );
  }

  disabledProviders(): Record<string, string> {
    return Object.fromEntries(this.disabled);
  }

  private assertEnabled(providerId: string): void {
    const reason = this.disabled.get(providerId);
    if (reason !== undefined) {
      throw new ProviderPermanentError({
        providerId,
        message: `Provider "${providerId}" is disabled for this run: ${reason}`
      });
    }
  }

  /**
   * Runs one provider call inside that provider's concurrency and pacing
   * limits. Calls still queued when the provider is disabled never reach it.
   */
  async run(
    providerId: string,
    texts: readonly string[],
    sourceLanguage: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<string[]> {
    const provider = this.providers.get(providerId);
    const limit = this.limiters.get(providerId);
    const pacer = this.pacers.get(providerId);
    if (!provider || !limit || !pacer) {
      throw new Error(`Provider "${providerId}" is not registered in this pool.`);
    }

    return limit(async () => {
      signal?.throwIfAborted();
      this.assertEnabled(providerId);
      const wait = pacer.reserve();
      if (wait > 0) {
        await this.sleep(wait, signal);
        this.assertEnabled(providerId);
      }
      try {
        return await provider.translate(texts, sourceLanguage, targetLanguage, signal);
      } catch (error) {
        // Disabled before the limiter releases the next queued call.
        if (isProviderPermanentError(error)) {
          this.disable(providerId, error.message);
        }
        throw error;
      }
    });
  }
}
