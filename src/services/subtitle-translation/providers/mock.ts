import { normalizeLanguageTag } from '@/services/subtitle-translation/language-classifier';
import type { TranslationProvider } from '@/services/subtitle-translation/providers/types';

/** Local stand-in used when no provider credentials are configured. */
export class MockTranslationProvider implements TranslationProvider {
  readonly id = 'mock';

  async translate(
    texts: readonly string[],
    _sourceLanguage: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<string[]> {
    signal?.throwIfAborted();
    const tag = normalizeLanguageTag(targetLanguage);
    return texts.map((text) => `[${tag}] ${text}`);
  }
}
