import { getDeepLSettings } from '@/config/translation-providers';
import { normalizeLanguageTag } from '@/services/subtitle-translation/language-classifier';
import { UNKNOWN_LANGUAGE } from '@/services/subtitle-translation/types';
import { invalidPayload, isRecord, postJson } from '@/services/subtitle-translation/providers/http';
import type { TranslationProvider } from '@/services/subtitle-translation/providers/types';

type DeepLSettings = ReturnType<typeof getDeepLSettings>;

// DeepL rejects the bare codes for languages it only serves as regional variants.
const TARGET_VARIANTS: Record<string, string> = {
  en: 'EN-US',
  pt: 'PT-BR',
  zh: 'ZH-HANS'
};

export function toDeepLTarget(language: string): string {
  const primary = normalizeLanguageTag(language);
  return TARGET_VARIANTS[primary] ?? primary.toUpperCase();
}

export class DeepLProvider implements TranslationProvider {
  readonly id = 'deepl';

  constructor(private readonly settings: DeepLSettings = getDeepLSettings()) {}

  async translate(
    texts: readonly string[],
    sourceLanguage: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<string[]> {
    const source = normalizeLanguageTag(sourceLanguage);
    const payload = await postJson({
      providerId: this.id,
      url: `${this.settings.baseUrl}/v2/translate`,
      headers: {
        Authorization: `DeepL-Auth-Key ${this.settings.apiKey ?? ''}`
      },
      body: {
        text: texts,
        target_lang: toDeepLTarget(targetLanguage),
        ...(source === UNKNOWN_LANGUAGE ? {} : { source_lang: source.toUpperCase() }),
        preserve_formatting: true
      },
      timeoutMs: this.settings.timeoutMs,
      signal
    });

    if (!isRecord(payload) || !Array.isArray(payload.translations)) {
      throw invalidPayload(this.id, 'missing "translations" array');
    }

    return payload.translations.map((item: unknown, position: number) => {
      if (!isRecord(item) || typeof item.text !== 'string') {
        throw invalidPayload(this.id, `translation ${position} has no text`);
      }
      return item.text;
    });
  }
}
