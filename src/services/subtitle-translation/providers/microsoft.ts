import { getMicrosoftTranslatorSettings } from '@/config/translation-providers';
import { normalizeLanguageTag } from '@/services/subtitle-translation/language-classifier';
import { UNKNOWN_LANGUAGE } from '@/services/subtitle-translation/types';
import { invalidPayload, isRecord, postJson } from '@/services/subtitle-translation/providers/http';
import type { TranslationProvider } from '@/services/subtitle-translation/providers/types';

type MicrosoftTranslatorSettings = ReturnType<typeof getMicrosoftTranslatorSettings>;

const LANGUAGE_CODES: Record<string, string> = {
  zh: 'zh-Hans',
  no: 'nb'
};

export function toMicrosoftLanguage(language: string): string {
  const primary = normalizeLanguageTag(language);
  return LANGUAGE_CODES[primary] ?? primary;
}

function firstTranslation(item: unknown): string | undefined {
  if (!isRecord(item) || !Array.isArray(item.translations)) {
    return undefined;
  }
  const first: unknown = item.translations[0];
  return isRecord(first) && typeof first.text === 'string' ? first.text : undefined;
}

export class MicrosoftTranslatorProvider implements TranslationProvider {
  readonly id = 'microsoft';

  constructor(
    private readonly settings: MicrosoftTranslatorSettings = getMicrosoftTranslatorSettings()
  ) {}

  async translate(
    texts: readonly string[],
    sourceLanguage: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<string[]> {
    const url = new URL('/translate', this.settings.baseUrl);
    url.searchParams.set('api-version', '3.0');
    url.searchParams.set('to', toMicrosoftLanguage(targetLanguage));
    const source = normalizeLanguageTag(sourceLanguage);
    if (source !== UNKNOWN_LANGUAGE) {
      url.searchParams.set('from', toMicrosoftLanguage(source));
    }

    const payload = await postJson({
      providerId: this.id,
      url: url.toString(),
      headers: {
        'Ocp-Apim-Subscription-Key': this.settings.apiKey ?? '',
        ...(this.settings.region ? { 'Ocp-Apim-Subscription-Region': this.settings.region } : {})
      },
      body: texts.map((text) => ({ Text: text })),
      timeoutMs: this.settings.timeoutMs,
      signal
    });

    if (!Array.isArray(payload)) {
      throw invalidPayload(this.id, 'expected an array of results');
    }

    return payload.map((item: unknown, position: number) => {
      const text = firstTranslation(item);
      if (text === undefined) {
        throw invalidPayload(this.id, `result ${position} has no translation`);
      }
      return text;
    });
  }
}
