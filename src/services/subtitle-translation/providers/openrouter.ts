import { getOpenRouterSettings } from '@/config/translation-providers';
import { normalizeLanguageTag } from '@/services/subtitle-translation/language-classifier';
import { UNKNOWN_LANGUAGE } from '@/services/subtitle-translation/types';
import { invalidPayload, isRecord, postJson } from '@/services/subtitle-translation/providers/http';
import type { TranslationProvider } from '@/services/subtitle-translation/providers/types';

type OpenRouterSettings = ReturnType<typeof getOpenRouterSettings>;

const languageNames = new Intl.DisplayNames(['en'], { type: 'language' });

export function describeLanguage(language: string): string {
  const tag = normalizeLanguageTag(language);
  if (tag === UNKNOWN_LANGUAGE) {
    return 'the detected source language';
  }
  try {
    return languageNames.of(tag) ?? tag;
  } catch (error) {
    if (error instanceof RangeError) {
      return tag;
    }
    throw error;
  }
}

export function buildTranslationPrompts(
  texts: readonly string[],
  sourceLanguage: string,
  targetLanguage: string
): { systemPrompt: string; userPrompt: string } {
  const target = describeLanguage(targetLanguage);
  const systemPrompt = [
    `You are a professional subtitle translator. Translate each cue into ${target}.`,
    'Keep the meaning, tone and register of spoken testimony.',
    'Translate every cue on its own: do not merge, split, drop or reorder cues.',
    'Keep line breaks inside a cue where they make sense.',
    'Return JSON only: {"translations":[{"index":number,"text":string}]}',
    'with exactly one entry per input index.'
  ].join(' ');

  const userPrompt = [
    `Source language: ${describeLanguage(sourceLanguage)}`,
    `Target language: ${target}`,
    'Cues JSON:',
    JSON.stringify(texts.map((text, index) => ({ index, text })))
  ].join('\n');

  return { systemPrompt, userPrompt };
}

function extractContent(providerId: string, payload: unknown): string {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) {
    throw invalidPayload(providerId, 'missing "choices"');
  }
  const choice: unknown = payload.choices[0];
  const message = isRecord(choice) ? choice.message : undefined;
  const content = isRecord(message) ? message.content : undefined;

  if (typeof content === 'string') {
    return content;
  }

  if (Array.isArray(content)) {
    const text = content
      .map((item: unknown) => (isRecord(item) && typeof item.text === 'string' ? item.text : ''))
      .join('')
      .trim();
    if (text) {
      return text;
    }
  }

  throw invalidPayload(providerId, 'response did not include message content');
}

function parseJsonBlock(providerId: string, content: string): unknown {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)\s*```/i)?.[1];
  for (const candidate of fenced ? [content, fenced] : [content]) {
    try {
      return JSON.parse(candidate);
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
    }
  }
  throw invalidPayload(providerId, 'message content is not JSON');
}

export function readTranslations(providerId: string, parsed: unknown, expected: number): string[] {
  if (!isRecord(parsed) || !Array.isArray(parsed.translations)) {
    throw invalidPayload(providerId, 'missing "translations" array');
  }

  const byIndex = new Map<number, string>();
  for (const entry of parsed.translations) {
    if (isRecord(entry) && typeof entry.index === 'number' && typeof entry.text === 'string') {
      byIndex.set(entry.index, entry.text);
    }
  }

  const output: string[] = [];
  for (let index = 0; index < expected; index += 1) {
    const text = byIndex.get(index);
    if (text === undefined) {
      throw invalidPayload(providerId, `cue ${index} is missing from the model output`);
    }
    output.push(text);
  }
  return output;
}

export class OpenRouterTranslationProvider implements TranslationProvider {
  readonly id = 'openrouter';

  constructor(private readonly settings: OpenRouterSettings = getOpenRouterSettings()) {}

  async translate(
    texts: readonly string[],
    sourceLanguage: string,
    targetLanguage: string,
    signal?: AbortSignal
  ): Promise<string[]> {
    const { systemPrompt, userPrompt } = buildTranslationPrompts(texts, sourceLanguage, targetLanguage);

    const payload = await postJson({
      providerId: this.id,
      url: this.settings.baseUrl,
      headers: {
        Authorization: `Bearer ${this.settings.apiKey ?? ''}`,
        ...(this.settings.siteUrl ? { 'HTTP-Referer': this.settings.siteUrl } : {}),
        'X-Title': this.settings.appName
      },
      body: {
        model: this.settings.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt }
        ],
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
        response_format: { type: 'json_object' }
      },
      timeoutMs: this.settings.timeoutMs,
      signal
    });

    const content = extractContent(this.id, payload);
    return readTranslations(this.id, parseJsonBlock(this.id, content), texts.length);
  }
}
