import { createHash } from 'node:crypto';
import { env } from '@/config/env';
import { readJsonFile, updateJsonFile } from '@/lib/json-store';
import { normalizeLanguageTag } from '@/services/subtitle-translation/language-classifier';
import type { TranslatedText, TranslationUnit } from '@/services/subtitle-translation/types';

/** Bump when stored translations must no longer be reused. */
export const TRANSLATION_MEMORY_VERSION = 1;

export interface TranslationMemoryEntry {
  key: string;
  sourceLanguage: string;
  targetLanguage: string;
  translatedText: string;
  providerId: string;
  savedAt: string;
}

interface TranslationMemoryDb {
  entries: Record<string, TranslationMemoryEntry>;
}

const EMPTY_MEMORY: TranslationMemoryDb = { entries: {} };

export interface TranslationMemory {
  lookup(units: readonly TranslationUnit[]): Promise<Map<string, TranslationMemoryEntry>>;
  save(entries: ReadonlyArray<{ unit: TranslationUnit; translation: TranslatedText }>): Promise<void>;
}

export function translationMemoryKey(unit: TranslationUnit): string {
  return createHash('sha256')
    .update(
      JSON.stringify({
        sourceText: unit.sourceText,
        sourceLanguage: normalizeLanguageTag(unit.sourceLanguage),
        targetLanguage: normalizeLanguageTag(unit.targetLanguage),
        version: TRANSLATION_MEMORY_VERSION
      })
    )
    .digest('hex');
}

export class JsonTranslationMemory implements TranslationMemory {
  constructor(private readonly filePath: string = env.translationMemoryPath) {}

  async lookup(units: readonly TranslationUnit[]): Promise<Map<string, TranslationMemoryEntry>> {
    const found = new Map<string, TranslationMemoryEntry>();
    if (units.length === 0) {
      return found;
    }

    const memory = await readJsonFile(this.filePath, EMPTY_MEMORY);
    for (const unit of units) {
      const key = translationMemoryKey(unit);
      const entry = memory.entries[key];
      if (entry) {
        found.set(key, entry);
      }
    }
    return found;
  }

  async save(
    entries: ReadonlyArray<{ unit: TranslationUnit; translation: TranslatedText }>
  ): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    const savedAt = new Date().toISOString();
    await updateJsonFile(this.filePath, EMPTY_MEMORY, (current) => {
      const next = { ...current.entries };
      for (const { unit, translation } of entries) {
        const key = translationMemoryKey(unit);
        next[key] = {
          key,
          sourceLanguage: normalizeLanguageTag(unit.sourceLanguage),
          targetLanguage: normalizeLanguageTag(unit.targetLanguage),
          translatedText: translation.text,
          providerId: translation.providerId,
          savedAt
        };
      }
      return { entries: next };
    });
  }
}

export function createTranslationMemory(): TranslationMemory | undefined {
  return env.translationMemoryEnabled ? new JsonTranslationMemory() : undefined;
}
