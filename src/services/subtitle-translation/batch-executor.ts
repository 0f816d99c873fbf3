import { describeError } from '@/services/subtitle-translation/errors';
import { normalizeLanguageTag } from '@/services/subtitle-translation/language-classifier';
import type { TranslationRouter } from '@/services/subtitle-translation/router';
import {
  translationMemoryKey,
  type TranslationMemory,
  type TranslationMemoryEntry
} from '@/services/subtitle-translation/translation-memory';
import type {
  TranslatedText,
  TranslationUnit,
  UnitResolution
} from '@/services/subtitle-translation/types';

export interface ExecuteBatchOptions {
  router: TranslationRouter;
  memory?: TranslationMemory;
  signal?: AbortSignal;
}

export function groupByLanguagePair(units: readonly TranslationUnit[]): Map<string, TranslationUnit[]> {
  const groups = new Map<string, TranslationUnit[]>();
  for (const unit of units) {
    const key =
      `${normalizeLanguageTag(unit.sourceLanguage)}\u0000` +
      normalizeLanguageTag(unit.targetLanguage);
    const group = groups.get(key);
    if (group) {
      group.push(unit);
    } else {
      groups.set(key, [unit]);
    }
  }
  return groups;
}

function forCue(resolution: UnitResolution, member: TranslationUnit): UnitResolution {
  return resolution.kind === 'translated'
    ? { ...resolution, cueIndex: member.cueIndex }
    : {
        ...resolution,
        cueIndex: member.cueIndex,
        sourceText: member.sourceText,
        attemptedProviders: [...resolution.attemptedProviders]
      };
}

// Save failures are logged; the translations are still returned.
async function saveToMemory(
  memory: TranslationMemory,
  learned: ReadonlyArray<{ unit: TranslationUnit; translation: TranslatedText }>
): Promise<void> {
  try {
    await memory.save(learned);
  } catch (error) {
    console.error(
      `[subtitle-translation][memory] Unable to save ${learned.length} translation(s): ` +
        describeError(error)
    );
  }
}

async function executeGroup(
  group: TranslationUnit[],
  opts: ExecuteBatchOptions
): Promise<Map<number, UnitResolution>> {
  // Identical lines (a repeated "Yes." or "Thank you.") are translated once.
  const members = new Map<string, TranslationUnit[]>();
  for (const unit of group) {
    const existing = members.get(unit.sourceText);
    if (existing) {
      existing.push(unit);
    } else {
      members.set(unit.sourceText, [unit]);
    }
  }

  const representatives = [...members.values()].flatMap((units) => units.slice(0, 1));
  const remembered = opts.memory
    ? await opts.memory.lookup(representatives)
    : new Map<string, TranslationMemoryEntry>();

  const byText = new Map<string, UnitResolution>();
  const toTranslate: TranslationUnit[] = [];
  for (const unit of representatives) {
    const entry = remembered.get(translationMemoryKey(unit));
    if (entry) {
      byText.set(unit.sourceText, {
        kind: 'translated',
        cueIndex: unit.cueIndex,
        text: entry.translatedText,
        providerId: entry.providerId,
        fromMemory: true
      });
    } else {
      toTranslate.push(unit);
    }
  }

  if (toTranslate.length > 0) {
    const fresh = await opts.router.translateGroup(toTranslate, opts.signal);
    const learned: Array<{ unit: TranslationUnit; translation: TranslatedText }> = [];
    for (const unit of toTranslate) {
      const resolution = fresh.get(unit.cueIndex);
      if (!resolution) {
        continue;
      }
      byText.set(unit.sourceText, resolution);
      if (resolution.kind === 'translated') {
        learned.push({ unit, translation: resolution });
      }
    }
    if (opts.memory && learned.length > 0) {
      await saveToMemory(opts.memory, learned);
    }
  }

  const results = new Map<number, UnitResolution>();
  for (const [text, units] of members) {
    const resolution = byText.get(text);
    if (!resolution) {
      continue;
    }
    for (const member of units) {
      results.set(member.cueIndex, forCue(resolution, member));
    }
  }
  return results;
}

/**
 * Resolves every unit exactly once: each cue index in `units` maps to either a
 * translation or an unresolved record. Units are grouped by language pair and
 * each group runs concurrently through the shared router.
 */
export async function executeBatch(
  units: readonly TranslationUnit[],
  opts: ExecuteBatchOptions
): Promise<Map<number, UnitResolution>> {
  const collected = new Map<number, UnitResolution>();
  const groups = [...groupByLanguagePair(units).values()];

  const groupResults = await Promise.all(groups.map((group) => executeGroup(group, opts)));
  for (const groupResult of groupResults) {
    for (const [cueIndex, resolution] of groupResult) {
      collected.set(cueIndex, resolution);
    }
  }

  const ordered = new Map<number, UnitResolution>();
  for (const unit of [...units].sort((a, b) => a.cueIndex - b.cueIndex)) {
    ordered.set(
      unit.cueIndex,
      collected.get(unit.cueIndex) ?? {
        kind: 'unresolved',
        cueIndex: unit.cueIndex,
        sourceText: unit.sourceText,
        attemptedProviders: [],
        reason: 'no result was produced'
      }
    );
  }
  return ordered;
}
