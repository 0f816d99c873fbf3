import {
  classifyCue,
  isSameLanguage,
  normalizeLanguageTag
} from '@/services/subtitle-translation/language-classifier';
import { decidePreservation } from '@/services/subtitle-translation/preservation-policy';
import {
  UNKNOWN_LANGUAGE,
  type ClassificationResult,
  type Track,
  type TranslationEngineSettings,
  type TranslationPlan,
  type TranslationUnit
} from '@/services/subtitle-translation/types';

export type PlanSettings = Pick<TranslationEngineSettings, 'confidenceThreshold' | 'preserveNonSpeech'>;

function sourceLanguageFor(
  classification: ClassificationResult,
  track: Track,
  targetLanguage: string,
  threshold: number
): string {
  if (classification.detectedLanguage !== UNKNOWN_LANGUAGE && classification.confidence > threshold) {
    return classification.detectedLanguage;
  }
  // Declaring the target as the source would ask for a no-op; let the provider detect instead.
  if (isSameLanguage(track.language, targetLanguage)) {
    return UNKNOWN_LANGUAGE;
  }
  return normalizeLanguageTag(track.language);
}

/**
 * Classifies every cue and applies the preservation policy without calling
 * any provider. The stats feed cost estimates and the dry-run endpoint.
 */
export function planTrackTranslation(
  track: Track,
  targetLanguage: string,
  settings: PlanSettings
): TranslationPlan {
  const target = normalizeLanguageTag(targetLanguage);
  const classifications = track.cues.map(classifyCue);
  const decisions = track.cues.map((cue, position) => {
    const classification = classifications[position] ?? classifyCue(cue);
    return decidePreservation(cue, classification, target, {
      confidenceThreshold: settings.confidenceThreshold,
      preserveNonSpeech: settings.preserveNonSpeech
    });
  });

  const units: TranslationUnit[] = [];
  track.cues.forEach((cue, position) => {
    const decision = decisions[position];
    const classification = classifications[position];
    if (decision?.decision !== 'TRANSLATE' || !classification) {
      return;
    }
    units.push({
      cueIndex: cue.index,
      sourceText: cue.text,
      sourceLanguage: sourceLanguageFor(classification, track, target, settings.confidenceThreshold),
      targetLanguage: target
    });
  });

  const uniqueTexts = new Set(units.map((unit) => unit.sourceText));
  let charactersToTranslate = 0;
  for (const text of uniqueTexts) {
    charactersToTranslate += text.length;
  }

  return {
    targetLanguage: target,
    classifications,
    decisions,
    units,
    stats: {
      cueCount: track.cues.length,
      preserve: decisions.filter((decision) => decision.decision === 'PRESERVE').length,
      translate: units.length,
      uniqueTexts: uniqueTexts.size,
      charactersToTranslate
    }
  };
}
