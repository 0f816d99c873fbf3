import { isSameLanguage } from '@/services/subtitle-translation/language-classifier';
import { isNonSpeechTokenText } from '@/services/subtitle-translation/non-speech';
import {
  UNKNOWN_LANGUAGE,
  type ClassificationResult,
  type Cue,
  type PreservationDecision
} from '@/services/subtitle-translation/types';

export interface PreservationOptions {
  confidenceThreshold: number;
  preserveNonSpeech?: boolean;
}

/**
 * PRESERVE only when the cue is confidently already in the target language.
 * Unknown and low-confidence cues are translated.
 */
export function decidePreservation(
  cue: Cue,
  classification: ClassificationResult,
  targetLanguage: string,
  options: PreservationOptions
): PreservationDecision {
  const cueIndex = cue.index;

  if (!cue.text.trim()) {
    return { cueIndex, decision: 'PRESERVE', reason: 'empty-text' };
  }

  if (options.preserveNonSpeech && isNonSpeechTokenText(cue.text)) {
    return { cueIndex, decision: 'PRESERVE', reason: 'non-speech' };
  }

  if (classification.detectedLanguage === UNKNOWN_LANGUAGE) {
    return { cueIndex, decision: 'TRANSLATE', reason: 'unknown-language' };
  }

  if (!isSameLanguage(classification.detectedLanguage, targetLanguage)) {
    return { cueIndex, decision: 'TRANSLATE', reason: 'language-mismatch' };
  }

  if (classification.confidence > options.confidenceThreshold) {
    return { cueIndex, decision: 'PRESERVE', reason: 'target-language-match' };
  }

  return { cueIndex, decision: 'TRANSLATE', reason: 'low-confidence' };
}
