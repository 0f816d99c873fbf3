export const UNKNOWN_LANGUAGE = 'unknown';

export type TimestampDelimiter = ',' | '.';

/** One time-coded subtitle entry. `start`/`end` are integer milliseconds. */
export interface Cue {
  index: number;
  start: number;
  end: number;
  text: string;
}

export interface Track {
  language: string;
  cues: Cue[];
}

export type ParseWarningCode =
  | 'MISSING_TIMING'
  | 'INVALID_TIMESTAMP'
  | 'END_BEFORE_START'
  | 'OUT_OF_ORDER';

export interface ParseWarning {
  blockNumber: number;
  line: number;
  code: ParseWarningCode;
  message: string;
}

export interface ParsedTrack {
  track: Track;
  warnings: ParseWarning[];
}

export interface LanguageGuess {
  language: string;
  confidence: number;
}

export interface ClassificationResult {
  cueIndex: number;
  detectedLanguage: string;
  confidence: number;
}

export type PreservationDecisionKind = 'PRESERVE' | 'TRANSLATE';

export type PreservationReason =
  | 'target-language-match'
  | 'language-mismatch'
  | 'low-confidence'
  | 'unknown-language'
  | 'empty-text'
  | 'non-speech';

export interface PreservationDecision {
  cueIndex: number;
  decision: PreservationDecisionKind;
  reason: PreservationReason;
}

export interface TranslationUnit {
  cueIndex: number;
  sourceText: string;
  sourceLanguage: string;
  targetLanguage: string;
}

export interface TranslatedText {
  kind: 'translated';
  cueIndex: number;
  text: string;
  providerId: string;
  fromMemory: boolean;
}

export interface UnresolvedUnit {
  kind: 'unresolved';
  cueIndex: number;
  sourceText: string;
  attemptedProviders: string[];
  reason: string;
}

export type UnitResolution = TranslatedText | UnresolvedUnit;

export interface ProviderRateLimit {
  maxConcurrent: number;
  /** 0 disables request pacing. */
  requestsPerMinute: number;
}

export interface ProviderCapability {
  provider: string;
  supportedTargetLanguages: readonly string[];
  maxBatchSize: number;
  rateLimit: ProviderRateLimit;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface TranslationEngineSettings {
  confidenceThreshold: number;
  preserveNonSpeech: boolean;
  timestampDelimiter: TimestampDelimiter;
  emitVtt: boolean;
  fileTimeoutMs: number;
  fileConcurrency: number;
  retry: RetryPolicy;
}

export interface TranslationPlanStats {
  cueCount: number;
  preserve: number;
  translate: number;
  uniqueTexts: number;
  charactersToTranslate: number;
}

export interface TranslationPlan {
  targetLanguage: string;
  classifications: ClassificationResult[];
  decisions: PreservationDecision[];
  units: TranslationUnit[];
  stats: TranslationPlanStats;
}

export interface ReconstructionReport {
  cueCount: number;
  preserved: number;
  translated: number;
  unresolved: number;
  unresolvedCueIndices: number[];
}

export interface ReconstructionResult {
  track: Track;
  report: ReconstructionReport;
  unresolved: UnresolvedUnit[];
}

export type TrackOutcomeStatus = 'completed' | 'completed-with-unresolved-units' | 'failed';

export interface TrackTranslationResult extends ReconstructionResult {
  targetLanguage: string;
  status: Exclude<TrackOutcomeStatus, 'failed'>;
  decisions: PreservationDecision[];
}
