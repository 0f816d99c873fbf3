import { readBooleanEnv, readNumberEnv, readStringEnv } from '@/config/env';
import type {
  RetryPolicy,
  TimestampDelimiter,
  TranslationEngineSettings
} from '@/services/subtitle-translation/types';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 8000
};

function readThreshold(): number {
  const raw = readStringEnv('SUBTITLE_PRESERVE_CONFIDENCE_THRESHOLD');
  if (!raw) {
    return DEFAULT_CONFIDENCE_THRESHOLD;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    console.warn(
      `[config][translation-engine] SUBTITLE_PRESERVE_CONFIDENCE_THRESHOLD="${raw}" ` +
        `is outside [0, 1]; using ${DEFAULT_CONFIDENCE_THRESHOLD}.`
    );
    return DEFAULT_CONFIDENCE_THRESHOLD;
  }
  return parsed;
}

function readDelimiter(): TimestampDelimiter {
  return readStringEnv('SUBTITLE_TIMESTAMP_DELIMITER') === '.' ? '.' : ',';
}

export function getTranslationEngineSettings(): TranslationEngineSettings {
  return {
    confidenceThreshold: readThreshold(),
    preserveNonSpeech: readBooleanEnv('SUBTITLE_PRESERVE_NON_SPEECH', false),
    timestampDelimiter: readDelimiter(),
    emitVtt: readBooleanEnv('SUBTITLE_EMIT_VTT', false),
    fileTimeoutMs: readNumberEnv('SUBTITLE_FILE_TIMEOUT_MS', 10 * 60 * 1000),
    fileConcurrency: Math.max(1, Math.floor(readNumberEnv('SUBTITLE_FILE_CONCURRENCY', 4))),
    retry: {
      maxAttempts: Math.max(
        1,
        Math.floor(readNumberEnv('TRANSLATION_RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_POLICY.maxAttempts))
      ),
      baseDelayMs: readNumberEnv('TRANSLATION_RETRY_BASE_DELAY_MS', DEFAULT_RETRY_POLICY.baseDelayMs),
      maxDelayMs: readNumberEnv('TRANSLATION_RETRY_MAX_DELAY_MS', DEFAULT_RETRY_POLICY.maxDelayMs)
    }
  };
}
