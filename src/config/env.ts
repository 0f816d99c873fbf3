export function readStringEnv(key: string): string | undefined {
  const raw = process.env[key];
  if (typeof raw !== 'string') {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function readNumberEnv(key: string, fallback: number): number {
  const raw = readStringEnv(key);
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

export function readBooleanEnv(key: string, fallback: boolean): boolean {
  const raw = readStringEnv(key)?.toLowerCase();
  if (raw === 'true' || raw === '1' || raw === 'yes') {
    return true;
  }
  if (raw === 'false' || raw === '0' || raw === 'no') {
    return false;
  }
  return fallback;
}

const PROVIDER_KEYS = ['DEEPL_API_KEY', 'MICROSOFT_TRANSLATOR_KEY', 'OPENROUTER_API_KEY'];

// Read on access so that tests and long-lived processes see the current environment.
export const env = {
  get nodeEnv(): string {
    return process.env.NODE_ENV ?? 'development';
  },
  get jobsDbPath(): string {
    return readStringEnv('JOBS_DB_PATH') ?? '.data/jobs.json';
  },
  get inputRootPath(): string {
    return readStringEnv('SUBTITLE_INPUT_ROOT') ?? '.data/sources';
  },
  get outputRootPath(): string {
    return readStringEnv('SUBTITLE_OUTPUT_ROOT') ?? '.data/subtitles';
  },
  get translationMemoryPath(): string {
    return readStringEnv('TRANSLATION_MEMORY_PATH') ?? '.data/translation-memory.json';
  },
  get translationMemoryEnabled(): boolean {
    return readBooleanEnv('TRANSLATION_MEMORY_ENABLED', true);
  }
};

export function getRuntimeWarnings(): string[] {
  if (env.nodeEnv !== 'production') {
    return [];
  }

  const warnings: string[] = [];
  if (PROVIDER_KEYS.every((key) => !readStringEnv(key))) {
    warnings.push(
      `None of ${PROVIDER_KEYS.join(', ')} is configured in production mode; ` +
        'no translation provider is available and cues will stay unresolved.'
    );
  }
  if (readStringEnv('MICROSOFT_TRANSLATOR_KEY') && !readStringEnv('MICROSOFT_TRANSLATOR_REGION')) {
    warnings.push(
      'MICROSOFT_TRANSLATOR_REGION is not configured; Microsoft Translator will use the global endpoint.'
    );
  }
  return warnings;
}
