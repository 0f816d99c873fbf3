import { readFile } from 'node:fs/promises';
import pLimit from 'p-limit';
import { getTranslationEngineSettings } from '@/config/translation-engine';
import {
  getProviderPriority,
  orderCapabilities,
  PROVIDER_CAPABILITIES
} from '@/config/translation-providers';
import { appendJobError, getJobById, recordOutcome, setJobStatus } from '@/data/job-store';
import { resolveSourcePath, writeSubtitleOutputs } from '@/services/storage';
import { describeError, isAbortError } from '@/services/subtitle-translation/errors';
import { translateTrack } from '@/services/subtitle-translation/index';
import { normalizeLanguageTag } from '@/services/subtitle-translation/language-classifier';
import { ProviderPool, type Sleep } from '@/services/subtitle-translation/provider-pool';
import {
  createConfiguredProviders,
  type TranslationProvider
} from '@/services/subtitle-translation/providers/index';
import { TranslationRouter } from '@/services/subtitle-translation/router';
import { parseSubtitleTrack, writeSubtitleTrack } from '@/services/subtitle-translation/srt';
import {
  createTranslationMemory,
  type TranslationMemory
} from '@/services/subtitle-translation/translation-memory';
import type { TranslationEngineSettings } from '@/services/subtitle-translation/types';
import { renderWebVtt } from '@/services/subtitle-translation/vtt';
import type { FileTranslationOutcome, TranslationFileInput } from '@/types/job';

/** Everything one batch run shares across its files. */
export interface TranslationRuntime {
  pool: ProviderPool;
  router: TranslationRouter;
  settings: TranslationEngineSettings;
  memory?: TranslationMemory;
}

export function createTranslationRuntime(opts?: {
  providers?: TranslationProvider[];
  settings?: TranslationEngineSettings;
  /** `null` turns the translation memory off for this run. */
  memory?: TranslationMemory | null;
  sleep?: Sleep;
}): TranslationRuntime {
  const settings = opts?.settings ?? getTranslationEngineSettings();
  const pool = new ProviderPool({
    providers: opts?.providers ?? createConfiguredProviders(),
    capabilities: orderCapabilities(PROVIDER_CAPABILITIES, getProviderPriority()),
    sleep: opts?.sleep
  });
  const router = new TranslationRouter({ pool, retry: settings.retry, sleep: opts?.sleep });
  const memory = opts?.memory === null ? undefined : (opts?.memory ?? createTranslationMemory());
  return { pool, router, settings, memory };
}

function failedOutcome(fileId: string, targetLanguage: string, error: string): FileTranslationOutcome {
  return {
    fileId,
    targetLanguage,
    status: 'failed',
    unresolvedCount: 0,
    preserved: 0,
    translated: 0,
    unresolvedCueIndices: [],
    error,
    finishedAt: new Date().toISOString()
  };
}

function uniqueTargets(targetLanguages: readonly string[]): string[] {
  return [...new Set(targetLanguages.map(normalizeLanguageTag))];
}

/**
 * Translates one source file into every target language. Targets run
 * concurrently under one timeout; a failure in one target never affects the
 * others, and nothing is written for a target that did not reconstruct.
 */
export async function translateSubtitleFile(
  file: TranslationFileInput,
  targetLanguages: readonly string[],
  runtime: TranslationRuntime
): Promise<FileTranslationOutcome[]> {
  const targets = uniqueTargets(targetLanguages);
  const { settings } = runtime;

  let parsed: ReturnType<typeof parseSubtitleTrack>;
  try {
    const sourcePath = resolveSourcePath(file.sourcePath);
    if (!sourcePath) {
      throw new Error(`${file.sourcePath} is outside the subtitle input root.`);
    }
    const raw = await readFile(sourcePath, 'utf8');
    parsed = parseSubtitleTrack(raw, { language: file.sourceLanguage });
  } catch (error) {
    const message = `Unable to read ${file.fileId}: ${describeError(error)}`;
    console.error(`[workflow][subtitle-translation] ${message}`);
    return targets.map((target) => failedOutcome(file.fileId, target, message));
  }

  if (parsed.warnings.length > 0) {
    console.warn(
      `[workflow][subtitle-translation] ${file.fileId}: skipped or flagged ` +
        `${parsed.warnings.length} block(s); first: ${parsed.warnings[0]?.message ?? ''}`
    );
  }

  const signal = AbortSignal.timeout(settings.fileTimeoutMs);

  return Promise.all(
    targets.map(async (target): Promise<FileTranslationOutcome> => {
      try {
        const result = await translateTrack(parsed.track, target, {
          router: runtime.router,
          settings,
          memory: runtime.memory,
          signal
        });

        const written = await writeSubtitleOutputs({
          fileId: file.fileId,
          language: result.targetLanguage,
          srt: writeSubtitleTrack(result.track, { delimiter: settings.timestampDelimiter }),
          vtt: settings.emitVtt ? renderWebVtt(result.track) : undefined
        });

        if (result.report.unresolved > 0) {
          console.warn(
            `[workflow][subtitle-translation] ${file.fileId} -> ${target}: ` +
              `${result.report.unresolved} cue(s) need follow-up ` +
              `(${result.report.unresolvedCueIndices.join(', ')}).`
          );
        }

        return {
          fileId: file.fileId,
          targetLanguage: result.targetLanguage,
          status: result.status,
          unresolvedCount: result.report.unresolved,
          preserved: result.report.preserved,
          translated: result.report.translated,
          unresolvedCueIndices: result.report.unresolvedCueIndices,
          outputPath: written.outputPath,
          ...(written.vttPath ? { vttPath: written.vttPath } : {}),
          finishedAt: new Date().toISOString()
        };
      } catch (error) {
        const message = isAbortError(error)
          ? `Timed out after ${settings.fileTimeoutMs}ms.`
          : describeError(error);
        console.error(`[workflow][subtitle-translation] ${file.fileId} -> ${target} failed: ${message}`);
        return failedOutcome(file.fileId, target, message);
      }
    })
  );
}

export async function runTranslationBatch(
  files: readonly TranslationFileInput[],
  targetLanguages: readonly string[],
  opts?: {
    runtime?: TranslationRuntime;
    onOutcome?: (outcome: FileTranslationOutcome) => Promise<void>;
  }
): Promise<FileTranslationOutcome[]> {
  const runtime = opts?.runtime ?? createTranslationRuntime();
  const limit = pLimit(runtime.settings.fileConcurrency);

  const perFile = await Promise.all(
    files.map((file) =>
      limit(async () => {
        const outcomes = await translateSubtitleFile(file, targetLanguages, runtime);
        if (opts?.onOutcome) {
          for (const outcome of outcomes) {
            await opts.onOutcome(outcome);
          }
        }
        return outcomes;
      })
    )
  );

  return perFile.flat();
}

export async function startSubtitleTranslationJob(
  jobId: string,
  opts?: { runtime?: TranslationRuntime }
): Promise<void> {
  const job = await getJobById(jobId);
  if (!job || job.status === 'running' || job.status === 'completed') {
    return;
  }

  try {
    await setJobStatus(jobId, 'running');

    const outcomes = await runTranslationBatch(job.files, job.targetLanguages, {
      runtime: opts?.runtime,
      onOutcome: async (outcome) => {
        await recordOutcome(jobId, outcome);
        if (outcome.error) {
          await appendJobError(jobId, `${outcome.targetLanguage}: ${outcome.error}`, {
            fileId: outcome.fileId
          });
        }
      }
    });

    const allFailed = outcomes.length > 0 && outcomes.every((outcome) => outcome.status === 'failed');
    await setJobStatus(jobId, allFailed ? 'failed' : 'completed');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown translation workflow failure.';
    console.error(`[workflow][subtitle-translation] Job ${jobId} failed: ${message}`);
    await appendJobError(jobId, message);
    await setJobStatus(jobId, 'failed');
  }
}
