import { executeBatch } from '@/services/subtitle-translation/batch-executor';
import { planTrackTranslation, type PlanSettings } from '@/services/subtitle-translation/planner';
import { reconstructTrack } from '@/services/subtitle-translation/reconstructor';
import type { TranslationRouter } from '@/services/subtitle-translation/router';
import type { TranslationMemory } from '@/services/subtitle-translation/translation-memory';
import type { Track, TrackTranslationResult } from '@/services/subtitle-translation/types';

export interface TranslateTrackOptions {
  router: TranslationRouter;
  settings: PlanSettings;
  memory?: TranslationMemory;
  signal?: AbortSignal;
}

/**
 * Produces `track` in `targetLanguage` with the same cue count, order and
 * timing. Cues that no provider could translate keep their source text and
 * are reported as unresolved.
 */
export async function translateTrack(
  track: Track,
  targetLanguage: string,
  opts: TranslateTrackOptions
): Promise<TrackTranslationResult> {
  const plan = planTrackTranslation(track, targetLanguage, opts.settings);
  const results = await executeBatch(plan.units, {
    router: opts.router,
    memory: opts.memory,
    signal: opts.signal
  });

  opts.signal?.throwIfAborted();
  const reconstruction = reconstructTrack(track, plan.decisions, results, plan.targetLanguage);

  return {
    ...reconstruction,
    targetLanguage: plan.targetLanguage,
    status: reconstruction.report.unresolved > 0 ? 'completed-with-unresolved-units' : 'completed',
    decisions: plan.decisions
  };
}
