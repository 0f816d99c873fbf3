import { NextResponse } from 'next/server';
import { getTranslationEngineSettings } from '@/config/translation-engine';
import {
  isPlainObject,
  PayloadValidationError,
  readJsonBody,
  requireString
} from '@/lib/payload';
import { MalformedTrackError } from '@/services/subtitle-translation/errors';
import { planTrackTranslation } from '@/services/subtitle-translation/planner';
import { parseSubtitleTrack } from '@/services/subtitle-translation/srt';

export const dynamic = 'force-dynamic';

/**
 * Dry run: how a subtitle would be split between preserved and translated
 * cues. No provider is called.
 */
export async function POST(request: Request) {
  try {
    const body = await readJsonBody(request);
    if (!isPlainObject(body)) {
      throw new PayloadValidationError('Payload must be an object.');
    }
    if (typeof body.subtitle !== 'string') {
      throw new PayloadValidationError('subtitle is required and must be a string.');
    }

    const sourceLanguage = requireString(body.sourceLanguage, 'sourceLanguage');
    const targetLanguage = requireString(body.targetLanguage, 'targetLanguage');
    const parsed = parseSubtitleTrack(body.subtitle, { language: sourceLanguage });
    const plan = planTrackTranslation(parsed.track, targetLanguage, getTranslationEngineSettings());

    return NextResponse.json(
      {
        targetLanguage: plan.targetLanguage,
        stats: plan.stats,
        decisions: plan.decisions,
        classifications: plan.classifications,
        warnings: parsed.warnings
      },
      { status: 200 }
    );
  } catch (error) {
    if (error instanceof PayloadValidationError || error instanceof MalformedTrackError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }

    console.error('[api][translations][plan] Unable to plan translation.', error);
    return NextResponse.json({ error: 'Unable to plan translation.' }, { status: 500 });
  }
}
