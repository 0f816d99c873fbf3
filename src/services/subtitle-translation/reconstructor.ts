import { ReconstructionInvariantError } from '@/services/subtitle-translation/errors';
import type {
  Cue,
  PreservationDecision,
  ReconstructionResult,
  Track,
  UnitResolution,
  UnresolvedUnit
} from '@/services/subtitle-translation/types';

function assertAligned(original: Track, rebuilt: Cue[]): void {
  if (rebuilt.length !== original.cues.length) {
    throw new ReconstructionInvariantError(
      `Reconstructed ${rebuilt.length} cue(s) from a track of ${original.cues.length}.`
    );
  }

  original.cues.forEach((source, position) => {
    const output = rebuilt[position];
    if (
      !output ||
      output.index !== source.index ||
      output.start !== source.start ||
      output.end !== source.end
    ) {
      throw new ReconstructionInvariantError(
        `Cue ${source.index} changed index or timing during reconstruction.`,
        { cueIndex: source.index }
      );
    }
  });
}

/**
 * Merges preserved and translated cues back into the original order. Index and
 * timing are copied from the source cue; unresolved cues keep their source
 * text and are listed in the report.
 */
export function reconstructTrack(
  original: Track,
  decisions: readonly PreservationDecision[],
  results: ReadonlyMap<number, UnitResolution>,
  targetLanguage: string
): ReconstructionResult {
  if (decisions.length !== original.cues.length) {
    throw new ReconstructionInvariantError(
      `Got ${decisions.length} decision(s) for ${original.cues.length} cue(s).`
    );
  }

  const unresolved: UnresolvedUnit[] = [];
  let preserved = 0;
  let translated = 0;

  const cues = original.cues.map((cue, position): Cue => {
    const decision = decisions[position];
    if (!decision || decision.cueIndex !== cue.index) {
      throw new ReconstructionInvariantError(
        `Decision ${position + 1} does not belong to cue ${cue.index}.`,
        { cueIndex: cue.index }
      );
    }

    if (decision.decision === 'PRESERVE') {
      preserved += 1;
      return { index: cue.index, start: cue.start, end: cue.end, text: cue.text };
    }

    const result = results.get(cue.index);
    if (!result) {
      throw new ReconstructionInvariantError(
        `Cue ${cue.index} was marked for translation but has no result.`,
        { cueIndex: cue.index }
      );
    }

    if (result.kind === 'unresolved') {
      unresolved.push(result);
      return { index: cue.index, start: cue.start, end: cue.end, text: cue.text };
    }

    translated += 1;
    return { index: cue.index, start: cue.start, end: cue.end, text: result.text };
  });

  assertAligned(original, cues);

  return {
    track: { language: targetLanguage, cues },
    report: {
      cueCount: cues.length,
      preserved,
      translated,
      unresolved: unresolved.length,
      unresolvedCueIndices: unresolved.map((unit) => unit.cueIndex)
    },
    unresolved
  };
}
