import { formatTimestamp, toDisplayLines } from '@/services/subtitle-translation/srt';
import type { Track } from '@/services/subtitle-translation/types';

export function renderWebVtt(track: Track): string {
  const lines = ['WEBVTT', ''];
  for (const cue of track.cues) {
    lines.push(String(cue.index));
    lines.push(`${formatTimestamp(cue.start, '.')} --> ${formatTimestamp(cue.end, '.')}`);
    lines.push(...toDisplayLines(cue.text));
    lines.push('');
  }
  return `${lines.join('\n')}\n`;
}
