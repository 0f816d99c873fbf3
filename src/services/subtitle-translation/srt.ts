import { MalformedTrackError } from '@/services/subtitle-translation/errors';
import type {
  Cue,
  ParsedTrack,
  ParseWarning,
  ParseWarningCode,
  TimestampDelimiter,
  Track
} from '@/services/subtitle-translation/types';

const TIMESTAMP_PATTERN = /^(\d{2,}):([0-5]\d):([0-5]\d)[,.](\d{3})$/;
const VTT_METADATA_BLOCK = /^(NOTE|STYLE|REGION)(\s|$)/;

interface RawBlock {
  number: number;
  firstLine: number;
  lines: string[];
}

export function parseTimestamp(value: string): number | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const hours = Number.parseInt(match[1] ?? '0', 10);
  const minutes = Number.parseInt(match[2] ?? '0', 10);
  const seconds = Number.parseInt(match[3] ?? '0', 10);
  const millis = Number.parseInt(match[4] ?? '0', 10);
  return ((hours * 60 + minutes) * 60 + seconds) * 1000 + millis;
}

export function formatTimestamp(totalMs: number, delimiter: TimestampDelimiter = ','): string {
  const clamped = Math.max(0, Math.round(totalMs));
  const hours = Math.floor(clamped / 3_600_000)
    .toString()
    .padStart(2, '0');
  const minutes = Math.floor((clamped % 3_600_000) / 60_000)
    .toString()
    .padStart(2, '0');
  const seconds = Math.floor((clamped % 60_000) / 1000)
    .toString()
    .padStart(2, '0');
  const milliseconds = (clamped % 1000).toString().padStart(3, '0');
  return `${hours}:${minutes}:${seconds}${delimiter}${milliseconds}`;
}

/** Display lines of a cue; blank lines would split the block on re-read, so they are dropped. */
export function toDisplayLines(text: string): string[] {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .filter((line) => line.trim() !== '');
}

function splitBlocks(raw: string): RawBlock[] {
  const lines = raw.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');
  const blocks: RawBlock[] = [];

  let i = 0;
  while (i < lines.length) {
    if ((lines[i] ?? '').trim() === '') {
      i += 1;
      continue;
    }

    const firstLine = i + 1;
    const blockLines: string[] = [];
    while (i < lines.length && (lines[i] ?? '').trim() !== '') {
      blockLines.push(lines[i] ?? '');
      i += 1;
    }
    blocks.push({ number: blocks.length + 1, firstLine, lines: blockLines });
  }

  return blocks;
}

function findTimingLine(lines: string[]): number {
  const first = (lines[0] ?? '').trim();
  if (first.includes('-->')) {
    return 0;
  }
  // The line before the timing is either a numeric index or a WebVTT cue identifier.
  if (lines.length > 1 && (lines[1] ?? '').includes('-->')) {
    return 1;
  }
  return -1;
}

function parseTimingLine(line: string): { start: number; end: number } | null {
  const parts = line.split('-->');
  if (parts.length !== 2) {
    return null;
  }

  const start = parseTimestamp(parts[0] ?? '');
  // Anything after the end timestamp is a WebVTT cue setting.
  const end = parseTimestamp((parts[1] ?? '').trim().split(/\s+/)[0] ?? '');
  if (start === null || end === null) {
    return null;
  }
  return { start, end };
}

export function parseSubtitleTrack(
  raw: string,
  opts: { language: string; strict?: boolean }
): ParsedTrack {
  const blocks = splitBlocks(raw);
  const warnings: ParseWarning[] = [];
  const cues: Cue[] = [];
  let cueBlocks = 0;
  let previousStart = 0;

  const reject = (block: RawBlock, code: ParseWarningCode, message: string) => {
    if (opts.strict) {
      throw new MalformedTrackError(`Block ${block.number} (line ${block.firstLine}): ${message}`, {
        blockNumber: block.number
      });
    }
    warnings.push({ blockNumber: block.number, line: block.firstLine, code, message });
  };

  for (const block of blocks) {
    const head = (block.lines[0] ?? '').trim();
    if (block.number === 1 && head.startsWith('WEBVTT')) {
      continue;
    }
    if (VTT_METADATA_BLOCK.test(head) && !head.includes('-->')) {
      continue;
    }

    cueBlocks += 1;
    const timingAt = findTimingLine(block.lines);
    if (timingAt < 0) {
      reject(block, 'MISSING_TIMING', 'cue block has no timing line');
      continue;
    }

    const timing = parseTimingLine(block.lines[timingAt] ?? '');
    if (!timing) {
      const line = (block.lines[timingAt] ?? '').trim();
      reject(block, 'INVALID_TIMESTAMP', `unreadable timing line "${line}"`);
      continue;
    }

    if (timing.end < timing.start) {
      reject(
        block,
        'END_BEFORE_START',
        `end ${formatTimestamp(timing.end)} precedes start ${formatTimestamp(timing.start)}`
      );
      continue;
    }

    if (cues.length > 0 && timing.start < previousStart) {
      warnings.push({
        blockNumber: block.number,
        line: block.firstLine,
        code: 'OUT_OF_ORDER',
        message:
          `start ${formatTimestamp(timing.start)} ` +
          `precedes previous start ${formatTimestamp(previousStart)}`
      });
    }

    cues.push({
      index: cues.length + 1,
      start: timing.start,
      end: timing.end,
      text: block.lines.slice(timingAt + 1).join('\n')
    });
    previousStart = timing.start;
  }

  if (cueBlocks > 0 && cues.length === 0) {
    throw new MalformedTrackError(`No readable cues in ${cueBlocks} block(s).`);
  }

  return { track: { language: opts.language, cues }, warnings };
}

export function writeSubtitleTrack(
  track: Track,
  opts?: { delimiter?: TimestampDelimiter }
): string {
  const delimiter = opts?.delimiter ?? ',';
  const blocks = track.cues.map((cue) =>
    [
      String(cue.index),
      `${formatTimestamp(cue.start, delimiter)} --> ${formatTimestamp(cue.end, delimiter)}`,
      ...toDisplayLines(cue.text)
    ].join('\n')
  );

  return blocks.length === 0 ? '' : `${blocks.join('\n\n')}\n`;
}
