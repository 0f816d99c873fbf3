import stopwordTable from '@/config/language-stopwords.json';
import {
  UNKNOWN_LANGUAGE,
  type ClassificationResult,
  type Cue,
  type LanguageGuess
} from '@/services/subtitle-translation/types';

type ScriptName =
  | 'Latin'
  | 'Cyrillic'
  | 'Greek'
  | 'Hebrew'
  | 'Arabic'
  | 'Han'
  | 'Kana'
  | 'Hangul'
  | 'Thai'
  | 'Devanagari'
  | 'Other';

const SCRIPT_PATTERNS: Array<[Exclude<ScriptName, 'Other'>, RegExp]> = [
  ['Latin', /\p{Script=Latin}/u],
  ['Cyrillic', /\p{Script=Cyrillic}/u],
  ['Greek', /\p{Script=Greek}/u],
  ['Hebrew', /\p{Script=Hebrew}/u],
  ['Arabic', /\p{Script=Arabic}/u],
  ['Han', /\p{Script=Han}/u],
  ['Kana', /[\p{Script=Hiragana}\p{Script=Katakana}]/u],
  ['Hangul', /\p{Script=Hangul}/u],
  ['Thai', /\p{Script=Thai}/u],
  ['Devanagari', /\p{Script=Devanagari}/u]
];

/** Scripts that identify a single language on their own. */
const SCRIPT_LANGUAGE: Partial<Record<ScriptName, string>> = {
  Greek: 'el',
  Hebrew: 'he',
  Arabic: 'ar',
  Han: 'zh',
  Kana: 'ja',
  Hangul: 'ko',
  Thai: 'th',
  Devanagari: 'hi'
};

const LANGUAGE_SCRIPT: Record<string, ScriptName> = {
  el: 'Greek',
  he: 'Hebrew',
  yi: 'Hebrew',
  ar: 'Arabic',
  fa: 'Arabic',
  ur: 'Arabic',
  zh: 'Han',
  ja: 'Kana',
  ko: 'Hangul',
  th: 'Thai',
  hi: 'Devanagari',
  mr: 'Devanagari',
  ne: 'Devanagari',
  ru: 'Cyrillic',
  uk: 'Cyrillic',
  be: 'Cyrillic',
  bg: 'Cyrillic'
};

const TAG_ALIASES: Record<string, string> = {
  iw: 'he',
  ji: 'yi',
  in: 'id',
  eng: 'en',
  english: 'en',
  ger: 'de',
  deu: 'de',
  german: 'de',
  heb: 'he',
  hebrew: 'he'
};

const LETTER = /\p{L}/u;
const WORD = /[\p{L}\p{M}]+/gu;
const SHORT_TEXT_WORDS = 3;
const SHORT_TEXT_PENALTY = 0.8;

interface WordProfile {
  language: string;
  script: ScriptName;
  markers: Set<string>;
  words: Set<string>;
}

function isWordScript(value: string): value is ScriptName {
  return value === 'Latin' || value === 'Cyrillic';
}

const WORD_PROFILES: WordProfile[] = stopwordTable.languages.flatMap((entry) =>
  isWordScript(entry.script)
    ? [
        {
          language: entry.language,
          script: entry.script,
          markers: new Set(Array.from(entry.markers)),
          words: new Set(entry.words)
        }
      ]
    : []
);

interface ParsedBcp47 {
  language: string;
  script?: string;
}

export function parseBcp47(value: string): ParsedBcp47 {
  const parts = value.trim().split(/[-_]/).filter(Boolean);
  const language = (parts[0] ?? '').toLowerCase();

  let script: string | undefined;
  for (const part of parts.slice(1)) {
    if (part.length === 4) {
      script = part.toLowerCase();
      break;
    }
  }

  return { language, script };
}

export function normalizeLanguageTag(value: string): string {
  const { language } = parseBcp47(value);
  if (!language) {
    return UNKNOWN_LANGUAGE;
  }
  return TAG_ALIASES[language] ?? language;
}

export function isSameLanguage(a: string, b: string): boolean {
  const left = normalizeLanguageTag(a);
  const right = normalizeLanguageTag(b);
  return left !== UNKNOWN_LANGUAGE && left === right;
}

function stripMarkup(text: string): string {
  return text.replace(/<[^>]*>/g, ' ').replace(/\{\\[^}]*\}/g, ' ');
}

function scriptOf(char: string): ScriptName {
  for (const [name, pattern] of SCRIPT_PATTERNS) {
    if (pattern.test(char)) {
      return name;
    }
  }
  return 'Other';
}

function countScripts(text: string): Map<ScriptName, number> {
  const counts = new Map<ScriptName, number>();
  for (const char of text) {
    if (!LETTER.test(char)) {
      continue;
    }
    const script = scriptOf(char);
    counts.set(script, (counts.get(script) ?? 0) + 1);
  }
  return counts;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function classifyByScript(script: ScriptName, letters: number, share: number): LanguageGuess {
  const language = SCRIPT_LANGUAGE[script] ?? UNKNOWN_LANGUAGE;
  if (language === UNKNOWN_LANGUAGE) {
    return { language, confidence: 0 };
  }
  const evidence = Math.min(1, 0.5 + letters / 10);
  return { language, confidence: round(share * evidence) };
}

function classifyByWords(text: string, script: ScriptName, share: number): LanguageGuess {
  const tokens = (text.toLowerCase().match(WORD) ?? []).filter(
    (token) => scriptOf(token[0] ?? '') === script
  );
  const chars = new Set(Array.from(text.toLowerCase()));

  let best: { language: string; score: number } | undefined;
  let total = 0;

  for (const profile of WORD_PROFILES) {
    if (profile.script !== script) {
      continue;
    }

    let score = tokens.filter((token) => profile.words.has(token)).length;
    for (const marker of profile.markers) {
      if (chars.has(marker)) {
        score += 1;
      }
    }

    total += score;
    if (score > 0 && (!best || score > best.score)) {
      best = { language: profile.language, score };
    }
  }

  if (!best) {
    return { language: UNKNOWN_LANGUAGE, confidence: 0 };
  }

  const dominance = best.score / total;
  const evidence = best.score / (best.score + 1);
  const lengthFactor = tokens.length < SHORT_TEXT_WORDS ? SHORT_TEXT_PENALTY : 1;
  return { language: best.language, confidence: round(share * dominance * evidence * lengthFactor) };
}

/**
 * Best-guess language of a piece of subtitle text. Deterministic: the same
 * text always yields the same guess. Text without letters is `unknown` with
 * zero confidence; mixed-script text returns the dominant script's language
 * scaled by that script's share of the letters.
 */
export function classifyText(text: string): LanguageGuess {
  const cleaned = stripMarkup(text);
  const counts = countScripts(cleaned);

  let letters = 0;
  for (const count of counts.values()) {
    letters += count;
  }
  if (letters === 0) {
    return { language: UNKNOWN_LANGUAGE, confidence: 0 };
  }

  // Japanese mixes kana with Han ideographs; count both as one script.
  const kana = counts.get('Kana') ?? 0;
  if (kana > 0) {
    counts.set('Kana', kana + (counts.get('Han') ?? 0));
    counts.delete('Han');
  }

  let dominant: ScriptName = 'Other';
  let dominantCount = 0;
  for (const [script, count] of counts) {
    if (count > dominantCount) {
      dominant = script;
      dominantCount = count;
    }
  }

  const share = dominantCount / letters;
  if (dominant === 'Latin' || dominant === 'Cyrillic') {
    return classifyByWords(cleaned, dominant, share);
  }
  return classifyByScript(dominant, dominantCount, share);
}

export function classifyCue(cue: Cue): ClassificationResult {
  const guess = classifyText(cue.text);
  return { cueIndex: cue.index, detectedLanguage: guess.language, confidence: guess.confidence };
}

/**
 * Whether `text` carries letters of the script the target language is written
 * in. Languages written in Latin script, or not listed, always pass.
 */
export function hasExpectedScript(text: string, targetLanguage: string): boolean {
  const expected = LANGUAGE_SCRIPT[normalizeLanguageTag(targetLanguage)];
  if (!expected) {
    return true;
  }

  const counts = countScripts(stripMarkup(text));
  if (expected === 'Kana') {
    return (counts.get('Kana') ?? 0) + (counts.get('Han') ?? 0) > 0;
  }
  return (counts.get(expected) ?? 0) > 0;
}

export function hasLetters(text: string): boolean {
  return LETTER.test(stripMarkup(text));
}
