import assert from 'node:assert/strict';
import test from 'node:test';
import { decidePreservation } from '../../src/services/subtitle-translation/preservation-policy';
import type { ClassificationResult, Cue } from '../../src/services/subtitle-translation/types';

const OPTIONS = { confidenceThreshold: 0.6 };

function cue(text: string): Cue {
  return { index: 3, start: 1000, end: 2000, text };
}

function classified(detectedLanguage: string, confidence: number): ClassificationResult {
  return { cueIndex: 3, detectedLanguage, confidence };
}

test('a cue confidently in the target language is preserved (no over-translation)', () => {
  assert.deepEqual(decidePreservation(cue('Ich bin in Berlin geboren.'), classified('de', 0.9), 'de', OPTIONS), {
    cueIndex: 3,
    decision: 'PRESERVE',
    reason: 'target-language-match'
  });
});

test('target matching compares normalized tags', () => {
  const decision = decidePreservation(cue('Ich bin in Berlin geboren.'), classified('de', 0.9), 'de-AT', OPTIONS);
  assert.equal(decision.decision, 'PRESERVE');
});

test('a confidently foreign cue is translated (no under-translation)', () => {
  assert.deepEqual(decidePreservation(cue('Hello, how are you today?'), classified('en', 0.95), 'de', OPTIONS), {
    cueIndex: 3,
    decision: 'TRANSLATE',
    reason: 'language-mismatch'
  });
});

test('a target-language guess at or below the threshold is translated', () => {
  const decision = decidePreservation(cue('Ja.'), classified('de', 0.6), 'de', OPTIONS);
  assert.deepEqual(decision, { cueIndex: 3, decision: 'TRANSLATE', reason: 'low-confidence' });
});

test('unknown language defaults to translation', () => {
  const decision = decidePreservation(cue('Berlin'), classified('unknown', 0), 'de', OPTIONS);
  assert.deepEqual(decision, { cueIndex: 3, decision: 'TRANSLATE', reason: 'unknown-language' });
});

test('whitespace-only cues are preserved', () => {
  const decision = decidePreservation(cue('   '), classified('unknown', 0), 'de', OPTIONS);
  assert.deepEqual(decision, { cueIndex: 3, decision: 'PRESERVE', reason: 'empty-text' });
});

test('non-speech tokens are preserved only when enabled', () => {
  const music = cue('[Music]');
  assert.equal(
    decidePreservation(music, classified('unknown', 0), 'de', { ...OPTIONS, preserveNonSpeech: true }).reason,
    'non-speech'
  );
  assert.equal(decidePreservation(music, classified('unknown', 0), 'de', OPTIONS).reason, 'unknown-language');
});
