import assert from 'node:assert/strict';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { executeBatch } from '../../src/services/subtitle-translation/batch-executor';
import { ProviderTransientError } from '../../src/services/subtitle-translation/errors';
import { ProviderPool } from '../../src/services/subtitle-translation/provider-pool';
import { TranslationRouter } from '../../src/services/subtitle-translation/router';
import {
  JsonTranslationMemory,
  type TranslationMemory,
  type TranslationMemoryEntry
} from '../../src/services/subtitle-translation/translation-memory';
import type { TranslationUnit } from '../../src/services/subtitle-translation/types';
import { capability, recordingSleep, ScriptedProvider, TEST_RETRY } from '../helpers/fake-providers';

function routerFor(providers: ScriptedProvider[], languages: string[] = ['de']) {
  const { sleep } = recordingSleep();
  const pool = new ProviderPool({
    providers,
    capabilities: providers.map((provider) => capability(provider.id, languages)),
    sleep
  });
  return new TranslationRouter({ pool, retry: TEST_RETRY, sleep });
}

function unit(cueIndex: number, sourceText: string, sourceLanguage = 'en'): TranslationUnit {
  return { cueIndex, sourceText, sourceLanguage, targetLanguage: 'de' };
}

test('a transient failure on cue 5 of 20 leaves only cue 5 unresolved', async () => {
  const provider = new ScriptedProvider('provider', (texts, _source, target) => {
    if (texts.includes('Line 5 of the interview.')) {
      throw new ProviderTransientError({ providerId: 'provider', message: 'timed out' });
    }
    return texts.map((text) => `[${target}] ${text}`);
  });
  const units = Array.from({ length: 20 }, (_, i) => unit(i + 1, `Line ${i + 1} of the interview.`));

  const results = await executeBatch(units, { router: routerFor([provider]) });

  assert.equal(results.size, 20);
  assert.deepEqual(results.get(5), {
    kind: 'unresolved',
    cueIndex: 5,
    sourceText: 'Line 5 of the interview.',
    attemptedProviders: ['provider'],
    reason: 'provider: timed out'
  });
  for (const [cueIndex, resolution] of results) {
    if (cueIndex === 5) continue;
    assert.deepEqual(resolution, {
      kind: 'translated',
      cueIndex,
      text: `[de] Line ${cueIndex} of the interview.`,
      providerId: 'provider',
      fromMemory: false
    });
  }
});

test('identical source texts are translated once and fanned out', async () => {
  const provider = new ScriptedProvider('provider');
  const units = [unit(1, 'Yes.'), unit(2, 'No.'), unit(3, 'Yes.'), unit(4, 'Yes.')];

  const results = await executeBatch(units, { router: routerFor([provider]) });

  assert.deepEqual(provider.calls.map((call) => call.texts), [['Yes.', 'No.']]);
  assert.deepEqual([...results.keys()], [1, 2, 3, 4]);
  assert.deepEqual(results.get(4), {
    kind: 'translated',
    cueIndex: 4,
    text: '[de] Yes.',
    providerId: 'provider',
    fromMemory: false
  });
});

test('units are grouped by language pair so one call never mixes source languages', async () => {
  const provider = new ScriptedProvider('provider');
  const units = [unit(1, 'Hello', 'en'), unit(2, 'Bonjour', 'fr'), unit(3, 'Goodbye', 'en-GB')];

  const results = await executeBatch(units, { router: routerFor([provider]) });

  assert.equal(results.size, 3);
  assert.deepEqual(
    provider.calls.map((call) => [call.sourceLanguage, call.texts]).sort(),
    [
      ['en', ['Hello', 'Goodbye']],
      ['fr', ['Bonjour']]
    ]
  );
});

test('translation memory answers repeated work without provider calls', async () => {
  const root = await mkdtemp(path.join(os.tmpdir(), 'subtitle-engine-memory-'));
  try {
    const memory = new JsonTranslationMemory(path.join(root, 'memory.json'));
    const units = [unit(1, 'Good morning'), unit(2, 'Thank you')];

    const firstProvider = new ScriptedProvider('first');
    await executeBatch(units, { router: routerFor([firstProvider]), memory });

    const secondProvider = new ScriptedProvider('second');
    const results = await executeBatch([...units, unit(3, 'Goodbye')], {
      router: routerFor([secondProvider]),
      memory
    });

    assert.equal(firstProvider.calls.length, 1);
    assert.deepEqual(secondProvider.calls.map((call) => call.texts), [['Goodbye']]);
    assert.deepEqual(results.get(2), {
      kind: 'translated',
      cueIndex: 2,
      text: '[de] Thank you',
      providerId: 'first',
      fromMemory: true
    });
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});

test('unresolved units are not stored in translation memory', async () => {
  const root = await mkdtemp(path.join(os.tmpdir(), 'subtitle-engine-memory-'));
  try {
    const memory = new JsonTranslationMemory(path.join(root, 'memory.json'));
    const failing = new ScriptedProvider('failing', () => {
      throw new ProviderTransientError({ providerId: 'failing', message: 'down' });
    });

    await executeBatch([unit(1, 'Hello')], { router: routerFor([failing]), memory });
    const found = await memory.lookup([unit(1, 'Hello')]);

    assert.equal(found.size, 0);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
});

test('a translation memory that cannot save still returns the fresh translations', async () => {
  const saved: string[][] = [];
  const readOnlyMemory: TranslationMemory = {
    lookup: async () => new Map<string, TranslationMemoryEntry>(),
    save: async (entries) => {
      saved.push(entries.map(({ unit }) => unit.sourceText));
      throw new Error('EROFS: read-only file system');
    }
  };
  const provider = new ScriptedProvider('provider');

  const results = await executeBatch([unit(1, 'Good morning'), unit(2, 'Thank you')], {
    router: routerFor([provider]),
    memory: readOnlyMemory
  });

  assert.deepEqual(saved, [['Good morning', 'Thank you']]);
  assert.deepEqual(results.get(1), {
    kind: 'translated',
    cueIndex: 1,
    text: '[de] Good morning',
    providerId: 'provider',
    fromMemory: false
  });
  assert.equal(results.get(2)?.kind, 'translated');
});
