import assert from 'node:assert/strict';
import test from 'node:test';
import {
  createTranslationMemory,
  JsonTranslationMemory,
  translationMemoryKey
} from '../../src/services/subtitle-translation/translation-memory';
import type { TranslatedText, TranslationUnit } from '../../src/services/subtitle-translation/types';
import { withTempDataEnv } from '../helpers/temp-env';

function unit(sourceText: string, sourceLanguage = 'en', targetLanguage = 'de'): TranslationUnit {
  return { cueIndex: 1, sourceText, sourceLanguage, targetLanguage };
}

function translated(text: string, providerId = 'deepl'): TranslatedText {
  return { kind: 'translated', cueIndex: 1, text, providerId, fromMemory: false };
}

test('memory keys ignore cue position and regional subtags', () => {
  assert.equal(
    translationMemoryKey(unit('Thank you', 'en-GB', 'de-AT')),
    translationMemoryKey({ ...unit('Thank you'), cueIndex: 42 })
  );
  assert.notEqual(translationMemoryKey(unit('Thank you')), translationMemoryKey(unit('Thank you', 'en', 'fr')));
  assert.notEqual(translationMemoryKey(unit('Thank you')), translationMemoryKey(unit('Thank you!')));
});

test('saved translations are found again and stored with their provider', async () => {
  await withTempDataEnv('memory', async ({ memoryPath }) => {
    const memory = new JsonTranslationMemory(memoryPath);
    await memory.save([{ unit: unit('Thank you', 'en-GB'), translation: translated('Danke') }]);

    const found = await memory.lookup([unit('Thank you'), unit('Goodbye')]);
    const entry = found.get(translationMemoryKey(unit('Thank you')));

    assert.equal(found.size, 1);
    assert.equal(entry?.translatedText, 'Danke');
    assert.equal(entry?.providerId, 'deepl');
    assert.equal(entry?.sourceLanguage, 'en');
    assert.equal(typeof entry?.savedAt, 'string');
  });
});

test('concurrent saves are all kept', async () => {
  await withTempDataEnv('memory', async ({ memoryPath }) => {
    const memory = new JsonTranslationMemory(memoryPath);
    await Promise.all([
      memory.save([{ unit: unit('Yes'), translation: translated('Ja') }]),
      memory.save([{ unit: unit('No'), translation: translated('Nein', 'microsoft') }])
    ]);

    const found = await memory.lookup([unit('Yes'), unit('No')]);

    assert.equal(found.size, 2);
  });
});

test('the memory can be switched off through the environment', async () => {
  await withTempDataEnv('memory', async () => {
    assert.ok(createTranslationMemory() instanceof JsonTranslationMemory);
  });
  await withTempDataEnv(
    'memory',
    async () => {
      assert.equal(createTranslationMemory(), undefined);
    },
    { TRANSLATION_MEMORY_ENABLED: 'false' }
  );
});
