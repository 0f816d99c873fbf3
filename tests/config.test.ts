import assert from 'node:assert/strict';
import test from 'node:test';
import { getRuntimeWarnings } from '../src/config/env';
import { getTranslationEngineSettings } from '../src/config/translation-engine';
import {
  getDeepLSettings,
  getProviderPriority,
  orderCapabilities,
  PROVIDER_CAPABILITIES
} from '../src/config/translation-providers';
import { capability } from './helpers/fake-providers';
import { withEnv } from './helpers/temp-env';

test('engine settings fall back to defaults', async () => {
  await withEnv({}, async () => {
    assert.deepEqual(getTranslationEngineSettings(), {
      confidenceThreshold: 0.6,
      preserveNonSpeech: false,
      timestampDelimiter: ',',
      emitVtt: false,
      fileTimeoutMs: 600000,
      fileConcurrency: 4,
      retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000 }
    });
  });
});

test('engine settings read the environment and reject an out-of-range threshold', async () => {
  await withEnv(
    {
      SUBTITLE_PRESERVE_CONFIDENCE_THRESHOLD: '0.75',
      SUBTITLE_PRESERVE_NON_SPEECH: 'yes',
      SUBTITLE_TIMESTAMP_DELIMITER: '.',
      SUBTITLE_FILE_CONCURRENCY: '2.7',
      TRANSLATION_RETRY_MAX_ATTEMPTS: '5'
    },
    async () => {
      const settings = getTranslationEngineSettings();
      assert.equal(settings.confidenceThreshold, 0.75);
      assert.equal(settings.preserveNonSpeech, true);
      assert.equal(settings.timestampDelimiter, '.');
      assert.equal(settings.fileConcurrency, 2);
      assert.equal(settings.retry.maxAttempts, 5);
    }
  );

  await withEnv({ SUBTITLE_PRESERVE_CONFIDENCE_THRESHOLD: '1.5' }, async () => {
    assert.equal(getTranslationEngineSettings().confidenceThreshold, 0.6);
  });
});

test('provider priority comes from the environment, else the capability table', async () => {
  await withEnv({}, async () => {
    assert.deepEqual(getProviderPriority(), PROVIDER_CAPABILITIES.map((entry) => entry.provider));
  });
  await withEnv({ TRANSLATION_PROVIDER_PRIORITY: ' Microsoft, deepl ,' }, async () => {
    assert.deepEqual(getProviderPriority(), ['microsoft', 'deepl']);
  });
});

test('capabilities are ordered by priority with unlisted providers last in table order', () => {
  const ordered = orderCapabilities(
    [capability('deepl', ['de']), capability('microsoft', ['de']), capability('openrouter', ['de']), capability('mock', ['de'])],
    ['openrouter', 'deepl']
  );
  assert.deepEqual(
    ordered.map((entry) => entry.provider),
    ['openrouter', 'deepl', 'microsoft', 'mock']
  );
});

test('DeepL free-tier keys use the free API host', async () => {
  await withEnv({ DEEPL_API_KEY: 'test-secret:fx' }, async () => {
    assert.equal(getDeepLSettings().baseUrl, 'https://api-free.deepl.com');
  });
  await withEnv({ DEEPL_API_KEY: 'test-secret' }, async () => {
    assert.equal(getDeepLSettings().baseUrl, 'https://api.deepl.com');
  });
});

test('production without provider keys reports a runtime warning', async () => {
  await withEnv({ NODE_ENV: 'production' }, async () => {
    assert.equal(getRuntimeWarnings().length, 1);
  });
  await withEnv({ NODE_ENV: 'production', DEEPL_API_KEY: 'test-secret' }, async () => {
    assert.deepEqual(getRuntimeWarnings(), []);
  });
});
