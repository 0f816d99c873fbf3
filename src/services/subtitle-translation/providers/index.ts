import { env } from '@/config/env';
import {
  getDeepLSettings,
  getMicrosoftTranslatorSettings,
  getOpenRouterSettings
} from '@/config/translation-providers';
import { DeepLProvider } from '@/services/subtitle-translation/providers/deepl';
import { MicrosoftTranslatorProvider } from '@/services/subtitle-translation/providers/microsoft';
import { MockTranslationProvider } from '@/services/subtitle-translation/providers/mock';
import { OpenRouterTranslationProvider } from '@/services/subtitle-translation/providers/openrouter';
import type { TranslationProvider } from '@/services/subtitle-translation/providers/types';

export type { TranslationProvider } from '@/services/subtitle-translation/providers/types';

/**
 * Providers with credentials in the environment. Without any credentials the
 * mock provider is returned so local runs still produce output; production
 * never gets the mock and returns no provider at all.
 */
export function createConfiguredProviders(): TranslationProvider[] {
  const providers: TranslationProvider[] = [];

  const deepl = getDeepLSettings();
  if (deepl.apiKey) {
    providers.push(new DeepLProvider(deepl));
  }

  const microsoft = getMicrosoftTranslatorSettings();
  if (microsoft.apiKey) {
    providers.push(new MicrosoftTranslatorProvider(microsoft));
  }

  const openRouter = getOpenRouterSettings();
  if (openRouter.apiKey) {
    providers.push(new OpenRouterTranslationProvider(openRouter));
  }

  if (providers.length > 0) {
    return providers;
  }

  if (env.nodeEnv === 'production') {
    console.error(
      '[subtitle-translation][providers] No provider credentials configured in production; ' +
        'cues that need translation will stay unresolved.'
    );
    return providers;
  }

  console.warn(
    '[subtitle-translation][providers] No provider credentials configured; using mock provider.'
  );
  return [new MockTranslationProvider()];
}
