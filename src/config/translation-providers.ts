import capabilityTable from '@/config/provider-capabilities.json';
import { readNumberEnv, readStringEnv } from '@/config/env';
import type { ProviderCapability } from '@/services/subtitle-translation/types';

const DEFAULT_DEEPL_BASE_URL = 'https://api.deepl.com';
const DEFAULT_DEEPL_FREE_BASE_URL = 'https://api-free.deepl.com';
const DEFAULT_MICROSOFT_BASE_URL = 'https://api.cognitive.microsofttranslator.com';
const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1/chat/completions';
const DEFAULT_OPENROUTER_MODEL = 'openai/gpt-4o-mini';

/** Default priority is table order. */
export const PROVIDER_CAPABILITIES: readonly ProviderCapability[] = capabilityTable.providers;

export function getProviderPriority(): string[] {
  const raw = readStringEnv('TRANSLATION_PROVIDER_PRIORITY');
  if (!raw) {
    return PROVIDER_CAPABILITIES.map((capability) => capability.provider);
  }
  return raw
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean);
}

/**
 * Capability entries in priority order. Providers missing from the priority
 * list keep their table order after it.
 */
export function orderCapabilities(
  capabilities: readonly ProviderCapability[],
  priority: readonly string[]
): ProviderCapability[] {
  const rank = (provider: string) => {
    const position = priority.indexOf(provider);
    return position < 0 ? priority.length : position;
  };
  return capabilities
    .map((capability, tableIndex) => ({ capability, tableIndex }))
    .sort(
      (a, b) =>
        rank(a.capability.provider) - rank(b.capability.provider) || a.tableIndex - b.tableIndex
    )
    .map((entry) => entry.capability);
}

export function getDeepLSettings() {
  const apiKey = readStringEnv('DEEPL_API_KEY');
  return {
    apiKey,
    // Free-tier keys end in ":fx" and live on a separate host.
    baseUrl:
      readStringEnv('DEEPL_BASE_URL') ??
      (apiKey?.endsWith(':fx') ? DEFAULT_DEEPL_FREE_BASE_URL : DEFAULT_DEEPL_BASE_URL),
    timeoutMs: readNumberEnv('DEEPL_TIMEOUT_MS', 30000)
  };
}

export function getMicrosoftTranslatorSettings() {
  return {
    apiKey: readStringEnv('MICROSOFT_TRANSLATOR_KEY'),
    region: readStringEnv('MICROSOFT_TRANSLATOR_REGION'),
    baseUrl: readStringEnv('MICROSOFT_TRANSLATOR_BASE_URL') ?? DEFAULT_MICROSOFT_BASE_URL,
    timeoutMs: readNumberEnv('MICROSOFT_TRANSLATOR_TIMEOUT_MS', 30000)
  };
}

export function getOpenRouterSettings() {
  return {
    apiKey: readStringEnv('OPENROUTER_API_KEY'),
    baseUrl: readStringEnv('OPENROUTER_BASE_URL') ?? DEFAULT_OPENROUTER_BASE_URL,
    model:
      readStringEnv('OPENROUTER_TRANSLATION_MODEL') ??
      readStringEnv('OPENROUTER_DEFAULT_MODEL') ??
      DEFAULT_OPENROUTER_MODEL,
    appName: readStringEnv('OPENROUTER_APP_NAME') ?? 'subtitle-translation-engine',
    siteUrl: readStringEnv('OPENROUTER_SITE_URL'),
    temperature: 0,
    maxTokens: readNumberEnv('OPENROUTER_TRANSLATION_MAX_TOKENS', 4000),
    timeoutMs: readNumberEnv('OPENROUTER_TIMEOUT_MS', 60000)
  };
}
