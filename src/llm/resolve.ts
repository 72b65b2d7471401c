import type { LlmConfig } from "../types.js";
import { getStoredApiKeyForProvider, loadUserLlmCredentials, loadUserLlmPreferences } from "../utils/userConfig.js";
import { envValue } from "../config/env.js";
import { parseProvider, parseProviderOrThrow, resolveLlmConfig } from "./provider.js";

export interface LlmOverrides {
  provider?: string;
  model?: string;
  apiKey?: string;
  maxTokens?: number;
}

/**
 * Flag > saved preference > environment > preset, for the provider, the
 * model and the API key alike.
 */
export async function resolveEffectiveLlmConfig(overrides: LlmOverrides): Promise<LlmConfig> {
  const prefs = await loadUserLlmPreferences();
  const provider = overrides.provider
    ? parseProviderOrThrow(overrides.provider)
    : prefs.defaultProvider || parseProvider(envValue("LLM_PROVIDER"));

  const base = resolveLlmConfig({
    provider,
    model: overrides.model || (provider ? prefs.modelByProvider[provider] : undefined),
    maxTokens: overrides.maxTokens,
  });

  const creds = await loadUserLlmCredentials();
  return {
    ...base,
    apiKey: overrides.apiKey || getStoredApiKeyForProvider(creds, base.provider) || base.apiKey,
  };
}
