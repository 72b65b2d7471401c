import { parseProviderOrThrow } from "../llm/provider.js";
import { getUiRuntime } from "../ui/runtime.js";
import {
  configDir,
  loadUserLlmCredentials,
  loadUserLlmPreferences,
  upsertProviderApiKey,
  upsertProviderModelPreference,
} from "../utils/userConfig.js";

export interface ConfigCliOptions {
  provider?: string;
  model?: string;
  apiKey?: string;
  show?: boolean;
}

export async function configCommand(cli: ConfigCliOptions): Promise<void> {
  const { renderer } = getUiRuntime();

  if (cli.model && !cli.provider) {
    throw new Error("--model needs --provider so the model is stored for the right provider.");
  }
  if (cli.apiKey && !cli.provider) {
    throw new Error("--api-key needs --provider so the key is stored for the right provider.");
  }

  if (cli.provider) {
    const provider = parseProviderOrThrow(cli.provider);
    await upsertProviderModelPreference(provider, cli.model);
    renderer.ok(`Default provider set to ${provider}${cli.model ? ` (model ${cli.model})` : ""}`);
    if (cli.apiKey) {
      await upsertProviderApiKey(provider, cli.apiKey.trim());
      renderer.ok(`API key saved for ${provider}`);
    }
  }

  if (cli.show || !cli.provider) {
    const prefs = await loadUserLlmPreferences();
    const creds = await loadUserLlmCredentials();
    renderer.section(`Config directory: ${configDir()}`);
    renderer.bulletList([
      `Default provider: ${prefs.defaultProvider || "(not set)"}`,
      ...Object.entries(prefs.modelByProvider).map(([provider, model]) => `Model for ${provider}: ${model}`),
      ...Object.keys(creds.apiKeyByProvider).map((provider) => `API key stored for ${provider}`),
    ]);
  }
}
