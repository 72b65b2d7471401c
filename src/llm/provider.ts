import { envValue } from "../config/env.js";
import type { LlmConfig, LlmProviderType } from "../types.js";

export interface LlmMessage {
  role: "system" | "user";
  content: string;
}

export interface LlmProvider {
  complete(messages: LlmMessage[]): Promise<string>;
}

export type FetchLike = typeof fetch;

export const SUPPORTED_LLM_PROVIDERS: LlmProviderType[] = [
  "openai",
  "anthropic",
  "gemini",
  "ollama",
  "openai-compatible",
];

export const CLI_MAX_TOKENS = 4096;
export const PR_MAX_TOKENS = 2000;

interface ProviderPreset {
  model: string;
  baseUrl: string;
  apiKeyEnvKeys: string[];
  requiresApiKey: boolean;
  transport: "openai" | "anthropic";
}

const PROVIDER_PRESETS: Record<LlmProviderType, ProviderPreset> = {
  openai: {
    model: "gpt-4o",
    baseUrl: "https://api.openai.com/v1",
    apiKeyEnvKeys: ["LLM_API_KEY", "OPENAI_API_KEY"],
    requiresApiKey: true,
    transport: "openai",
  },
  anthropic: {
    model: "claude-sonnet-4-5",
    baseUrl: "https://api.anthropic.com/v1",
    apiKeyEnvKeys: ["LLM_API_KEY", "ANTHROPIC_API_KEY"],
    requiresApiKey: true,
    transport: "anthropic",
  },
  gemini: {
    model: "gemini-2.5-pro",
    baseUrl: "https://generativelanguage.googleapis.com/v1beta/openai",
    apiKeyEnvKeys: ["LLM_API_KEY", "GEMINI_API_KEY", "GOOGLE_API_KEY"],
    requiresApiKey: true,
    transport: "openai",
  },
  ollama: {
    model: "qwen2.5-coder",
    baseUrl: "http://localhost:11434/v1",
    apiKeyEnvKeys: ["LLM_API_KEY", "OLLAMA_API_KEY"],
    requiresApiKey: false,
    transport: "openai",
  },
  "openai-compatible": {
    model: "gpt-4o",
    baseUrl: "https://api.openai.com/v1",
    apiKeyEnvKeys: ["LLM_API_KEY"],
    requiresApiKey: true,
    transport: "openai",
  },
};

export function getProviderPreset(provider: LlmProviderType): ProviderPreset {
  return PROVIDER_PRESETS[provider];
}

export function providerRequiresApiKey(provider: LlmProviderType): boolean {
  return PROVIDER_PRESETS[provider].requiresApiKey;
}

export function isSupportedProvider(value: string): value is LlmProviderType {
  return SUPPORTED_LLM_PROVIDERS.some((provider) => provider === value);
}

export function parseProvider(value?: string): LlmProviderType | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return isSupportedProvider(normalized) ? normalized : undefined;
}

export function parseProviderOrThrow(value: string): LlmProviderType {
  const provider = parseProvider(value);
  if (!provider) {
    throw new Error(`Unknown LLM provider '${value}'. Use one of: ${SUPPORTED_LLM_PROVIDERS.join(", ")}.`);
  }
  return provider;
}

export function resolveProviderApiKey(provider: LlmProviderType): string | undefined {
  for (const key of PROVIDER_PRESETS[provider].apiKeyEnvKeys) {
    const value = envValue(key);
    if (value) return value;
  }
  return undefined;
}

/**
 * A provider is usable when it either has a key or runs without one.
 * Demo mode is chosen when this is false.
 */
export function hasUsableCredentials(config: LlmConfig): boolean {
  return Boolean(config.apiKey) || !providerRequiresApiKey(config.provider);
}

export class OpenAiCompatibleProvider implements LlmProvider {
  constructor(
    private readonly config: LlmConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async complete(messages: LlmMessage[]): Promise<string> {
    if (providerRequiresApiKey(this.config.provider) && !this.config.apiKey) {
      throw new Error("API key is missing for selected LLM provider.");
    }

    const endpoint = `${this.config.baseUrl.replace(/\/$/, "")}/chat/completions`;
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const response = await this.fetchImpl(endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        messages,
      }),
    });

    if (!response.ok) {
      throw await requestError(response);
    }

    const json = (await response.json()) as {
      choices?: Array<{ message?: { content?: string | null } }>;
    };

    const content = json.choices?.[0]?.message?.content;
    if (!content) {
      throw new Error("LLM response did not include message content.");
    }

    return content;
  }
}

export class AnthropicProvider implements LlmProvider {
  constructor(
    private readonly config: LlmConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async complete(messages: LlmMessage[]): Promise<string> {
    if (!this.config.apiKey) {
      throw new Error("ANTHROPIC_API_KEY (or LLM_API_KEY) is missing for Anthropic provider.");
    }

    const endpoint = `${this.config.baseUrl.replace(/\/$/, "")}/messages`;
    const system = messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n")
      .trim();

    const userContent = messages
      .filter((m) => m.role !== "system")
      .map((m) => m.content)
      .join("\n\n")
      .trim();

    const response = await this.fetchImpl(endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        ...(system ? { system } : {}),
        messages: [{ role: "user", content: userContent }],
      }),
    });

    if (!response.ok) {
      throw await requestError(response);
    }

    const json = (await response.json()) as {
      content?: Array<{ type?: string; text?: string }>;
    };

    const text = (json.content || [])
      .filter((chunk) => chunk.type === "text" && chunk.text)
      .map((chunk) => chunk.text || "")
      .join("\n")
      .trim();

    if (!text) {
      throw new Error("LLM response did not include text content.");
    }

    return text;
  }
}

export function createLlmProvider(config: LlmConfig, fetchImpl: FetchLike = fetch): LlmProvider {
  if (PROVIDER_PRESETS[config.provider].transport === "anthropic") {
    return new AnthropicProvider(config, fetchImpl);
  }
  return new OpenAiCompatibleProvider(config, fetchImpl);
}

export function resolveLlmConfig(input: {
  provider?: LlmProviderType;
  model?: string;
  baseUrl?: string;
  apiKey?: string;
  maxTokens?: number;
}): LlmConfig {
  const provider = input.provider || parseProvider(envValue("LLM_PROVIDER")) || "openai";
  const preset = getProviderPreset(provider);
  const envBaseUrl = provider === "openai-compatible" || provider === "ollama" ? envValue("LLM_BASE_URL") : undefined;
  return {
    provider,
    model: input.model || envValue("LLM_MODEL") || preset.model,
    baseUrl: input.baseUrl || envBaseUrl || preset.baseUrl,
    apiKey: input.apiKey || resolveProviderApiKey(provider),
    maxTokens: input.maxTokens ?? CLI_MAX_TOKENS,
  };
}

async function requestError(response: Response): Promise<Error> {
  const body = await response.text().catch(() => "");
  const parsed = parseErrorPayload(body);
  const code = parsed?.code || parsed?.type;
  const detail = parsed?.message || body || "unknown error";
  return new Error(`LLM request failed (${response.status}${code ? ` ${code}` : ""}): ${detail.slice(0, 400)}`);
}

function parseErrorPayload(body: string): { message?: string; type?: string; code?: string } | null {
  if (!body) return null;
  try {
    const parsed = JSON.parse(body) as {
      error?: { message?: string; type?: string; code?: string };
      message?: string;
      type?: string;
      code?: string;
    };
    const source = parsed.error || parsed;
    return {
      message: source.message,
      type: source.type,
      code: source.code,
    };
  } catch {
    return null;
  }
}
