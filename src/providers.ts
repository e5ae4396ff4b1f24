import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";

import { PromptReviewBackend, REVIEW_TEMPERATURE } from "./backend.js";
import { ConfigurationError } from "./errors.js";
import type { CheckCategory, ProviderId } from "./types.js";

export const PROVIDER_DEFAULTS: Record<ProviderId, string> = {
  openai: "gpt-4o",
  anthropic: "claude-sonnet-4-20250514",
  xai: "grok-3",
  gemini: "gemini-2.0-flash",
  deepseek: "deepseek-chat",
  mistral: "mistral-large-latest",
};

export const PROVIDER_NAMES: Record<ProviderId, string> = {
  openai: "OpenAI",
  anthropic: "Anthropic",
  xai: "xAI",
  gemini: "Google Gemini",
  deepseek: "DeepSeek",
  mistral: "Mistral",
};

export const API_KEY_ENV: Record<ProviderId, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  xai: "XAI_API_KEY",
  gemini: "GEMINI_API_KEY",
  deepseek: "DEEPSEEK_API_KEY",
  mistral: "MISTRAL_API_KEY",
};

// OpenAI-compatible chat endpoints; undefined means the SDK default.
const OPENAI_COMPATIBLE_BASE_URLS: Record<Exclude<ProviderId, "anthropic">, string | undefined> = {
  openai: undefined,
  xai: "https://api.x.ai/v1",
  gemini: "https://generativelanguage.googleapis.com/v1beta/openai/",
  deepseek: "https://api.deepseek.com",
  mistral: "https://api.mistral.ai/v1",
};

const ANTHROPIC_MAX_TOKENS = 4096;

export type ProviderOptions = {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
};

export function resolveApiKey(
  provider: ProviderId,
  configured: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const apiKey = configured ?? env[API_KEY_ENV[provider]];
  if (!apiKey) {
    throw new ConfigurationError(
      `${PROVIDER_NAMES[provider]} API key not provided. Set ${API_KEY_ENV[provider]} or "apiKey" in the config file.`,
    );
  }
  return apiKey;
}

export class OpenAICompatibleBackend extends PromptReviewBackend {
  readonly label: string;
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(
    provider: Exclude<ProviderId, "anthropic">,
    categories: readonly CheckCategory[],
    options: ProviderOptions,
  ) {
    super(categories);
    this.model = options.model ?? PROVIDER_DEFAULTS[provider];
    this.label = `${PROVIDER_NAMES[provider]} (${this.model})`;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: OPENAI_COMPATIBLE_BASE_URLS[provider],
      timeout: options.timeoutMs,
    });
  }

  protected async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      temperature: REVIEW_TEMPERATURE,
    });
    return response.choices[0]?.message?.content ?? "";
  }
}

export class AnthropicBackend extends PromptReviewBackend {
  readonly label: string;
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(categories: readonly CheckCategory[], options: ProviderOptions) {
    super(categories);
    this.model = options.model ?? PROVIDER_DEFAULTS.anthropic;
    this.label = `${PROVIDER_NAMES.anthropic} (${this.model})`;
    this.client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs });
  }

  protected async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: ANTHROPIC_MAX_TOKENS,
      system: systemPrompt,
      messages: [{ role: "user", content: userPrompt }],
      temperature: REVIEW_TEMPERATURE,
    });

    const texts: string[] = [];
    for (const block of response.content) {
      if (block.type === "text") {
        texts.push(block.text);
      }
    }
    return texts.join("\n");
  }
}

export function createProviderBackend(
  provider: ProviderId,
  categories: readonly CheckCategory[],
  options: ProviderOptions,
): PromptReviewBackend {
  if (provider === "anthropic") {
    return new AnthropicBackend(categories, options);
  }
  return new OpenAICompatibleBackend(provider, categories, options);
}
