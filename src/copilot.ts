import OpenAI from "openai";

import { PromptReviewBackend, REVIEW_TEMPERATURE } from "./backend.js";
import { runCommand } from "./command.js";
import { ConfigurationError } from "./errors.js";
import { getLogger } from "./logging.js";
import type { CheckCategory } from "./types.js";

export const GITHUB_MODELS_URL = "https://models.inference.ai.azure.com";
export const DEFAULT_COPILOT_MODEL = "gpt-4o";

export type CopilotStatus = {
  available: boolean;
  token?: string;
  reason: string;
};

/** Looks for a GitHub token in `GITHUB_TOKEN`, then asks the gh CLI. */
export async function detectCopilot(env: NodeJS.ProcessEnv = process.env): Promise<CopilotStatus> {
  const logger = getLogger();
  const envToken = env.GITHUB_TOKEN?.trim();
  if (envToken) {
    logger.debug("Using GitHub token from GITHUB_TOKEN");
    return { available: true, token: envToken, reason: "GITHUB_TOKEN env" };
  }

  const stdout = await runCommand(["gh", "auth", "token"], { allowFailure: true, timeoutMs: 10_000 });
  const token = stdout?.trim();
  if (token) {
    logger.debug("Using GitHub token from gh CLI");
    return { available: true, token, reason: "gh auth token" };
  }

  return {
    available: false,
    reason: stdout === undefined ? "gh CLI not installed or not authenticated" : "gh CLI not authenticated",
  };
}

/** Reviews through the GitHub Models chat-completions API using the developer's GitHub token. */
export class CopilotBackend extends PromptReviewBackend {
  readonly label: string;
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(
    categories: readonly CheckCategory[],
    options: { token: string; model?: string; timeoutMs?: number },
  ) {
    super(categories);
    this.model = options.model ?? DEFAULT_COPILOT_MODEL;
    this.label = `Copilot (${this.model})`;
    this.client = new OpenAI({
      apiKey: options.token,
      baseURL: GITHUB_MODELS_URL,
      timeout: options.timeoutMs,
    });
  }

  static async create(
    categories: readonly CheckCategory[],
    options: { model?: string; timeoutMs?: number },
  ): Promise<CopilotBackend> {
    const status = await detectCopilot();
    if (!status.available || !status.token) {
      throw new ConfigurationError(
        `Copilot not available: ${status.reason}. Run \`gh auth login\` or set GITHUB_TOKEN.`,
      );
    }
    return new CopilotBackend(categories, { ...options, token: status.token });
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
