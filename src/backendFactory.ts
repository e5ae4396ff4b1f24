import { enabledCategories, type SieveConfig } from "./config.js";
import { CopilotBackend } from "./copilot.js";
import { ConfigurationError } from "./errors.js";
import { createProviderBackend, resolveApiKey } from "./providers.js";
import type { ReviewBackend } from "./types.js";

/**
 * Builds the review backend named by the config. Every setup problem surfaces here as a
 * `ConfigurationError`, before any diff is processed.
 */
export async function createReviewBackend(config: SieveConfig): Promise<ReviewBackend> {
  const categories = enabledCategories(config);
  if (categories.length === 0) {
    throw new ConfigurationError("No check categories are enabled in the config file.");
  }

  switch (config.agent) {
    case "copilot":
      return CopilotBackend.create(categories, {
        model: config.model,
        timeoutMs: config.requestTimeoutMs,
      });
    case "manual": {
      if (!config.provider) {
        throw new ConfigurationError(
          'Manual mode requires a provider. Set "provider" in the config file or run `reviewsieve init`.',
        );
      }
      return createProviderBackend(config.provider, categories, {
        apiKey: resolveApiKey(config.provider, config.apiKey),
        model: config.model,
        timeoutMs: config.requestTimeoutMs,
      });
    }
  }
}
