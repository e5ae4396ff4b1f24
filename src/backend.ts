import { getLogger } from "./logging.js";
import { buildReviewPrompt, buildSystemPrompt } from "./prompt.js";
import { parseReviewResponse } from "./reviewProcessing.js";
import type { CheckCategory, FileDiff, Issue, ReviewBackend } from "./types.js";

export const REVIEW_TEMPERATURE = 0.1;

/**
 * Shared review flow for chat-style models: one system instruction built from the enabled
 * check categories, one user message carrying the diffs, and lenient parsing of the reply.
 */
export abstract class PromptReviewBackend implements ReviewBackend {
  abstract readonly label: string;

  protected constructor(protected readonly categories: readonly CheckCategory[]) {}

  /** Sends one exchange to the model and returns its raw text. */
  protected abstract complete(systemPrompt: string, userPrompt: string): Promise<string>;

  async review(diffs: readonly FileDiff[]): Promise<Issue[]> {
    if (diffs.length === 0) {
      return [];
    }

    const system = buildSystemPrompt(this.categories);
    const user = buildReviewPrompt(diffs);

    getLogger().debug("Calling %s with %d file(s)", this.label, diffs.length);
    const raw = await this.complete(system, user);
    return parseReviewResponse(raw);
  }
}
