import type { FileDiff } from "./types.js";

export const CHARS_PER_TOKEN = 4;
export const DEFAULT_MAX_TOKENS_PER_BATCH = 12_000;

export type BatchOutcome = {
  batches: FileDiff[][];
  /** Paths dropped because they would exceed the total token budget. */
  skipped: string[];
};

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Packs priority-ordered diffs into batches of at most `maxTokensPerBatch` estimated tokens.
 * A diff that is too large for any batch is sent on its own. With a finite `tokenBudget`, a diff
 * that would push the running total past the budget is dropped for good; later, smaller diffs
 * may still fit.
 */
export function batchDiffs(
  diffs: readonly FileDiff[],
  maxTokensPerBatch: number = DEFAULT_MAX_TOKENS_PER_BATCH,
  tokenBudget?: number,
): BatchOutcome {
  const batches: FileDiff[][] = [];
  const skipped: string[] = [];
  let current: FileDiff[] = [];
  let currentTokens = 0;
  let totalTokens = 0;

  const flush = () => {
    if (current.length > 0) {
      batches.push(current);
    }
    current = [];
    currentTokens = 0;
  };

  for (const diff of diffs) {
    const tokens = estimateTokens(diff.diff);

    if (tokenBudget !== undefined && totalTokens + tokens > tokenBudget) {
      skipped.push(diff.path);
      continue;
    }
    totalTokens += tokens;

    if (tokens > maxTokensPerBatch) {
      flush();
      batches.push([diff]);
      continue;
    }

    if (currentTokens + tokens > maxTokensPerBatch) {
      flush();
    }
    current.push(diff);
    currentTokens += tokens;
  }

  flush();

  return { batches, skipped };
}
