import pLimit from "p-limit";

import { batchDiffs } from "./batcher.js";
import type { SieveConfig } from "./config.js";
import { deduplicate } from "./dedup.js";
import type { Embedder } from "./embedder.js";
import { errorMessage } from "./errors.js";
import { filterDiffs } from "./filter.js";
import { getLogger } from "./logging.js";
import { prioritizeDiffs } from "./prioritize.js";
import type { ReviewCache } from "./reviewCache.js";
import { createScanResult, type FileDiff, type Issue, type ReviewBackend, type ScanResult } from "./types.js";

export type PipelineConfig = Pick<
  SieveConfig,
  "cacheThreshold" | "dedupThreshold" | "tokenBudget" | "maxTokensPerBatch" | "maxConcurrent" | "ignore"
>;

export type PipelineServices = {
  embedder: Embedder;
  cache: ReviewCache;
};

type PendingReview = {
  diff: FileDiff;
  embedding: number[];
};

/**
 * filter → prioritize → deduplicate → cache lookup → batch → concurrent review → cache store →
 * duplicate fan-out. Only the review stage runs concurrently; a failing batch contributes no
 * issues and leaves its siblings alone.
 */
export async function runPipeline(
  diffs: readonly FileDiff[],
  backend: ReviewBackend,
  config: PipelineConfig,
  services: PipelineServices,
): Promise<ScanResult> {
  const logger = getLogger();
  const result = createScanResult();

  const { reviewable, skipped } = filterDiffs(diffs, config.ignore);
  result.filesSkipped = skipped.length;
  result.skippedFiles = [...skipped];
  logger.info("Filtered diffs: %d reviewable, %d skipped", reviewable.length, skipped.length);

  if (reviewable.length === 0) {
    return result;
  }

  const prioritized = prioritizeDiffs(reviewable);

  const dedup = await deduplicate(
    prioritized,
    services.embedder,
    config.dedupThreshold ?? config.cacheThreshold,
  );
  for (const duplicates of dedup.groups.values()) {
    result.filesDeduped += duplicates.length;
  }
  logger.info("Deduplicated: %d unique, %d duplicates", dedup.unique.length, result.filesDeduped);

  const issues: Issue[] = [];
  const pending: PendingReview[] = [];
  for (const [index, diff] of dedup.unique.entries()) {
    const embedding = dedup.embeddings[index];
    const cached = await services.cache.query(embedding, config.cacheThreshold);
    if (cached) {
      // Cached findings came from a similar diff, possibly under another path.
      issues.push(...cached.map((issue) => ({ ...issue, file: diff.path })));
      result.cacheHits += 1;
      result.filesCached += 1;
      logger.debug("Cache hit for %s", diff.path);
    } else {
      pending.push({ diff, embedding });
    }
  }
  logger.info("Cache check: %d hits, %d misses", result.cacheHits, pending.length);

  const tokenBudget = config.tokenBudget > 0 ? config.tokenBudget : undefined;
  const { batches, skipped: budgetSkipped } = batchDiffs(
    pending.map((entry) => entry.diff),
    config.maxTokensPerBatch,
    tokenBudget,
  );
  result.skippedFiles.push(...budgetSkipped);
  result.filesScanned = reviewable.length - budgetSkipped.length;
  logger.info(
    "Batched %d file(s) into %d batch(es); %d over budget",
    pending.length - budgetSkipped.length,
    batches.length,
    budgetSkipped.length,
  );

  const reviewed = new Set<string>();
  const limit = pLimit(config.maxConcurrent);
  await Promise.all(
    batches.map((batch, index) =>
      limit(async () => {
        logger.debug("Reviewing batch %d (%d file(s))", index, batch.length);
        try {
          const batchIssues = await backend.review(batch);
          issues.push(...batchIssues);
          for (const diff of batch) {
            reviewed.add(diff.path);
          }
        } catch (error) {
          logger.error("Batch %d review failed: %s", index, errorMessage(error));
        }
      }),
    ),
  );

  for (const entry of pending) {
    if (!reviewed.has(entry.diff.path)) {
      continue;
    }
    const fileIssues = issues.filter((issue) => issue.file === entry.diff.path);
    try {
      await services.cache.store(entry.embedding, fileIssues, entry.diff.path);
    } catch (error) {
      logger.warn("Failed to cache review of %s: %s", entry.diff.path, errorMessage(error));
    }
  }

  const propagated: Issue[] = [];
  for (const [representative, duplicates] of dedup.groups) {
    const representativeIssues = issues.filter((issue) => issue.file === representative);
    for (const duplicate of duplicates) {
      for (const issue of representativeIssues) {
        propagated.push({ ...issue, file: duplicate });
      }
    }
  }

  result.issues = [...issues, ...propagated];
  return result;
}
