import path from "node:path";

import { createReviewBackend } from "./backendFactory.js";
import type { SieveConfig } from "./config.js";
import { createEmbedder } from "./embedder.js";
import { getAllDiff, getRepoRoot, getStagedDiff, parseUnifiedDiff } from "./git.js";
import { getLogger } from "./logging.js";
import { runPipeline } from "./pipeline.js";
import { generateReport } from "./report.js";
import { ReviewCache } from "./reviewCache.js";
import { createScanResult, type ScanResult } from "./types.js";

export type ScanOptions = {
  config: SieveConfig;
  scanAll?: boolean;
  cwd?: string;
};

export type ScanOutcome = {
  result: ScanResult;
  reportPath?: string;
};

/** Loads the diff, builds the backend and services from config, and runs one scan. */
export async function runScan(options: ScanOptions): Promise<ScanOutcome> {
  const logger = getLogger();
  const { config } = options;
  const repoRoot = await getRepoRoot(options.cwd);

  const diffText = options.scanAll ? await getAllDiff(repoRoot) : await getStagedDiff(repoRoot);
  const diffs = parseUnifiedDiff(diffText);
  if (diffs.length === 0) {
    logger.info("No changes to review.");
    return { result: createScanResult() };
  }

  // Configuration errors surface before any embedding work starts.
  const backend = await createReviewBackend(config);
  const embedder = createEmbedder(config);
  const cache = ReviewCache.open(config.cacheDir);
  logger.info("Reviewing %d changed file(s) with %s", diffs.length, backend.label);

  const result = await runPipeline(diffs, backend, config, { embedder, cache });

  const reportPath = generateReport(
    result,
    path.resolve(repoRoot, config.reportDir),
    config.reportFormat,
  );
  logger.debug("Report written to %s", reportPath);
  return { result, reportPath };
}
