#!/usr/bin/env node

import { existsSync } from "node:fs";
import path from "node:path";
import process from "node:process";

import { type CliOptions, parseArgs, redactConfig } from "./cli.js";
import { CONFIG_FILENAME, defaultConfig, loadConfig, saveConfig, type SieveConfig } from "./config.js";
import { detectCopilot } from "./copilot.js";
import { errorMessage, ReviewError } from "./errors.js";
import { getRepoRoot, hasStagedChanges } from "./git.js";
import { installHook, uninstallHook } from "./hooks.js";
import { createLogger, getLogger, resolveLogLevel, setLogger } from "./logging.js";
import { getLatestReport } from "./report.js";
import { ReviewCache } from "./reviewCache.js";
import { logScanSummary, shouldBlock } from "./reviewProcessing.js";
import { runScan } from "./runner.js";
import { formatElapsed } from "./utils.js";

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs();
  } catch (error) {
    console.error("[ERROR]", errorMessage(error));
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(resolveLogLevel(options));
  setLogger(logger);

  try {
    await dispatch(options);
  } catch (error) {
    const prefix = error instanceof ReviewError ? "" : "Unexpected error: ";
    logger.error(`${prefix}${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

async function dispatch(options: CliOptions): Promise<void> {
  switch (options.command) {
    case "scan":
      return scan(options);
    case "cache":
      return manageCache(options);
    case "report":
      return showLatestReport(options);
    case "init":
      return init(options);
    case "install-hook": {
      const hook = installHook(await getRepoRoot());
      getLogger().info("Installed pre-commit hook at %s", hook);
      return;
    }
    case "uninstall": {
      const removed = uninstallHook(await getRepoRoot());
      getLogger().info(removed ? "Removed pre-commit hook." : "No reviewsieve hook installed.");
      return;
    }
  }
}

function readConfig(options: CliOptions): SieveConfig {
  const config = loadConfig(options.config);
  getLogger().debug("Config:", JSON.stringify(redactConfig(config), null, 2));
  return config;
}

async function scan(options: CliOptions): Promise<void> {
  const logger = getLogger();
  const config = readConfig(options);

  if (!options.all && !(await hasStagedChanges())) {
    logger.info("No staged changes; nothing to review.");
    return;
  }

  const startTime = Date.now();
  const { result, reportPath } = await runScan({ config, scanAll: options.all });
  logScanSummary(result);
  if (reportPath) {
    logger.info("Report: %s", reportPath);
  }
  logger.info("Scan finished in %s.", formatElapsed(Date.now() - startTime));

  if (shouldBlock(result, config.blockOn)) {
    logger.error('Commit blocked: issues at or above "%s" severity.', config.blockOn);
    process.exitCode = 1;
  }
}

async function manageCache(options: CliOptions): Promise<void> {
  const logger = getLogger();
  const config = readConfig(options);
  const cache = ReviewCache.open(config.cacheDir);

  if (options.action === "clear") {
    const removed = await cache.clear();
    logger.info("Cleared %d cached review(s).", removed);
    return;
  }

  const stats = await cache.stats();
  logger.info("Cache location: %s", stats.location);
  logger.info("Cached reviews: %d", stats.entries);
}

async function showLatestReport(options: CliOptions): Promise<void> {
  const config = readConfig(options);
  const reportDir = path.resolve(await getRepoRoot(), config.reportDir);
  const latest = getLatestReport(reportDir);
  if (!latest) {
    throw new ReviewError(`No reports found in ${reportDir}. Run \`reviewsieve scan\` first.`);
  }
  console.log(latest);
}

async function init(options: CliOptions): Promise<void> {
  const logger = getLogger();
  const repoRoot = await getRepoRoot();
  if (existsSync(path.join(repoRoot, CONFIG_FILENAME)) && !options.force) {
    throw new ReviewError(`${CONFIG_FILENAME} already exists in ${repoRoot}. Pass --force to overwrite it.`);
  }

  const config: SieveConfig = {
    ...defaultConfig(),
    ...(options.agent ? { agent: options.agent } : {}),
    ...(options.provider ? { provider: options.provider } : {}),
  };

  if (config.agent === "copilot") {
    const status = await detectCopilot();
    if (status.available) {
      logger.info("GitHub token found (%s).", status.reason);
    } else {
      logger.warn("Copilot mode needs a GitHub token: %s. Run `gh auth login` or set GITHUB_TOKEN.", status.reason);
    }
  }

  const written = saveConfig(config, repoRoot);
  logger.info("Wrote %s", written);
}

void main();
