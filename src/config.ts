import { existsSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { ConfigurationError, errorMessage } from "./errors.js";
import { formatZodError } from "./schemas.js";
import {
  AGENT_MODES,
  BLOCK_ON_LEVELS,
  CHECK_CATEGORIES,
  type CheckCategory,
  EMBEDDER_KINDS,
  PROVIDER_IDS,
  REPORT_FORMATS,
} from "./types.js";

export const CONFIG_FILENAME = ".reviewsieverc";

const DEFAULT_CHECKS: Record<CheckCategory, boolean> = {
  codeQuality: true,
  security: true,
  codeSmell: true,
  license: false,
  documentation: true,
  testCoverage: false,
  performance: false,
  accessibility: false,
  llmSpecific: false,
};

export const ChecksSchema = z.object({
  codeQuality: z.boolean().default(DEFAULT_CHECKS.codeQuality),
  security: z.boolean().default(DEFAULT_CHECKS.security),
  codeSmell: z.boolean().default(DEFAULT_CHECKS.codeSmell),
  license: z.boolean().default(DEFAULT_CHECKS.license),
  documentation: z.boolean().default(DEFAULT_CHECKS.documentation),
  testCoverage: z.boolean().default(DEFAULT_CHECKS.testCoverage),
  performance: z.boolean().default(DEFAULT_CHECKS.performance),
  accessibility: z.boolean().default(DEFAULT_CHECKS.accessibility),
  llmSpecific: z.boolean().default(DEFAULT_CHECKS.llmSpecific),
});

const similarity = z
  .number()
  .min(-1, "must be between -1 and 1")
  .max(1, "must be between -1 and 1");

export const ConfigSchema = z.object({
  agent: z.enum(AGENT_MODES).default("copilot"),
  provider: z.enum(PROVIDER_IDS).optional(),
  model: z.string().trim().min(1, "model cannot be empty").optional(),
  apiKey: z.string().trim().min(1, "apiKey cannot be empty").optional(),
  blockOn: z.enum(BLOCK_ON_LEVELS).default("critical"),
  /** Total estimated tokens per scan; zero or less means unlimited. */
  tokenBudget: z.number().int("tokenBudget must be an integer").default(50_000),
  maxTokensPerBatch: z
    .number()
    .int("maxTokensPerBatch must be an integer")
    .positive("maxTokensPerBatch must be positive")
    .default(12_000),
  cacheThreshold: similarity.default(0.92),
  dedupThreshold: similarity.optional(),
  maxConcurrent: z
    .number()
    .int("maxConcurrent must be an integer")
    .positive("maxConcurrent must be positive")
    .max(32, "maxConcurrent cannot exceed 32")
    .default(3),
  requestTimeoutMs: z.number().int().positive().default(120_000),
  embedder: z.enum(EMBEDDER_KINDS).default("local"),
  embeddingModel: z.string().trim().min(1).optional(),
  cacheDir: z.string().trim().min(1).optional(),
  ignore: z.array(z.string().trim().min(1)).default([]),
  checks: ChecksSchema.default(DEFAULT_CHECKS),
  reportFormat: z.enum(REPORT_FORMATS).default("html"),
  reportDir: z.string().trim().min(1).default(".reviewsieve/reports"),
});

export type SieveConfig = z.infer<typeof ConfigSchema>;

export function defaultConfig(): SieveConfig {
  return ConfigSchema.parse({});
}

export function enabledCategories(config: Pick<SieveConfig, "checks">): CheckCategory[] {
  return CHECK_CATEGORIES.filter((category) => config.checks[category]);
}

export function parseConfig(raw: unknown, source = CONFIG_FILENAME): SieveConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }
  throw new ConfigurationError(`Invalid configuration in ${source}: ${formatZodError(parsed.error)}`);
}

/** Walks up from `start` looking for the config file. */
export function findConfigFile(start: string = process.cwd()): string | undefined {
  let directory = path.resolve(start);
  for (;;) {
    const candidate = path.join(directory, CONFIG_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(directory);
    if (parent === directory) {
      return undefined;
    }
    directory = parent;
  }
}

export function loadConfig(configPath?: string): SieveConfig {
  const resolved = configPath ? path.resolve(configPath) : findConfigFile();
  if (!resolved || !existsSync(resolved)) {
    if (configPath) {
      throw new ConfigurationError(`Config file not found: ${resolved ?? configPath}`);
    }
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${resolved} is not valid JSON: ${errorMessage(error)}`,
    );
  }
  return parseConfig(raw, resolved);
}

export function saveConfig(config: SieveConfig, directory: string = process.cwd()): string {
  const target = path.join(directory, CONFIG_FILENAME);
  writeFileSync(target, `${JSON.stringify(config, null, 2)}\n`, "utf8");
  return target;
}
