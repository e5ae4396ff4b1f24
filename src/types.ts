export const SEVERITIES = ["critical", "warning", "info"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const CHECK_CATEGORIES = [
  "codeQuality",
  "security",
  "codeSmell",
  "license",
  "documentation",
  "testCoverage",
  "performance",
  "accessibility",
  "llmSpecific",
] as const;
export type CheckCategory = (typeof CHECK_CATEGORIES)[number];

export const CHECK_LABELS: Record<CheckCategory, string> = {
  codeQuality: "Code Quality",
  security: "Security",
  codeSmell: "Code Smell",
  license: "License & Compliance",
  documentation: "Documentation",
  testCoverage: "Test Coverage",
  performance: "Performance",
  accessibility: "Accessibility",
  llmSpecific: "AI/LLM-Specific",
};

export const AGENT_MODES = ["copilot", "manual"] as const;
export type AgentMode = (typeof AGENT_MODES)[number];

export const PROVIDER_IDS = ["openai", "anthropic", "xai", "gemini", "deepseek", "mistral"] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

export const BLOCK_ON_LEVELS = ["critical", "warning", "all", "none"] as const;
export type BlockOn = (typeof BLOCK_ON_LEVELS)[number];

export const REPORT_FORMATS = ["html", "markdown"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const EMBEDDER_KINDS = ["local", "openai"] as const;
export type EmbedderKind = (typeof EMBEDDER_KINDS)[number];

export interface FileDiff {
  readonly path: string;
  readonly diff: string;
  readonly isNew: boolean;
  readonly isDeleted: boolean;
}

export interface Issue {
  readonly file: string;
  /** 1-based line in the new file, or null when the model could not place it. */
  readonly line: number | null;
  readonly severity: Severity;
  readonly category: CheckCategory;
  readonly message: string;
  readonly suggestion: string;
}

export interface ScanResult {
  issues: Issue[];
  filesScanned: number;
  filesSkipped: number;
  filesCached: number;
  filesDeduped: number;
  cacheHits: number;
  skippedFiles: string[];
}

export function createScanResult(): ScanResult {
  return {
    issues: [],
    filesScanned: 0,
    filesSkipped: 0,
    filesCached: 0,
    filesDeduped: 0,
    cacheHits: 0,
    skippedFiles: [],
  };
}

export interface ReviewBackend {
  readonly label: string;
  review(diffs: readonly FileDiff[]): Promise<Issue[]>;
}
