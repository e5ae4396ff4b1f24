import { z } from "zod";

import { getLogger } from "./logging.js";
import { ResponseEnvelopeSchema, ResponseIssueSchema } from "./schemas.js";
import {
  type BlockOn,
  CHECK_CATEGORIES,
  CHECK_LABELS,
  type Issue,
  type ScanResult,
  type Severity,
} from "./types.js";
import { truncateForLog } from "./utils.js";

const FENCE_OPEN = /^```(?:json)?\s*/;
const FENCE_CLOSE = /\s*```$/;

/**
 * Turns free-form model output into issues. Anything that is not a JSON array (or an object
 * carrying an `issues` array) yields no issues; items with an unknown severity or category are
 * dropped one by one.
 */
export function parseReviewResponse(raw: string): Issue[] {
  const logger = getLogger();
  const cleaned = raw.trim().replace(FENCE_OPEN, "").replace(FENCE_CLOSE, "").trim();
  if (!cleaned || cleaned === "[]") {
    return [];
  }

  let payload: unknown;
  try {
    payload = JSON.parse(cleaned);
  } catch {
    logger.warn("Model response was not valid JSON: %s", truncateForLog(raw));
    return [];
  }

  const envelope = ResponseEnvelopeSchema.safeParse(payload);
  const items = Array.isArray(payload) ? payload : envelope.success ? envelope.data.issues : undefined;
  if (!items) {
    logger.warn("Model response was not a JSON array: %s", truncateForLog(raw));
    return [];
  }

  const issues: Issue[] = [];
  for (const item of items) {
    const parsed = ResponseIssueSchema.safeParse(item);
    if (parsed.success) {
      issues.push(parsed.data);
    } else {
      logger.warn("Skipping malformed issue: %s", describeRejection(parsed.error, item));
    }
  }
  return issues;
}

function describeRejection(error: z.ZodError, item: unknown): string {
  const reason = error.issues.map((issue) => issue.path.join(".") || "(item)").join(", ");
  return `${reason} in ${truncateForLog(JSON.stringify(item) ?? String(item))}`;
}

export function shouldBlock(result: Pick<ScanResult, "issues">, blockOn: BlockOn): boolean {
  switch (blockOn) {
    case "none":
      return false;
    case "critical":
      return result.issues.some((issue) => issue.severity === "critical");
    case "warning":
      return result.issues.some(
        (issue) => issue.severity === "critical" || issue.severity === "warning",
      );
    case "all":
      return result.issues.length > 0;
  }
}

export function severityCounts(issues: readonly Issue[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { critical: 0, warning: 0, info: 0 };
  for (const issue of issues) {
    counts[issue.severity] += 1;
  }
  return counts;
}

/** Groups issues by file, keeping first-seen file order. */
export function groupIssuesByFile(issues: readonly Issue[]): Map<string, Issue[]> {
  const grouped = new Map<string, Issue[]>();
  for (const issue of issues) {
    const bucket = grouped.get(issue.file);
    if (bucket) {
      bucket.push(issue);
    } else {
      grouped.set(issue.file, [issue]);
    }
  }
  return grouped;
}

export function formatScanStats(result: ScanResult): string {
  const parts = [`${result.filesScanned} files scanned`];
  if (result.filesSkipped) {
    parts.push(`${result.filesSkipped} skipped`);
  }
  if (result.cacheHits) {
    parts.push(`${result.cacheHits} cache hits`);
  }
  if (result.filesDeduped) {
    parts.push(`${result.filesDeduped} deduped`);
  }
  return parts.join(" · ");
}

export function buildScanSummary(result: ScanResult): string[] {
  if (result.issues.length === 0) {
    return ["No issues found", "", formatScanStats(result)];
  }

  const lines: string[] = [];
  for (const category of CHECK_CATEGORIES) {
    const label = CHECK_LABELS[category].padEnd(20);
    const issues = result.issues.filter((issue) => issue.category === category);
    if (issues.length === 0) {
      lines.push(`✔ ${label} passed`);
      continue;
    }

    const counts = severityCounts(issues);
    const parts = (["critical", "warning", "info"] as const)
      .filter((severity) => counts[severity] > 0)
      .map((severity) => `${counts[severity]} ${severity}`);
    lines.push(`✗ ${label} ${parts.join(", ")}`);
    for (const issue of issues) {
      const location = issue.line ? `${issue.file}:${issue.line}` : issue.file;
      lines.push(`    └─ ${location.padEnd(25)} ${issue.message}`);
    }
  }

  lines.push("", formatScanStats(result));
  return lines;
}

export function logScanSummary(result: ScanResult): void {
  const logger = getLogger();
  for (const line of buildScanSummary(result)) {
    logger.info(line);
  }
}
