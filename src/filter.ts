import micromatch from "micromatch";

import type { FileDiff } from "./types.js";

const SKIP_EXTENSIONS: readonly string[] = [
  ".lock",
  ".svg",
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".ico",
  ".webp",
  ".bmp",
  ".woff",
  ".woff2",
  ".ttf",
  ".eot",
  ".otf",
  ".map",
  ".min.js",
  ".min.css",
  ".pyc",
  ".pyo",
  ".so",
  ".dylib",
  ".dll",
  ".exe",
  ".jar",
  ".war",
  ".zip",
  ".tar",
  ".gz",
  ".br",
];

// Exact basenames; case-sensitive, anchored to a path segment.
const SKIP_BASENAMES =
  /(^|\/)(package-lock\.json|yarn\.lock|pnpm-lock\.yaml|Pipfile\.lock|poetry\.lock|uv\.lock|Cargo\.lock|Gemfile\.lock|composer\.lock|\.DS_Store|Thumbs\.db)$/;

export type FilterOutcome = {
  reviewable: FileDiff[];
  skipped: string[];
};

/** Glob match against repo-relative paths; `./` prefixes and backslashes are normalized first. */
export function matchesIgnorePattern(filePath: string, patterns?: readonly string[]): boolean {
  if (!patterns?.length) {
    return false;
  }
  const normalized = filePath.replace(/\\/g, "/").replace(/^\.\//, "");
  return micromatch.isMatch(normalized, [...patterns], { dot: true });
}

export function isUnreviewable(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  if (SKIP_EXTENSIONS.some((extension) => lower.endsWith(extension))) {
    return true;
  }
  return SKIP_BASENAMES.test(filePath);
}

/**
 * Splits diffs into the ones worth sending to a model and the paths left out. Both lists keep
 * input order and together account for every input diff exactly once.
 */
export function filterDiffs(
  diffs: readonly FileDiff[],
  ignorePatterns?: readonly string[],
): FilterOutcome {
  const reviewable: FileDiff[] = [];
  const skipped: string[] = [];

  for (const diff of diffs) {
    if (isUnreviewable(diff.path) || matchesIgnorePattern(diff.path, ignorePatterns)) {
      skipped.push(diff.path);
    } else {
      reviewable.push(diff);
    }
  }

  return { reviewable, skipped };
}
