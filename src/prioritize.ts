import type { FileDiff } from "./types.js";

const HIGH_RISK_KEYWORDS: readonly string[] = [
  "auth",
  "secret",
  "crypto",
  "password",
  "credential",
  "token",
  "admin",
  "db",
  "database",
  "migrate",
  "env",
  "config",
  "permission",
  "rbac",
  "session",
  "oauth",
  "jwt",
  "key",
  "cert",
  "ssl",
  "tls",
];

const KEYWORD_WEIGHT = 10;
const NEW_FILE_WEIGHT = 5;

/**
 * Every keyword found anywhere in the lowercased path adds to the score, so overlapping
 * keywords ("oauth" and "auth") both count.
 */
export function riskScore(diff: FileDiff): number {
  const lower = diff.path.toLowerCase();
  let score = 0;
  for (const keyword of HIGH_RISK_KEYWORDS) {
    if (lower.includes(keyword)) {
      score += KEYWORD_WEIGHT;
    }
  }
  if (diff.isNew) {
    score += NEW_FILE_WEIGHT;
  }
  return score;
}

/** Highest risk first; equal scores keep their input order. */
export function prioritizeDiffs(diffs: readonly FileDiff[]): FileDiff[] {
  return diffs
    .map((diff, index) => ({ diff, index, score: riskScore(diff) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((entry) => entry.diff);
}
