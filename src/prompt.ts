import { CHECK_CATEGORIES, CHECK_LABELS, type CheckCategory, type FileDiff } from "./types.js";

export function buildSystemPrompt(categories: readonly CheckCategory[]): string {
  const checkList = categories
    .map((category) => `- ${CHECK_LABELS[category]} (${category})`)
    .join("\n");

  return [
    "You are a senior code reviewer performing an automated pre-commit review.",
    "Analyze the provided git diff and find issues in these categories:",
    checkList,
    "",
    "For each issue found, respond with a JSON array of objects. Each object must have:",
    '  "file": string (file path),',
    '  "line": number or null (line number if identifiable),',
    '  "severity": "critical" | "warning" | "info",',
    `  "category": one of ${CHECK_CATEGORIES.map((category) => `"${category}"`).join(", ")},`,
    '  "message": string (concise description of the issue),',
    '  "suggestion": string (how to fix it, or empty string)',
    "",
    "If no issues are found, respond with an empty JSON array: []",
    "Respond ONLY with the JSON array, with no markdown fences and no explanation.",
  ].join("\n");
}

export function buildReviewPrompt(diffs: readonly FileDiff[]): string {
  return diffs.map((diff) => `=== ${diff.path} ===\n${diff.diff}`).join("\n\n");
}
