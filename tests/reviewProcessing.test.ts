import assert from "node:assert/strict";
import test from "node:test";

import {
  buildScanSummary,
  formatScanStats,
  groupIssuesByFile,
  parseReviewResponse,
  severityCounts,
  shouldBlock,
} from "../src/reviewProcessing.js";
import { createScanResult } from "../src/types.js";
import { makeIssue, silenceLogs } from "./helpers.js";

silenceLogs();

test("parseReviewResponse reads a bare JSON array", () => {
  const raw = JSON.stringify([
    {
      file: "src/a.ts",
      line: 10,
      severity: "warning",
      category: "codeSmell",
      message: "Function is too long",
      suggestion: "Extract helpers",
    },
  ]);

  assert.deepEqual(parseReviewResponse(raw), [
    {
      file: "src/a.ts",
      line: 10,
      severity: "warning",
      category: "codeSmell",
      message: "Function is too long",
      suggestion: "Extract helpers",
    },
  ]);
});

test("parseReviewResponse strips markdown fences and accepts an issues envelope", () => {
  const raw = '```json\n{"issues":[{"file":"b.ts","severity":"info","category":"documentation","message":"Add a doc comment"}]}\n```';

  assert.deepEqual(parseReviewResponse(raw), [
    { file: "b.ts", line: null, severity: "info", category: "documentation", message: "Add a doc comment", suggestion: "" },
  ]);
});

test("parseReviewResponse keeps file-level findings that omit line", () => {
  const raw = JSON.stringify([
    { file: "README.md", severity: "warning", category: "documentation", message: "Install steps are outdated" },
  ]);

  assert.deepEqual(parseReviewResponse(raw), [
    {
      file: "README.md",
      line: null,
      severity: "warning",
      category: "documentation",
      message: "Install steps are outdated",
      suggestion: "",
    },
  ]);
});

test("parseReviewResponse fills defaults and coerces line numbers", () => {
  const raw = JSON.stringify([
    { file: "c.ts", line: "7", message: "Unclear name" },
    { line: 0, severity: "critical", category: "security", message: "Secret in code" },
    { file: "d.ts", line: 2.5, message: 42 },
  ]);

  assert.deepEqual(parseReviewResponse(raw), [
    { file: "c.ts", line: 7, severity: "info", category: "codeQuality", message: "Unclear name", suggestion: "" },
    { file: "unknown", line: null, severity: "critical", category: "security", message: "Secret in code", suggestion: "" },
    { file: "d.ts", line: null, severity: "info", category: "codeQuality", message: "", suggestion: "" },
  ]);
});

test("parseReviewResponse drops items with unknown severity or category", () => {
  const raw = JSON.stringify([
    { file: "a.ts", severity: "blocker", message: "x" },
    { file: "b.ts", category: "style", message: "y" },
    "not an object",
    { file: "c.ts", severity: "warning", message: "kept" },
  ]);

  assert.deepEqual(
    parseReviewResponse(raw).map((issue) => issue.message),
    ["kept"],
  );
});

test("parseReviewResponse yields nothing for empty, invalid or non-array replies", () => {
  assert.deepEqual(parseReviewResponse(""), []);
  assert.deepEqual(parseReviewResponse("[]"), []);
  assert.deepEqual(parseReviewResponse("```\n[]\n```"), []);
  assert.deepEqual(parseReviewResponse("Looks good to me!"), []);
  assert.deepEqual(parseReviewResponse('{"summary":"fine"}'), []);
});

test("shouldBlock follows the configured level", () => {
  const critical = { issues: [makeIssue("a.ts", { severity: "critical" })] };
  const warning = { issues: [makeIssue("a.ts", { severity: "warning" })] };
  const info = { issues: [makeIssue("a.ts", { severity: "info" })] };
  const clean = { issues: [] };

  assert.equal(shouldBlock(critical, "critical"), true);
  assert.equal(shouldBlock(warning, "critical"), false);
  assert.equal(shouldBlock(critical, "warning"), true);
  assert.equal(shouldBlock(warning, "warning"), true);
  assert.equal(shouldBlock(info, "warning"), false);
  assert.equal(shouldBlock(info, "all"), true);
  assert.equal(shouldBlock(clean, "all"), false);
  assert.equal(shouldBlock(critical, "none"), false);
});

test("severityCounts and groupIssuesByFile keep first-seen order", () => {
  const issues = [
    makeIssue("b.ts", { severity: "critical" }),
    makeIssue("a.ts", { severity: "info" }),
    makeIssue("b.ts", { severity: "info" }),
  ];

  assert.deepEqual(severityCounts(issues), { critical: 1, warning: 0, info: 2 });
  const grouped = groupIssuesByFile(issues);
  assert.deepEqual([...grouped.keys()], ["b.ts", "a.ts"]);
  assert.equal(grouped.get("b.ts")?.length, 2);
});

test("formatScanStats omits zero counters after the scanned count", () => {
  assert.equal(formatScanStats(createScanResult()), "0 files scanned");
  assert.equal(
    formatScanStats({ ...createScanResult(), filesScanned: 4, filesSkipped: 2, cacheHits: 1, filesDeduped: 3 }),
    "4 files scanned · 2 skipped · 1 cache hits · 3 deduped",
  );
});

test("buildScanSummary reports a clean scan", () => {
  assert.deepEqual(buildScanSummary({ ...createScanResult(), filesScanned: 2 }), [
    "No issues found",
    "",
    "2 files scanned",
  ]);
});

test("buildScanSummary lists failing categories with their issues", () => {
  const result = {
    ...createScanResult(),
    filesScanned: 1,
    issues: [
      makeIssue("src/login.ts", { line: 8, severity: "critical", category: "security", message: "Password logged" }),
      makeIssue("src/login.ts", { line: null, severity: "warning", category: "security", message: "No rate limit" }),
    ],
  };

  const lines = buildScanSummary(result);

  assert.equal(lines[0], `✔ ${"Code Quality".padEnd(20)} passed`);
  assert.equal(lines[1], `✗ ${"Security".padEnd(20)} 1 critical, 1 warning`);
  assert.equal(lines[2], `    └─ ${"src/login.ts:8".padEnd(25)} Password logged`);
  assert.equal(lines[3], `    └─ ${"src/login.ts".padEnd(25)} No rate limit`);
  assert.deepEqual(lines.slice(-2), ["", "1 files scanned"]);
  assert.equal(lines.length, 9 + 2 + 2);
});
