import { existsSync, mkdirSync, readdirSync, statSync, writeFileSync } from "node:fs";
import path from "node:path";

import { groupIssuesByFile, severityCounts } from "./reviewProcessing.js";
import { CHECK_LABELS, type Issue, type ReportFormat, type ScanResult } from "./types.js";

const REPORT_PREFIX = "report-";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function reportFileName(format: ReportFormat, now: Date): string {
  const slug = `${now.getUTCFullYear()}-${pad(now.getUTCMonth() + 1)}-${pad(now.getUTCDate())}_${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${REPORT_PREFIX}${slug}${format === "html" ? ".html" : ".md"}`;
}

function formatTimestamp(now: Date): string {
  return `${now.toISOString().slice(0, 10)} ${pad(now.getUTCHours())}:${pad(now.getUTCMinutes())} UTC`;
}

function location(issue: Issue): string {
  return issue.line ? `line ${issue.line}` : "file";
}

export function renderMarkdownReport(result: ScanResult, now: Date): string {
  const counts = severityCounts(result.issues);
  const lines: string[] = [
    "# Code review report",
    "",
    `Generated ${formatTimestamp(now)}`,
    "",
    "| Critical | Warning | Info |",
    "| --- | --- | --- |",
    `| ${counts.critical} | ${counts.warning} | ${counts.info} |`,
    "",
    `Files scanned: ${result.filesScanned} · skipped: ${result.filesSkipped} · cache hits: ${result.cacheHits} · deduplicated: ${result.filesDeduped}`,
  ];

  if (result.issues.length === 0) {
    lines.push("", "No issues found.");
  }

  for (const [file, issues] of groupIssuesByFile(result.issues)) {
    lines.push("", `## \`${file}\``, "");
    for (const issue of issues) {
      lines.push(
        `- **${issue.severity}** · ${CHECK_LABELS[issue.category]} · ${location(issue)}: ${issue.message}`,
      );
      if (issue.suggestion) {
        lines.push(`  - Suggestion: ${issue.suggestion}`);
      }
    }
  }

  if (result.skippedFiles.length > 0) {
    lines.push("", "## Skipped files", "", ...result.skippedFiles.map((file) => `- \`${file}\``));
  }

  return `${lines.join("\n")}\n`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function renderHtmlReport(result: ScanResult, now: Date): string {
  const counts = severityCounts(result.issues);
  const sections: string[] = [];

  for (const [file, issues] of groupIssuesByFile(result.issues)) {
    const rows = issues
      .map(
        (issue) =>
          `<tr class="${issue.severity}"><td>${issue.severity}</td><td>${escapeHtml(CHECK_LABELS[issue.category])}</td><td>${location(issue)}</td><td>${escapeHtml(issue.message)}</td><td>${escapeHtml(issue.suggestion)}</td></tr>`,
      )
      .join("\n");
    sections.push(
      `<section><h2>${escapeHtml(file)}</h2><table><thead><tr><th>Severity</th><th>Category</th><th>Location</th><th>Issue</th><th>Suggestion</th></tr></thead><tbody>\n${rows}\n</tbody></table></section>`,
    );
  }

  if (sections.length === 0) {
    sections.push("<p>No issues found.</p>");
  }

  if (result.skippedFiles.length > 0) {
    const items = result.skippedFiles.map((file) => `<li>${escapeHtml(file)}</li>`).join("");
    sections.push(`<section><h2>Skipped files</h2><ul>${items}</ul></section>`);
  }

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>Code review report</title>
<style>
body { font-family: system-ui, sans-serif; margin: 2rem; }
table { border-collapse: collapse; width: 100%; }
td, th { border: 1px solid #ddd; padding: 0.4rem; text-align: left; vertical-align: top; }
tr.critical td:first-child { color: #b00020; font-weight: bold; }
tr.warning td:first-child { color: #a15c00; }
tr.info td:first-child { color: #1a5fb4; }
</style>
</head>
<body>
<h1>Code review report</h1>
<p>Generated ${formatTimestamp(now)}</p>
<p>Critical: ${counts.critical} · Warning: ${counts.warning} · Info: ${counts.info}</p>
<p>Files scanned: ${result.filesScanned} · skipped: ${result.filesSkipped} · cache hits: ${result.cacheHits} · deduplicated: ${result.filesDeduped}</p>
${sections.join("\n")}
</body>
</html>
`;
}

/** Writes the report into `outputDir` and returns its path. */
export function generateReport(
  result: ScanResult,
  outputDir: string,
  format: ReportFormat = "html",
  now: Date = new Date(),
): string {
  mkdirSync(outputDir, { recursive: true });
  const content = format === "html" ? renderHtmlReport(result, now) : renderMarkdownReport(result, now);
  const reportPath = path.join(outputDir, reportFileName(format, now));
  writeFileSync(reportPath, content, "utf8");
  return reportPath;
}

export function getLatestReport(reportDir: string): string | undefined {
  if (!existsSync(reportDir)) {
    return undefined;
  }
  const candidates = readdirSync(reportDir)
    .filter((name) => name.startsWith(REPORT_PREFIX))
    .map((name) => path.join(reportDir, name))
    .map((file) => ({ file, modified: statSync(file).mtimeMs }))
    .sort((a, b) => b.modified - a.modified || b.file.localeCompare(a.file));
  return candidates[0]?.file;
}
