import { z } from "zod";

import { CHECK_CATEGORIES, SEVERITIES } from "./types.js";

export const SeveritySchema = z.enum(SEVERITIES);
export const CheckCategorySchema = z.enum(CHECK_CATEGORIES);

// Models often leave `line` out for file-level findings.
const lineNumber = z
  .unknown()
  .optional()
  .transform((value): number | null => {
    const numeric = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    return typeof numeric === "number" && Number.isInteger(numeric) && numeric > 0 ? numeric : null;
  });

/**
 * One issue as the model reports it. Severity and category must be known values when present;
 * everything else falls back to a usable default.
 */
export const ResponseIssueSchema = z.object({
  file: z.string().trim().min(1).catch("unknown"),
  line: lineNumber,
  severity: SeveritySchema.default("info"),
  category: CheckCategorySchema.default("codeQuality"),
  message: z.string().catch(""),
  suggestion: z.string().catch(""),
});

export const ResponseEnvelopeSchema = z.object({
  issues: z.array(z.unknown()),
});

/** Issues as serialized into the review cache. */
export const StoredIssueSchema = z.object({
  file: z.string(),
  line: z.number().int().positive().nullable().default(null),
  severity: SeveritySchema,
  category: CheckCategorySchema,
  message: z.string(),
  suggestion: z.string().default(""),
});

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
