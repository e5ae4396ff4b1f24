import { randomUUID } from "node:crypto";
import os from "node:os";
import path from "node:path";

import { getLogger } from "./logging.js";
import { StoredIssueSchema } from "./schemas.js";
import type { Issue } from "./types.js";
import { JsonFileVectorStore, type VectorStore } from "./vectorStore.js";

export const DEFAULT_CACHE_DIR = path.join(os.homedir(), ".reviewsieve", "cache");
export const DEFAULT_CACHE_THRESHOLD = 0.92;

export type CacheStats = {
  entries: number;
  location: string;
};

/**
 * Past review results indexed by diff embedding. Lookups go by similarity, never by exact key,
 * and the store is append-only until `clear()`.
 */
export class ReviewCache {
  constructor(private readonly vectors: VectorStore) {}

  static open(cacheDir: string = DEFAULT_CACHE_DIR): ReviewCache {
    return new ReviewCache(new JsonFileVectorStore(cacheDir));
  }

  /** Issues of the closest stored diff when its similarity reaches `threshold`. */
  async query(
    embedding: readonly number[],
    threshold: number = DEFAULT_CACHE_THRESHOLD,
  ): Promise<Issue[] | undefined> {
    if ((await this.vectors.count()) === 0) {
      return undefined;
    }

    const match = await this.vectors.nearest(embedding);
    if (!match) {
      return undefined;
    }

    const similarity = 1 - match.distance;
    if (similarity < threshold) {
      return undefined;
    }

    const issues = deserializeIssues(match.metadata.issues);
    if (!issues) {
      getLogger().warn(
        "Cached review for %s has an unreadable payload; treating it as a miss.",
        match.metadata.filePath,
      );
    }
    return issues;
  }

  async store(embedding: readonly number[], issues: readonly Issue[], filePath: string): Promise<void> {
    await this.vectors.add({
      id: randomUUID(),
      embedding: [...embedding],
      metadata: {
        filePath,
        issues: serializeIssues(issues),
        timestamp: Math.floor(Date.now() / 1000),
      },
    });
  }

  async clear(): Promise<number> {
    return this.vectors.clear();
  }

  async stats(): Promise<CacheStats> {
    return {
      entries: await this.vectors.count(),
      location: this.vectors.location,
    };
  }
}

export function serializeIssues(issues: readonly Issue[]): string {
  return JSON.stringify(
    issues.map((issue) => ({
      file: issue.file,
      line: issue.line,
      severity: issue.severity,
      category: issue.category,
      message: issue.message,
      suggestion: issue.suggestion,
    })),
  );
}

/** `undefined` when the payload is not a JSON array; malformed items are dropped. */
export function deserializeIssues(raw: string): Issue[] | undefined {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!Array.isArray(data)) {
    return undefined;
  }

  const issues: Issue[] = [];
  for (const item of data) {
    const parsed = StoredIssueSchema.safeParse(item);
    if (parsed.success) {
      issues.push(parsed.data);
    }
  }
  return issues;
}
