import type { Embedder } from "../src/embedder.js";
import { createLogger, setLogger } from "../src/logging.js";
import type { FileDiff, Issue } from "../src/types.js";

export function silenceLogs(): void {
  setLogger(createLogger("silent"));
}

export function makeDiff(path: string, diff: string, overrides: Partial<FileDiff> = {}): FileDiff {
  return { path, diff, isNew: false, isDeleted: false, ...overrides };
}

export function makeIssue(file: string, overrides: Partial<Issue> = {}): Issue {
  return {
    file,
    line: 1,
    severity: "warning",
    category: "codeQuality",
    message: `problem in ${file}`,
    suggestion: "",
    ...overrides,
  };
}

/** Embeds by lookup so tests control every similarity exactly. */
export class TableEmbedder implements Embedder {
  readonly name = "table";
  readonly dimensions: number;
  calls = 0;

  constructor(private readonly table: Record<string, number[]>) {
    this.dimensions = Object.values(table)[0]?.length ?? 0;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls += 1;
    return texts.map((text) => {
      const vector = this.table[text];
      if (!vector) {
        throw new Error(`no vector for ${text}`);
      }
      return vector;
    });
  }
}
