import { existsSync } from "node:fs";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { cosineSimilarity } from "./embedder.js";
import { errorMessage } from "./errors.js";
import { getLogger } from "./logging.js";

export type EntryMetadata = {
  filePath: string;
  /** Serialized payload owned by the caller; the store never interprets it. */
  issues: string;
  timestamp: number;
};

export type VectorEntry = {
  id: string;
  embedding: number[];
  metadata: EntryMetadata;
};

export type NearestMatch = {
  id: string;
  /** Cosine distance, `1 - cosineSimilarity`. */
  distance: number;
  metadata: EntryMetadata;
};

/** Nearest-neighbour index with cosine-distance semantics. */
export interface VectorStore {
  readonly location: string;
  count(): Promise<number>;
  add(entry: VectorEntry): Promise<void>;
  nearest(embedding: readonly number[]): Promise<NearestMatch | undefined>;
  /** Removes every entry and returns how many there were. */
  clear(): Promise<number>;
}

const STORE_FILENAME = "reviews.json";
const STORE_VERSION = 1;

const EntrySchema = z.object({
  embedding: z.array(z.number()),
  metadata: z.object({
    filePath: z.string(),
    issues: z.string(),
    timestamp: z.number(),
  }),
});

const StoreFileSchema = z.object({
  version: z.number().int(),
  updatedAt: z.string(),
  entries: z.record(z.string(), z.unknown()),
});

type StoredEntry = z.infer<typeof EntrySchema>;

/**
 * Keeps every vector in one JSON file and answers queries with a linear cosine scan. The file
 * is loaded on first use and rewritten (temp file, then rename) after every mutation.
 */
export class JsonFileVectorStore implements VectorStore {
  readonly location: string;
  private readonly filePath: string;
  private entries: Map<string, StoredEntry> | undefined;

  constructor(directory: string) {
    this.location = directory;
    this.filePath = path.join(directory, STORE_FILENAME);
  }

  async count(): Promise<number> {
    return (await this.load()).size;
  }

  async add(entry: VectorEntry): Promise<void> {
    const entries = await this.load();
    entries.set(entry.id, { embedding: [...entry.embedding], metadata: { ...entry.metadata } });
    await this.persist(entries);
  }

  async nearest(embedding: readonly number[]): Promise<NearestMatch | undefined> {
    let best: NearestMatch | undefined;
    for (const [id, entry] of await this.load()) {
      if (entry.embedding.length !== embedding.length) {
        continue;
      }
      const distance = 1 - cosineSimilarity(embedding, entry.embedding);
      if (!best || distance < best.distance) {
        best = { id, distance, metadata: entry.metadata };
      }
    }
    return best;
  }

  async clear(): Promise<number> {
    const entries = await this.load();
    const removed = entries.size;
    entries.clear();
    await this.persist(entries);
    return removed;
  }

  private async load(): Promise<Map<string, StoredEntry>> {
    if (this.entries) {
      return this.entries;
    }

    const entries = new Map<string, StoredEntry>();
    if (existsSync(this.filePath)) {
      const logger = getLogger();
      try {
        const parsed = StoreFileSchema.parse(JSON.parse(await readFile(this.filePath, "utf8")));
        for (const [id, raw] of Object.entries(parsed.entries)) {
          const entry = EntrySchema.safeParse(raw);
          if (entry.success) {
            entries.set(id, entry.data);
          } else {
            logger.debug("Dropping unreadable cache entry %s", id);
          }
        }
      } catch (error) {
        logger.warn("Cache file %s is unreadable; starting empty: %s", this.filePath, errorMessage(error));
      }
    }

    this.entries = entries;
    return entries;
  }

  private async persist(entries: Map<string, StoredEntry>): Promise<void> {
    await mkdir(this.location, { recursive: true });
    const payload = {
      version: STORE_VERSION,
      updatedAt: new Date().toISOString(),
      entries: Object.fromEntries(entries),
    };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(payload), "utf8");
    await rename(tempPath, this.filePath);
  }
}
