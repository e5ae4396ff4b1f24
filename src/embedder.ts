import OpenAI from "openai";

import type { SieveConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { getLogger } from "./logging.js";

export interface Embedder {
  readonly name: string;
  readonly dimensions: number;
  /** One vector per input text, in input order. Identical texts give identical vectors. */
  embed(texts: readonly string[]): Promise<number[][]>;
}

/** 0 for vectors of different dimensionality, which come from different embedders. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    return 0;
  }
  const length = a.length;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  const similarity = dot / Math.sqrt(normA * normB);
  return Math.min(1, Math.max(-1, similarity));
}

const HASHING_DIMENSIONS = 384;
const SHINGLE_SIZE = 3;

/**
 * Offline embedder: hashes character trigrams into a fixed number of buckets (with a hashed
 * sign to spread collisions) and L2-normalizes the counts. Needs no model download, so it is the
 * default.
 */
export class HashingEmbedder implements Embedder {
  readonly name = "local-trigram";

  constructor(readonly dimensions: number = HASHING_DIMENSIONS) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const normalized = text.replace(/\s+/g, " ");
    if (normalized.length === 0) {
      return vector;
    }

    const lastStart = Math.max(normalized.length - SHINGLE_SIZE, 0);
    for (let start = 0; start <= lastStart; start += 1) {
      const hash = fnv1a(normalized.slice(start, start + SHINGLE_SIZE));
      const bucket = hash % this.dimensions;
      vector[bucket] += (hash & 0x80000000) === 0 ? 1 : -1;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

const DEFAULT_OPENAI_EMBEDDING_MODEL = "text-embedding-3-small";
const OPENAI_EMBEDDING_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
};
const MAX_INPUTS_PER_REQUEST = 128;

export class OpenAIEmbedder implements Embedder {
  readonly name: string;
  readonly dimensions: number;
  private readonly client: OpenAI;

  constructor(
    private readonly model: string,
    options: { apiKey: string; timeoutMs?: number },
  ) {
    this.name = `openai:${model}`;
    this.dimensions = OPENAI_EMBEDDING_DIMENSIONS[model] ?? 0;
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs });
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let offset = 0; offset < texts.length; offset += MAX_INPUTS_PER_REQUEST) {
      // The endpoint rejects empty strings.
      const input = texts
        .slice(offset, offset + MAX_INPUTS_PER_REQUEST)
        .map((text) => (text.length > 0 ? text : " "));
      getLogger().debug("Requesting %d embeddings from %s", input.length, this.model);
      const response = await this.client.embeddings.create({ model: this.model, input });
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((item) => item.embedding));
    }
    return vectors;
  }
}

/** Builds the process-wide embedder once, at startup. */
export function createEmbedder(config: SieveConfig): Embedder {
  switch (config.embedder) {
    case "local":
      return new HashingEmbedder();
    case "openai": {
      const apiKey = process.env.OPENAI_API_KEY ?? (config.provider === "openai" ? config.apiKey : undefined);
      if (!apiKey) {
        throw new ConfigurationError(
          "The openai embedder needs an API key. Set OPENAI_API_KEY or use \"embedder\": \"local\".",
        );
      }
      return new OpenAIEmbedder(config.embeddingModel ?? DEFAULT_OPENAI_EMBEDDING_MODEL, {
        apiKey,
        timeoutMs: config.requestTimeoutMs,
      });
    }
  }
}
