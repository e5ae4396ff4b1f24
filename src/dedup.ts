import { cosineSimilarity, type Embedder } from "./embedder.js";
import { ReviewError } from "./errors.js";
import { getLogger } from "./logging.js";
import type { FileDiff } from "./types.js";

export const DEFAULT_DEDUP_THRESHOLD = 0.95;

export type DedupResult = {
  /** Representatives in first-seen order. */
  unique: FileDiff[];
  /** Representative path → paths of the duplicates it absorbed. */
  groups: Map<string, string[]>;
  /** Embeddings parallel to `unique`. */
  embeddings: number[][];
};

/**
 * Greedy single-pass clustering. Each unclaimed diff becomes a representative and claims every
 * later unclaimed diff whose similarity to it reaches `threshold`. Duplicates are compared with
 * their representative only, never with each other, so groups are not transitive.
 */
export async function deduplicate(
  diffs: readonly FileDiff[],
  embedder: Embedder,
  threshold: number = DEFAULT_DEDUP_THRESHOLD,
): Promise<DedupResult> {
  if (diffs.length === 0) {
    return { unique: [], groups: new Map(), embeddings: [] };
  }

  const vectors = await embedder.embed(diffs.map((diff) => diff.diff));
  if (vectors.length !== diffs.length) {
    throw new ReviewError(
      `Embedder ${embedder.name} returned ${vectors.length} vectors for ${diffs.length} texts`,
    );
  }

  if (diffs.length === 1) {
    return { unique: [diffs[0]], groups: new Map(), embeddings: [vectors[0]] };
  }

  const claimed = new Set<number>();
  const unique: FileDiff[] = [];
  const embeddings: number[][] = [];
  const groups = new Map<string, string[]>();

  for (let i = 0; i < diffs.length; i += 1) {
    if (claimed.has(i)) {
      continue;
    }
    claimed.add(i);
    unique.push(diffs[i]);
    embeddings.push(vectors[i]);

    const duplicates: string[] = [];
    for (let j = i + 1; j < diffs.length; j += 1) {
      if (claimed.has(j)) {
        continue;
      }
      if (cosineSimilarity(vectors[i], vectors[j]) >= threshold) {
        claimed.add(j);
        duplicates.push(diffs[j].path);
      }
    }

    if (duplicates.length > 0) {
      groups.set(diffs[i].path, duplicates);
    }
  }

  getLogger().debug(
    "Deduplicated %d diffs into %d representatives (%d groups)",
    diffs.length,
    unique.length,
    groups.size,
  );

  return { unique, groups, embeddings };
}
