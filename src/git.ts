import { type SimpleGit, simpleGit } from "simple-git";

import { errorMessage, ReviewError } from "./errors.js";
import { getLogger } from "./logging.js";
import type { FileDiff } from "./types.js";

const DIFF_HEADER = /^diff --git a\/(.+?) b\/(.+)$/;

function gitClient(cwd?: string): SimpleGit {
  return cwd ? simpleGit(cwd) : simpleGit();
}

async function runDiff(args: string[], cwd?: string): Promise<string> {
  getLogger().debug("Running git diff %s", args.join(" "));
  try {
    return await gitClient(cwd).diff(args);
  } catch (error) {
    throw new ReviewError(`git diff ${args.join(" ")} failed: ${errorMessage(error)}`);
  }
}

export async function getRepoRoot(cwd?: string): Promise<string> {
  try {
    return (await gitClient(cwd).revparse(["--show-toplevel"])).trim();
  } catch (error) {
    throw new ReviewError(`Not inside a git repository: ${errorMessage(error)}`);
  }
}

export async function getStagedDiff(cwd?: string): Promise<string> {
  return runDiff(["--staged", "--unified=3"], cwd);
}

/** Every tracked change, staged or not, against HEAD. */
export async function getAllDiff(cwd?: string): Promise<string> {
  return runDiff(["HEAD", "--unified=3"], cwd);
}

export async function hasStagedChanges(cwd?: string): Promise<boolean> {
  const names = await runDiff(["--staged", "--name-only"], cwd);
  return names.trim().length > 0;
}

/** Splits a multi-file unified diff into one record per file, keyed by its new path. */
export function parseUnifiedDiff(diffText: string): FileDiff[] {
  if (!diffText.trim()) {
    return [];
  }

  const files: FileDiff[] = [];
  let currentPath: string | undefined;
  let currentLines: string[] = [];

  const flushCurrent = () => {
    if (currentPath === undefined) {
      return;
    }
    // Hunk lines always carry a +, - or space prefix, so these markers only match headers.
    files.push({
      path: currentPath,
      diff: currentLines.join("\n").trim(),
      isNew: currentLines.some((line) => line.startsWith("new file mode")),
      isDeleted: currentLines.some((line) => line.startsWith("deleted file mode")),
    });
  };

  for (const line of diffText.split(/\r?\n/)) {
    const match = DIFF_HEADER.exec(line);
    if (match) {
      flushCurrent();
      currentPath = match[2];
      currentLines = [line];
      continue;
    }
    if (currentPath !== undefined) {
      currentLines.push(line);
    }
  }

  flushCurrent();
  return files;
}
