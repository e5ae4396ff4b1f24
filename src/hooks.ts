import { chmodSync, existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";

export const HOOK_MARKER = "reviewsieve";
const BACKUP_SUFFIX = ".pre-reviewsieve";

const HOOK_CONTENT = `#!/bin/sh
# reviewsieve pre-commit hook: reviews staged changes before committing.
# Remove with \`reviewsieve uninstall\`.

reviewsieve scan
exit_code=$?

if [ $exit_code -ne 0 ]; then
    echo ""
    echo "reviewsieve blocked the commit. Fix the issues above or run:"
    echo "   git commit --no-verify   # to skip the scan"
    echo ""
fi

exit $exit_code
`;

function hookPath(repoRoot: string): string {
  return path.join(repoRoot, ".git", "hooks", "pre-commit");
}

/** Installs the pre-commit hook, moving a foreign hook aside rather than overwriting it. */
export function installHook(repoRoot: string): string {
  const target = hookPath(repoRoot);
  mkdirSync(path.dirname(target), { recursive: true });

  if (existsSync(target)) {
    const existing = readFileSync(target, "utf8");
    if (!existing.toLowerCase().includes(HOOK_MARKER)) {
      renameSync(target, `${target}${BACKUP_SUFFIX}`);
    }
  }

  writeFileSync(target, HOOK_CONTENT, "utf8");
  chmodSync(target, 0o755);
  return target;
}

/** Removes our hook and restores a backed-up one. Returns false when no hook of ours exists. */
export function uninstallHook(repoRoot: string): boolean {
  const target = hookPath(repoRoot);
  if (!existsSync(target) || !readFileSync(target, "utf8").toLowerCase().includes(HOOK_MARKER)) {
    return false;
  }

  rmSync(target);
  const backup = `${target}${BACKUP_SUFFIX}`;
  if (existsSync(backup)) {
    renameSync(backup, target);
  }
  return true;
}
