import assert from "node:assert/strict";
import test from "node:test";

import { filterDiffs, matchesIgnorePattern } from "../src/filter.js";
import { parseUnifiedDiff } from "../src/git.js";

const SAMPLE_DIFF = `diff --git a/src/utils/math.ts b/src/utils/math.ts
index 1111111..2222222 100644
--- a/src/utils/math.ts
+++ b/src/utils/math.ts
@@ -1,4 +1,4 @@
 export function average(nums: number[]): number {
-  return nums.reduce((sum, value) => sum + value, 0) / nums.length;
+  return nums.length ? nums.reduce((sum, value) => sum + value, 0) / nums.length : 0;
 }
diff --git a/src/api/userService.ts b/src/api/userService.ts
new file mode 100644
index 0000000..3333333
--- /dev/null
+++ b/src/api/userService.ts
@@ -0,0 +1,3 @@
+export async function fetchUserProfile(userId: string): Promise<unknown> {
+  return (await fetch(\`https://example.com/users/\${userId}\`)).json();
+}
diff --git a/tests/math.test.ts b/tests/math.test.ts
index 4444444..5555555 100644
--- a/tests/math.test.ts
+++ b/tests/math.test.ts
@@ -1,1 +1,1 @@
-import { average } from "../src/utils/math";
+import { average, median } from "../src/utils/math";
diff --git a/docs/usage.md b/docs/usage.md
index 6666666..7777777 100644
--- a/docs/usage.md
+++ b/docs/usage.md
@@ -12,1 +12,2 @@
 The service listens on port 3000 by default.
+Set PORT to change it.
`;

const reviewablePaths = (patterns: string[] | undefined) =>
  filterDiffs(parseUnifiedDiff(SAMPLE_DIFF), patterns).reviewable.map((diff) => diff.path);

test("matchesIgnorePattern matches test files with **/*.test.ts pattern", () => {
  assert.equal(matchesIgnorePattern("tests/math.test.ts", ["**/*.test.ts"]), true);
});

test("matchesIgnorePattern matches documentation with docs/** pattern", () => {
  assert.equal(matchesIgnorePattern("docs/usage.md", ["docs/**"]), true);
});

test("matchesIgnorePattern does not match source files with test pattern", () => {
  assert.equal(matchesIgnorePattern("src/utils/math.ts", ["**/*.test.ts"]), false);
});

test("matchesIgnorePattern returns false without patterns", () => {
  assert.equal(matchesIgnorePattern("src/utils/math.ts", undefined), false);
  assert.equal(matchesIgnorePattern("src/utils/math.ts", []), false);
});

test("matchesIgnorePattern matches dotfiles", () => {
  assert.equal(matchesIgnorePattern(".github/workflows/ci.yml", [".github/**"]), true);
  assert.equal(matchesIgnorePattern("config/.env.example", ["**/*.example"]), true);
});

test("matchesIgnorePattern normalizes ./ prefixes and backslashes", () => {
  assert.equal(matchesIgnorePattern("./tests/math.test.ts", ["tests/**"]), true);
  assert.equal(matchesIgnorePattern("tests\\math.test.ts", ["tests/**"]), true);
});

test("ignore patterns drop test files from a parsed diff", () => {
  assert.deepEqual(reviewablePaths(["**/*.test.ts"]), [
    "src/utils/math.ts",
    "src/api/userService.ts",
    "docs/usage.md",
  ]);
});

test("ignore patterns combine", () => {
  assert.deepEqual(reviewablePaths(["**/*.test.ts", "docs/**", "**/*.md"]), [
    "src/utils/math.ts",
    "src/api/userService.ts",
  ]);
});

test("ignore patterns match exact paths and basenames", () => {
  assert.deepEqual(reviewablePaths(["src/api/userService.ts"]), [
    "src/utils/math.ts",
    "tests/math.test.ts",
    "docs/usage.md",
  ]);
  assert.deepEqual(reviewablePaths(["**/userService.ts"]), [
    "src/utils/math.ts",
    "tests/math.test.ts",
    "docs/usage.md",
  ]);
});

test("no ignore patterns keeps every parsed file", () => {
  assert.equal(reviewablePaths(undefined).length, 4);
  assert.equal(reviewablePaths([]).length, 4);
});

test("ignored files keep the remaining diff content intact", () => {
  const { reviewable } = filterDiffs(parseUnifiedDiff(SAMPLE_DIFF), ["tests/**", "docs/**"]);
  const math = reviewable.find((diff) => diff.path === "src/utils/math.ts");

  assert.ok(math);
  assert.ok(math.diff.includes("nums.length ? nums.reduce"));
});
