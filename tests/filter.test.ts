import assert from "node:assert/strict";
import test from "node:test";

import { filterDiffs, isUnreviewable } from "../src/filter.js";
import { makeDiff } from "./helpers.js";

test("filterDiffs drops binary assets and lock files", () => {
  const diffs = [
    makeDiff("src/app.ts", "+const port = 3000;"),
    makeDiff("assets/logo.png", "Binary files differ"),
    makeDiff("package-lock.json", "+  \"lockfileVersion\": 3"),
    makeDiff("docs/guide.md", "+## Setup"),
  ];

  const { reviewable, skipped } = filterDiffs(diffs);

  assert.deepEqual(
    reviewable.map((diff) => diff.path),
    ["src/app.ts", "docs/guide.md"],
  );
  assert.deepEqual(skipped, ["assets/logo.png", "package-lock.json"]);
});

test("filterDiffs applies ignore globs after the built-in rules", () => {
  const diffs = [
    makeDiff("src/app.ts", "+a"),
    makeDiff("assets/logo.png", "+b"),
    makeDiff("package-lock.json", "+c"),
    makeDiff("docs/guide.md", "+d"),
  ];

  const { reviewable, skipped } = filterDiffs(diffs, ["docs/**"]);

  assert.deepEqual(
    reviewable.map((diff) => diff.path),
    ["src/app.ts"],
  );
  assert.deepEqual(skipped, ["assets/logo.png", "package-lock.json", "docs/guide.md"]);
});

test("isUnreviewable matches extensions case-insensitively", () => {
  assert.equal(isUnreviewable("assets/LOGO.PNG"), true);
  assert.equal(isUnreviewable("dist/app.min.js"), true);
  assert.equal(isUnreviewable("fonts/Inter.woff2"), true);
  assert.equal(isUnreviewable("src/app.js"), false);
});

test("isUnreviewable matches lock-file basenames exactly", () => {
  assert.equal(isUnreviewable("frontend/yarn.lock"), true);
  assert.equal(isUnreviewable("pnpm-lock.yaml"), true);
  assert.equal(isUnreviewable("nested/dir/.DS_Store"), true);
  assert.equal(isUnreviewable("my-pnpm-lock.yaml"), false);
  assert.equal(isUnreviewable("PNPM-LOCK.YAML"), false);
});

test("filterDiffs accounts for every input exactly once", () => {
  const diffs = [
    makeDiff("a.ts", "+1"),
    makeDiff("b.svg", "+2"),
    makeDiff("c.py", "+3"),
    makeDiff("d.pyc", "+4"),
    makeDiff("Cargo.lock", "+5"),
  ];

  const { reviewable, skipped } = filterDiffs(diffs, []);

  assert.equal(reviewable.length + skipped.length, diffs.length);
  assert.deepEqual(
    reviewable.map((diff) => diff.path),
    ["a.ts", "c.py"],
  );
  assert.deepEqual(skipped, ["b.svg", "d.pyc", "Cargo.lock"]);
});

test("filterDiffs keeps an empty input empty", () => {
  assert.deepEqual(filterDiffs([]), { reviewable: [], skipped: [] });
});
