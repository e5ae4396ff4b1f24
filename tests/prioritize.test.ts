import assert from "node:assert/strict";
import test from "node:test";

import { prioritizeDiffs, riskScore } from "../src/prioritize.js";
import { makeDiff } from "./helpers.js";

test("riskScore adds ten per keyword and five for a new file", () => {
  assert.equal(riskScore(makeDiff("README.md", "")), 0);
  assert.equal(riskScore(makeDiff("config/secrets.py", "")), 20);
  assert.equal(riskScore(makeDiff("src/db/migrate_env.ts", "")), 30);
  assert.equal(riskScore(makeDiff("src/helpers.ts", "", { isNew: true })), 5);
});

test("riskScore counts overlapping keywords separately", () => {
  assert.equal(riskScore(makeDiff("src/auth/oauth.ts", "")), 20);
});

test("riskScore ignores path case", () => {
  assert.equal(riskScore(makeDiff("SRC/AUTH/Login.ts", "")), 10);
});

test("prioritizeDiffs puts sensitive paths first", () => {
  const diffs = [
    makeDiff("README.md", "+docs"),
    makeDiff("src/helpers.ts", "+helper", { isNew: true }),
    makeDiff("config/secrets.py", "+API_URL = 'x'"),
    makeDiff("src/auth/oauth.ts", "+flow"),
  ];

  const ordered = prioritizeDiffs(diffs).map((diff) => diff.path);

  assert.deepEqual(ordered, ["config/secrets.py", "src/auth/oauth.ts", "src/helpers.ts", "README.md"]);
});

test("prioritizeDiffs keeps input order among equal scores", () => {
  const diffs = ["c.ts", "a.ts", "b.ts"].map((path) => makeDiff(path, "+x"));

  assert.deepEqual(
    prioritizeDiffs(diffs).map((diff) => diff.path),
    ["c.ts", "a.ts", "b.ts"],
  );
});

test("prioritizeDiffs does not reorder its input array", () => {
  const diffs = [makeDiff("README.md", "+x"), makeDiff("auth.ts", "+y")];
  prioritizeDiffs(diffs);
  assert.equal(diffs[0].path, "README.md");
});
