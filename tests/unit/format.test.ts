import {describe, expect, it} from "vitest";
import {
  formatCleanupReport,
  formatStatus,
  formatSyncReport,
  formatTable,
  formatWorktreeList,
  shortRef
} from "../../src/format";
import type {Worktree} from "../../src/worktree";

function worktree(overrides: Partial<Worktree>): Worktree {
  return {
    branch: "main",
    path: "/p/main",
    head: "abcdef1234567890",
    dirty: false,
    missing: false,
    detached: false,
    locked: false,
    ...overrides
  };
}

describe("formatTable", () => {
  it("pads every column but the last", () => {
    expect(formatTable(["A", "LONG"], [["xyz", "1"]])).toBe("A    LONG\nxyz  1");
  });
});

describe("formatWorktreeList", () => {
  it("shows branch, relative path and state", () => {
    const output = formatWorktreeList(
      [
        worktree({upstream: "origin/main"}),
        worktree({branch: "feat/x", path: "/p/feat/x", dirty: true})
      ],
      "/p"
    );

    expect(output.split("\n")).toEqual([
      "BRANCH  PATH    STATE",
      "main    main    clean, tracks origin/main",
      "feat/x  feat/x  dirty"
    ]);
  });

  it("labels detached and missing worktrees", () => {
    const output = formatWorktreeList(
      [worktree({branch: null, detached: true, path: "/p/old", missing: true, locked: true})],
      "/p"
    );

    expect(output.split("\n")).toEqual([
      `BRANCH${" ".repeat(17)}PATH  STATE`,
      "(detached at abcdef1)  old   missing, locked"
    ]);
  });

  it("keeps absolute paths outside the root", () => {
    const output = formatWorktreeList([worktree({path: "/elsewhere/main"})], "/p");
    expect(output.split("\n")[1]).toBe("main    /elsewhere/main  clean");
  });

  it("says so when there are no worktrees", () => {
    expect(formatWorktreeList([], "/p")).toBe("No worktrees found.");
  });
});

describe("shortRef", () => {
  it("drops the heads and remotes prefixes", () => {
    expect(shortRef("refs/remotes/origin/main")).toBe("origin/main");
    expect(shortRef("refs/heads/feat/x")).toBe("feat/x");
    expect(shortRef("v1.0")).toBe("v1.0");
  });
});

describe("formatStatus", () => {
  it("renders counts and yes/no flags", () => {
    const output = formatStatus({
      target: "main",
      targetRef: "refs/remotes/origin/main",
      states: [
        {branch: "feat/a", path: "/p/feat/a", ahead: 2, behind: 0, merged: false, dirty: true},
        {branch: "feat/b", path: "/p/feat/b", ahead: 0, behind: 1, merged: true, dirty: false}
      ]
    });

    expect(output.split("\n")).toEqual([
      "Compared with origin/main",
      "BRANCH  AHEAD  BEHIND  MERGED  DIRTY",
      "feat/a  2      0       no      yes",
      "feat/b  0      1       yes     no"
    ]);
  });

  it("notes an empty project", () => {
    expect(formatStatus({target: "main", targetRef: "refs/heads/main", states: []})).toBe(
      "Compared with main\nNo worktrees found."
    );
  });
});

describe("formatSyncReport", () => {
  it("describes each outcome on its own line", () => {
    const output = formatSyncReport([
      {branch: "main", outcome: "up-to-date", upstream: "origin/main", ahead: 0, behind: 0},
      {branch: "feat/a", outcome: "updated", upstream: "origin/feat/a", ahead: 0, behind: 2},
      {branch: "feat/b", outcome: "ahead", upstream: "origin/feat/b", ahead: 1, behind: 0},
      {branch: "feat/c", outcome: "diverged", upstream: "origin/feat/c", ahead: 1, behind: 3},
      {branch: "feat/d", outcome: "no-upstream", ahead: 0, behind: 0},
      {branch: "feat/e", outcome: "gone", upstream: "origin/feat/e", ahead: 0, behind: 0},
      {branch: "feat/f", outcome: "failed", upstream: "origin/feat/f", ahead: 0, behind: 0, error: "boom"}
    ]);

    expect(output.split("\n")).toEqual([
      "main: up to date",
      "feat/a: fast-forwarded 2 commit(s) from origin/feat/a",
      "feat/b: 1 commit(s) ahead of origin/feat/b, nothing to pull",
      "feat/c: diverged from origin/feat/c (1 ahead, 3 behind), skipped",
      "feat/d: no upstream, skipped",
      "feat/e: upstream origin/feat/e no longer exists, skipped",
      "feat/f: failed: boom"
    ]);
  });

  it("says so when there is nothing to sync", () => {
    expect(formatSyncReport([])).toBe("No worktrees to sync.");
  });
});

describe("formatCleanupReport", () => {
  it("describes removals, skips and failures", () => {
    const output = formatCleanupReport([
      {branch: "feat/a", outcome: "removed", remoteDeleted: true},
      {branch: "feat/b", outcome: "removed", remoteDeleted: false},
      {branch: "feat/c", outcome: "skipped", remoteDeleted: false, reason: "uncommitted changes"},
      {branch: "feat/d", outcome: "failed", remoteDeleted: false, reason: "boom"}
    ]);

    expect(output.split("\n")).toEqual([
      "removed feat/a (remote branch deleted)",
      "removed feat/b",
      "skipped feat/c: uncommitted changes",
      "failed feat/d: boom"
    ]);
  });
});
