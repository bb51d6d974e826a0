import {existsSync, mkdtempSync, realpathSync, rmSync} from "fs";
import {tmpdir} from "os";
import {join} from "path";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {InvalidBranchNameError, InvalidPathError, ReservedNameError} from "../../src/errors";
import {Layout} from "../../src/layout";
import {makeDir} from "../helpers/workspace";

describe("Layout", () => {
  let root: string;
  let layout: Layout;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), "wt-layout-")));
    layout = new Layout(root, ["node_modules"]);
  });

  afterEach(() => {
    rmSync(root, {recursive: true, force: true});
  });

  describe("branchToPath", () => {
    it("maps each branch segment to a directory", () => {
      expect(layout.branchToPath("main")).toBe(join(root, "main"));
      expect(layout.branchToPath("feat/add-login")).toBe(join(root, "feat", "add-login"));
    });

    it("is reversed by pathToBranch", () => {
      for (const branch of ["main", "feat/add-login", "team/alice/spike"]) {
        expect(layout.pathToBranch(layout.branchToPath(branch))).toBe(branch);
      }
    });

    it("rejects reserved first segments", () => {
      expect(() => layout.branchToPath(".bare")).toThrow(ReservedNameError);
      expect(() => layout.branchToPath(".git/hooks")).toThrow(ReservedNameError);
      expect(() => layout.branchToPath("node_modules")).toThrow(ReservedNameError);
    });

    it("allows reserved names below the first segment", () => {
      expect(layout.branchToPath("feat/.bare")).toBe(join(root, "feat", ".bare"));
    });

    it.each(["", "/feat", "feat/", "feat//login", "feat/../main", "./main", "feat\\login"])(
      "rejects %j",
      (branch) => {
        expect(() => layout.branchToPath(branch)).toThrow(InvalidBranchNameError);
      }
    );
  });

  describe("pathToBranch", () => {
    it("rejects the root itself", () => {
      expect(() => layout.pathToBranch(root)).toThrow(InvalidPathError);
    });

    it("rejects paths outside the root", () => {
      expect(() => layout.pathToBranch(join(root, "..", "elsewhere"))).toThrow(InvalidPathError);
    });

    it("rejects paths inside the bare store", () => {
      expect(() => layout.pathToBranch(join(root, ".bare", "refs"))).toThrow(InvalidPathError);
    });

    it("resolves relative paths against the root", () => {
      expect(layout.pathToBranch("feat/login")).toBe("feat/login");
    });
  });

  it("contains only paths strictly inside the root", () => {
    expect(layout.contains(join(root, "main"))).toBe(true);
    expect(layout.contains(root)).toBe(false);
    expect(layout.contains(join(root, ".."))).toBe(false);
  });

  describe("orphanedParents", () => {
    it("returns the empty chain deepest first", () => {
      makeDir(root, "feat/team");
      const path = join(root, "feat", "team", "login");
      expect(layout.orphanedParents(path)).toEqual([join(root, "feat", "team"), join(root, "feat")]);
    });

    it("stops at a directory holding other entries", () => {
      makeDir(root, "feat/team");
      makeDir(root, "feat/other");
      const path = join(root, "feat", "team", "login");
      expect(layout.orphanedParents(path)).toEqual([join(root, "feat", "team")]);
    });

    it("is empty for a worktree directly under the root", () => {
      expect(layout.orphanedParents(join(root, "main"))).toEqual([]);
    });

    it("skips levels that no longer exist", () => {
      makeDir(root, "feat");
      const path = join(root, "feat", "team", "login");
      expect(layout.orphanedParents(path)).toEqual([join(root, "feat")]);
    });
  });

  it("removeOrphanedParents deletes the chain and keeps shared parents", () => {
    makeDir(root, "feat/team");
    makeDir(root, "feat/kept", true);
    const removed = layout.removeOrphanedParents(join(root, "feat", "team", "login"));

    expect(removed).toEqual([join(root, "feat", "team")]);
    expect(existsSync(join(root, "feat", "team"))).toBe(false);
    expect(existsSync(join(root, "feat", "kept", "README.md"))).toBe(true);
  });
});
