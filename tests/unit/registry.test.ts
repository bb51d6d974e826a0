import {join} from "path";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {RegistryInconsistency, WorktreeNotFoundError} from "../../src/errors";
import {parseWorktreeList, WorktreeRegistry} from "../../src/registry";
import {porcelain} from "../helpers/fake-vcs";
import {makeDir, tempProject, type TempProject} from "../helpers/workspace";

describe("parseWorktreeList", () => {
  it("reads bare, branch, detached and locked records", () => {
    const stdout = [
      "worktree /p/.bare",
      "bare",
      "",
      "worktree /p/main",
      "HEAD 1111111111111111111111111111111111111111",
      "branch refs/heads/main",
      "",
      "worktree /p/feat/x",
      "HEAD 2222222222222222222222222222222222222222",
      "detached",
      "locked moved to a usb drive",
      ""
    ].join("\n");

    expect(parseWorktreeList(stdout)).toEqual([
      {path: "/p/.bare", head: "", branch: null, bare: true, detached: false, locked: false},
      {
        path: "/p/main",
        head: "1111111111111111111111111111111111111111",
        branch: "main",
        bare: false,
        detached: false,
        locked: false
      },
      {
        path: "/p/feat/x",
        head: "2222222222222222222222222222222222222222",
        branch: null,
        bare: false,
        detached: true,
        locked: true
      }
    ]);
  });

  it("returns nothing for empty output", () => {
    expect(parseWorktreeList("")).toEqual([]);
  });
});

describe("WorktreeRegistry", () => {
  let project: TempProject;
  let registry: WorktreeRegistry;

  beforeEach(() => {
    project = tempProject();
    registry = new WorktreeRegistry(project.workspace);
  });

  afterEach(() => {
    project.cleanup();
  });

  function register(): {main: string; login: string; old: string} {
    const {root, vcs, workspace} = project;
    const main = makeDir(root, "main");
    const login = makeDir(root, "feat/login");
    const old = join(root, "old");
    vcs
      .on(
        "worktree list --porcelain",
        porcelain(workspace.root.bareDir, [
          {path: main, branch: "main"},
          {path: login, branch: "feat/login"},
          {path: old, branch: "old"}
        ])
      )
      .on("for-each-ref", "refs/heads/main\torigin/main\nrefs/heads/feat/login\t\nrefs/heads/old\t\n")
      .on("status --porcelain", (_args, dir) => (dir === login ? " M app.ts\n" : ""));
    return {main, login, old};
  }

  it("lists worktrees with upstream, dirtiness and presence", async () => {
    const {main, login, old} = register();
    const {worktrees} = await registry.list();

    expect(worktrees).toEqual([
      {
        branch: "main",
        path: main,
        head: "0000000000000000000000000000000000000000",
        upstream: "origin/main",
        dirty: false,
        missing: false,
        detached: false,
        locked: false
      },
      {
        branch: "feat/login",
        path: login,
        head: "0000000000000000000000000000000000000000",
        upstream: undefined,
        dirty: true,
        missing: false,
        detached: false,
        locked: false
      },
      {
        branch: "old",
        path: old,
        head: "0000000000000000000000000000000000000000",
        upstream: undefined,
        dirty: false,
        missing: true,
        detached: false,
        locked: false
      }
    ]);
  });

  it("marks a worktree without a branch as detached", async () => {
    const {root, vcs, workspace} = project;
    const review = makeDir(root, "review");
    vcs
      .on("worktree list --porcelain", porcelain(workspace.root.bareDir, [{path: review}]))
      .on("for-each-ref", "")
      .on("status --porcelain", "");

    const {worktrees} = await registry.list();

    expect(worktrees.map(({branch, detached}) => ({branch, detached}))).toEqual([
      {branch: null, detached: true}
    ]);
  });

  it("reports missing and unregistered directories without repairing them", async () => {
    const {old} = register();
    const scratch = makeDir(project.root, "scratch");

    const {inconsistencies} = await registry.list();

    expect(inconsistencies.map((item) => [item.kind, item.path])).toEqual([
      ["missing-directory", old],
      ["unregistered-directory", scratch]
    ]);
    expect(inconsistencies[0].message).toBe(
      `Worktree "old" is registered at ${old} but the directory is missing`
    );
  });

  it("does not report parents of nested worktrees or reserved entries", async () => {
    register();
    const {inconsistencies} = await registry.list();
    expect(inconsistencies.filter((item) => item.kind === "unregistered-directory")).toEqual([]);
  });

  it("assertConsistent raises the first inconsistency", async () => {
    register();
    await expect(registry.assertConsistent()).rejects.toBeInstanceOf(RegistryInconsistency);
  });

  it("get raises WorktreeNotFoundError for an unknown branch", async () => {
    register();
    await expect(registry.get("feat/unknown")).rejects.toBeInstanceOf(WorktreeNotFoundError);
    expect((await registry.get("feat/login")).path).toBe(join(project.root, "feat", "login"));
  });
});
