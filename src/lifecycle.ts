import {existsSync, mkdirSync, rmdirSync, rmSync, statSync, writeFileSync} from "fs";
import {dirname, join, resolve} from "path";
import type {WtConfig} from "./config";
import {
  BranchInUseError,
  CloneError,
  DirtyWorktreeError,
  InvalidBranchNameError,
  PathCollisionError,
  RenameError,
  UnpushedCommitsError,
  VcsError,
  WtError
} from "./errors";
import {refExists, type Vcs} from "./git";
import {BARE_DIR, GIT_FILE, isEmptyDirectory, isFsError} from "./layout";
import {defaultBranch, isProjectRoot, openWorkspace, projectRootAt, type Workspace} from "./project";
import {WorktreeRegistry} from "./registry";
import type {ProjectRoot, Worktree} from "./worktree";

export interface CloneOptions {
  cwd: string;
  config: WtConfig;
  vcs?: Vcs;
}

export interface CloneResult {
  root: ProjectRoot;
  defaultBranch: string;
  worktree: Worktree;
  /** The target already held a valid layout; only the default worktree was ensured */
  alreadyCloned: boolean;
}

export interface RemoveOptions {
  /** Remove even with uncommitted changes, and delete the branch even if unpushed */
  force?: boolean;
  deleteBranch?: boolean;
  /**
   * Ref the branch is known to be merged into. When set, branch deletion
   * checks ancestry of this ref instead of reachability from the remotes.
   */
  mergedInto?: string;
}

export interface RemoveResult {
  branch: string;
  path: string;
  removedParents: string[];
  branchDeleted: boolean;
}

export interface RenameResult {
  from: string;
  to: string;
  oldPath: string;
  path: string;
  removedParents: string[];
}

/**
 * Derive the directory name `git clone` would use:
 * `git@host:org/repo.git` and `https://host/org/repo.git` both give `repo`.
 */
export function repositoryName(url: string): string {
  const trimmed = url.trim().replace(/[/\\]+$/, "");
  const last = trimmed.split(/[/\\:]/).pop() ?? "";
  return last.replace(/\.git$/, "");
}

/**
 * Creates `<dir>/.bare` from `url` and materializes the default branch.
 */
export async function cloneProject(
  url: string,
  dir: string | undefined,
  options: CloneOptions
): Promise<CloneResult> {
  const name = dir ?? repositoryName(url);
  if (!name) {
    throw new CloneError(url, "cannot derive a directory name from the URL");
  }
  const target = resolve(options.cwd, name);

  let created = false;
  if (existsSync(target)) {
    if (!statSync(target).isDirectory()) {
      throw new CloneError(target, "path exists and is not a directory");
    }
    if (isProjectRoot(target)) {
      const workspace = openWorkspace(projectRootAt(target), options.config, options.vcs);
      const {branch, worktree} = await ensureDefaultWorktree(workspace);
      return {root: workspace.root, defaultBranch: branch, worktree, alreadyCloned: true};
    }
    if (!isEmptyDirectory(target)) {
      throw new CloneError(target, "directory is not empty and does not hold a worktree project");
    }
  } else {
    mkdirSync(target, {recursive: true});
    created = true;
  }

  const workspace = openWorkspace(projectRootAt(target), options.config, options.vcs);
  const {root, vcs, config} = workspace;

  try {
    const cloneArgs = ["clone", "--bare"];
    if (config.remote !== "origin") {
      cloneArgs.push("--origin", config.remote);
    }
    await vcs.runInDir(root.path, [...cloneArgs, url, BARE_DIR]);
    writeFileSync(join(root.path, GIT_FILE), `gitdir: ./${BARE_DIR}\n`);
    // Bare clones map remote heads straight onto local heads and keep no
    // remote-tracking refs; status and sync need them.
    await vcs.run([
      "config",
      `remote.${config.remote}.fetch`,
      `+refs/heads/*:refs/remotes/${config.remote}/*`
    ]);
    await vcs.run(["fetch", config.remote]);
  } catch (error) {
    if (created) {
      rmSync(target, {recursive: true, force: true});
    } else {
      rmSync(root.bareDir, {recursive: true, force: true});
      rmSync(join(root.path, GIT_FILE), {force: true});
    }
    if (error instanceof VcsError) {
      throw new CloneError(target, `git ${error.command[0]} failed`, error.stderr);
    }
    throw error;
  }

  const {branch, worktree} = await ensureDefaultWorktree(workspace);
  return {root, defaultBranch: branch, worktree, alreadyCloned: false};
}

async function ensureDefaultWorktree(
  workspace: Workspace
): Promise<{branch: string; worktree: Worktree}> {
  const branch = await defaultBranch(workspace);
  const registry = new WorktreeRegistry(workspace);
  const existing = await registry.find(branch);
  if (existing) {
    return {branch, worktree: existing};
  }
  const worktree = await new LifecycleController(workspace, registry).add(branch);
  return {branch, worktree};
}

/**
 * Creates, removes and renames worktrees. The only writer of worktree
 * registrations.
 */
export class LifecycleController {
  private readonly registry: WorktreeRegistry;

  constructor(
    private readonly workspace: Workspace,
    registry?: WorktreeRegistry
  ) {
    this.registry = registry ?? new WorktreeRegistry(workspace);
  }

  async add(branch: string, base?: string): Promise<Worktree> {
    const {vcs, layout, config} = this.workspace;
    const path = layout.branchToPath(branch);
    await this.checkRefFormat(branch);

    if (existsSync(path) && !isEmptyDirectory(path)) {
      throw new PathCollisionError(branch, path);
    }

    const existing = await this.registry.find(branch);
    if (existing) {
      throw new BranchInUseError(branch, `is already checked out at ${existing.path}`, {
        path: existing.path
      });
    }

    const remoteBranch = `${config.remote}/${branch}`;
    const hasLocal = await refExists(vcs, `refs/heads/${branch}`);
    const hasRemote = await refExists(vcs, `refs/remotes/${remoteBranch}`);

    let args: string[];
    if (hasLocal) {
      args = ["worktree", "add", path, branch];
    } else if (hasRemote) {
      args = ["worktree", "add", "--track", "-b", branch, path, remoteBranch];
    } else {
      const from = base ?? (await defaultBranch(this.workspace));
      args = ["worktree", "add", "--no-track", "-b", branch, path, from];
    }

    try {
      await vcs.run(args);
    } catch (error) {
      throw classifyAddFailure(error, branch, path);
    }

    if (hasLocal && hasRemote && !(await this.hasUpstream(branch))) {
      await vcs.run(["branch", `--set-upstream-to=${remoteBranch}`, branch]);
    }

    return this.registry.get(branch);
  }

  async rm(branch: string, options: RemoveOptions = {}): Promise<RemoveResult> {
    const {vcs, layout} = this.workspace;
    const worktree = await this.registry.get(branch);

    if (worktree.dirty && !options.force) {
      throw new DirtyWorktreeError(branch, worktree.path);
    }
    if (options.deleteBranch && !options.force) {
      await this.assertBranchDisposable(branch, options.mergedInto);
    }

    const args = ["worktree", "remove"];
    if (options.force || worktree.missing) {
      args.push("--force");
    }
    args.push(worktree.path);
    // Deletes the registration and the directory in one step
    await vcs.run(args);

    const removedParents = layout.contains(worktree.path)
      ? layout.removeOrphanedParents(worktree.path)
      : [];

    let branchDeleted = false;
    if (options.deleteBranch) {
      await vcs.run(["branch", "-D", branch]);
      branchDeleted = true;
    }

    return {branch, path: worktree.path, removedParents, branchDeleted};
  }

  /**
   * Renames the branch and moves its directory. The ref rename and the
   * directory move are two separate steps; a failed move rolls the ref back.
   */
  async rename(from: string, to: string): Promise<RenameResult> {
    const {vcs, layout} = this.workspace;
    const worktree = await this.registry.get(from);
    const path = layout.branchToPath(to);
    await this.checkRefFormat(to);

    const replacesEmptyDir = existsSync(path);
    if (replacesEmptyDir && !isEmptyDirectory(path)) {
      throw new PathCollisionError(to, path);
    }
    if (await refExists(vcs, `refs/heads/${to}`)) {
      throw new BranchInUseError(to, "already exists", {path});
    }
    if (worktree.missing) {
      throw new RenameError(from, to, `nothing was changed; the directory ${worktree.path} is missing`);
    }

    try {
      await vcs.run(["branch", "-m", from, to]);
    } catch (error) {
      throw new RenameError(from, to, "nothing was changed", diagnosticOf(error));
    }

    let createdDirs: string[] = [];
    try {
      // `worktree move` into an existing directory would nest the worktree inside it
      if (replacesEmptyDir) {
        rmdirSync(path);
      }
      createdDirs = createParents(path);
      await vcs.run(["worktree", "move", worktree.path, path]);
    } catch (error) {
      const diagnostic = diagnosticOf(error);
      removeCreated(createdDirs);
      if (replacesEmptyDir && !existsSync(path)) {
        mkdirSync(path);
      }
      try {
        await vcs.run(["branch", "-m", to, from]);
      } catch (rollbackError) {
        throw new RenameError(
          from,
          to,
          `branch is now "${to}" but its directory is still at ${worktree.path}; restoring the branch name failed`,
          [diagnostic, diagnosticOf(rollbackError)].join("\n")
        );
      }
      throw new RenameError(from, to, `rolled back; "${from}" is still at ${worktree.path}`, diagnostic);
    }

    const removedParents = layout.contains(worktree.path)
      ? layout.removeOrphanedParents(worktree.path)
      : [];
    return {from, to, oldPath: worktree.path, path, removedParents};
  }

  private async checkRefFormat(branch: string): Promise<void> {
    try {
      await this.workspace.vcs.run(["check-ref-format", "--branch", branch]);
    } catch (error) {
      if (error instanceof VcsError) {
        throw new InvalidBranchNameError(branch, "rejected by git", error.stderr);
      }
      throw error;
    }
  }

  private async hasUpstream(branch: string): Promise<boolean> {
    const {stdout} = await this.workspace.vcs.run([
      "for-each-ref",
      "--format=%(upstream)",
      `refs/heads/${branch}`
    ]);
    return stdout.trim().length > 0;
  }

  /**
   * A branch may be deleted without force when its commits survive
   * elsewhere: in `mergedInto`, or on some remote-tracking ref.
   */
  private async assertBranchDisposable(branch: string, mergedInto?: string): Promise<void> {
    const {vcs} = this.workspace;
    const ref = `refs/heads/${branch}`;
    const args = mergedInto
      ? ["rev-list", "--count", ref, "--not", mergedInto]
      : ["rev-list", "--count", ref, "--not", "--remotes"];
    const {stdout} = await vcs.run(args);
    const count = Number.parseInt(stdout.trim(), 10) || 0;
    if (count > 0) {
      throw new UnpushedCommitsError(branch, count);
    }
  }
}

function classifyAddFailure(error: unknown, branch: string, path: string): unknown {
  if (!(error instanceof VcsError)) {
    return error;
  }
  const text = error.stderr;
  if (/is already (checked out|used by worktree) at/.test(text)) {
    return new BranchInUseError(branch, "is already checked out in another worktree", {
      diagnostic: text
    });
  }
  if (/a branch named .* already exists/.test(text)) {
    return new BranchInUseError(branch, "was created concurrently", {diagnostic: text});
  }
  if (/cannot lock ref/.test(text)) {
    return new BranchInUseError(branch, "is being updated by another process", {diagnostic: text});
  }
  if (/already exists|already registered worktree/.test(text)) {
    return new PathCollisionError(branch, path, text);
  }
  return error;
}

function diagnosticOf(error: unknown): string {
  if (error instanceof WtError) {
    return error.diagnostic ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/** mkdir for each missing ancestor of `path`; returns them deepest first */
function createParents(path: string): string[] {
  const missing: string[] = [];
  let dir = dirname(path);
  while (!existsSync(dir)) {
    missing.push(dir);
    dir = dirname(dir);
  }
  for (const created of [...missing].reverse()) {
    mkdirSync(created);
  }
  return missing;
}

function removeCreated(dirs: string[]): void {
  for (const dir of dirs) {
    try {
      rmdirSync(dir);
    } catch (error) {
      if (isFsError(error, "ENOENT")) {
        continue;
      }
      if (isFsError(error, "ENOTEMPTY")) {
        return;
      }
      throw error;
    }
  }
}
