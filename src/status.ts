import {realpathSync} from "fs";
import {BranchNotFoundError, InvalidPathError, RebaseConflictError, VcsError, WorktreeNotFoundError} from "./errors";
import {lines, refExists, succeeds} from "./git";
import {defaultBranch, type Workspace} from "./project";
import {WorktreeRegistry} from "./registry";
import type {SyncOutcome, SyncState, Worktree} from "./worktree";

export interface StatusOptions {
  /** Report a single worktree */
  only?: string;
  /** Fetch from the remote before comparing */
  fetch?: boolean;
}

export interface StatusReport {
  target: string;
  targetRef: string;
  states: SyncState[];
}

export interface RebaseResult {
  branch: string;
  path: string;
  onto: string;
  stashed: boolean;
}

const AUTOSTASH_MESSAGE = "wt rebase autostash";

interface Autostash {
  sha: string;
  message: string;
}

interface StashEntry {
  sha: string;
  index: number;
}

/** Stash message naming the branch and this run, unique across processes */
export function autostashMessage(branch: string, pid = process.pid, now = Date.now()): string {
  return `${AUTOSTASH_MESSAGE} ${branch} ${pid}-${now}`;
}

function splitOnce(line: string, separator: string): [string, string] {
  const at = line.indexOf(separator);
  return at === -1 ? [line, ""] : [line.slice(0, at), line.slice(at + separator.length)];
}

/**
 * Parse `rev-list --left-right --count A...B`, which prints
 * `<only in A>\t<only in B>`.
 */
export function parseLeftRight(stdout: string): {left: number; right: number} {
  const [left, right] = stdout.trim().split(/\s+/);
  return {left: Number.parseInt(left, 10) || 0, right: Number.parseInt(right, 10) || 0};
}

/**
 * Computes each worktree's relationship to a target branch and moves
 * branches forward without ever discarding local commits.
 */
export class SyncEngine {
  private readonly registry: WorktreeRegistry;

  constructor(
    private readonly workspace: Workspace,
    registry?: WorktreeRegistry
  ) {
    this.registry = registry ?? new WorktreeRegistry(workspace);
  }

  /** The remote-tracking ref of `target` when there is one, else the local branch */
  async targetRef(target: string): Promise<string> {
    const {vcs, config} = this.workspace;
    const remoteRef = `refs/remotes/${config.remote}/${target}`;
    if (await refExists(vcs, remoteRef)) {
      return remoteRef;
    }
    const localRef = `refs/heads/${target}`;
    if (await refExists(vcs, localRef)) {
      return localRef;
    }
    throw new BranchNotFoundError(target);
  }

  async status(target?: string, options: StatusOptions = {}): Promise<StatusReport> {
    const {vcs, config} = this.workspace;
    if (options.fetch) {
      await vcs.run(["fetch", "--prune", config.remote]);
    }

    const resolvedTarget = target ?? (await defaultBranch(this.workspace));
    const targetRef = await this.targetRef(resolvedTarget);
    const targetTip = await this.revParse(targetRef);

    const {worktrees} = await this.registry.list();
    let selected = worktrees.filter(
      (worktree): worktree is Worktree & {branch: string} => worktree.branch !== null && !worktree.missing
    );
    if (options.only !== undefined) {
      selected = selected.filter((worktree) => worktree.branch === options.only);
      if (selected.length === 0) {
        throw new WorktreeNotFoundError(options.only);
      }
    }

    const states: SyncState[] = [];
    for (const worktree of selected) {
      const branchRef = `refs/heads/${worktree.branch}`;
      const tip = await this.revParse(branchRef);
      const {stdout} = await vcs.run(["rev-list", "--left-right", "--count", `${targetRef}...${branchRef}`]);
      const {left: behind, right: ahead} = parseLeftRight(stdout);

      // A branch sitting exactly on the target has no work of its own to have merged
      const merged =
        tip !== targetTip && (await succeeds(vcs, ["merge-base", "--is-ancestor", tip, targetTip]));

      states.push({
        branch: worktree.branch,
        path: worktree.path,
        ahead,
        behind,
        merged,
        dirty: worktree.dirty
      });
    }

    return {target: resolvedTarget, targetRef, states};
  }

  /**
   * Fast-forwards every worktree that follows an upstream. Diverged branches
   * are skipped; failures are collected, never thrown.
   */
  async sync(): Promise<SyncOutcome[]> {
    const {vcs, config} = this.workspace;
    await vcs.run(["fetch", "--prune", config.remote]);

    const {worktrees} = await this.registry.list();
    const outcomes: SyncOutcome[] = [];

    for (const worktree of worktrees) {
      if (worktree.branch === null || worktree.missing) {
        continue;
      }
      outcomes.push(await this.syncOne(worktree.branch, worktree));
    }
    return outcomes;
  }

  private async syncOne(branch: string, worktree: Worktree): Promise<SyncOutcome> {
    const {vcs} = this.workspace;
    const upstream = worktree.upstream;
    if (!upstream) {
      return {branch, outcome: "no-upstream", ahead: 0, behind: 0};
    }

    try {
      if (!(await refExists(vcs, `refs/remotes/${upstream}`))) {
        return {branch, outcome: "gone", upstream, ahead: 0, behind: 0};
      }

      const {stdout} = await vcs.run([
        "rev-list",
        "--left-right",
        "--count",
        `refs/heads/${branch}...refs/remotes/${upstream}`
      ]);
      const {left: ahead, right: behind} = parseLeftRight(stdout);

      if (behind === 0) {
        return {branch, outcome: ahead > 0 ? "ahead" : "up-to-date", upstream, ahead, behind};
      }
      if (ahead > 0) {
        return {branch, outcome: "diverged", upstream, ahead, behind};
      }

      await vcs.runInDir(worktree.path, ["merge", "--ff-only", `refs/remotes/${upstream}`]);
      return {branch, outcome: "updated", upstream, ahead, behind};
    } catch (error) {
      if (error instanceof VcsError) {
        return {branch, outcome: "failed", upstream, ahead: 0, behind: 0, error: error.stderr};
      }
      throw error;
    }
  }

  /**
   * Rebases the worktree containing `cwd` onto `target`, stashing local
   * changes around it. Conflicts are left for manual resolution.
   */
  async rebase(cwd: string, target?: string): Promise<RebaseResult> {
    const {vcs, config} = this.workspace;

    let path: string;
    try {
      path = (await vcs.runInDir(cwd, ["rev-parse", "--show-toplevel"])).stdout.trim();
    } catch (error) {
      if (error instanceof VcsError) {
        throw new InvalidPathError(cwd, "not inside a worktree");
      }
      throw error;
    }
    path = realpathSync(path);

    const branch = (await vcs.runInDir(path, ["branch", "--show-current"])).stdout.trim();
    if (!branch) {
      throw new InvalidPathError(path, "HEAD is detached");
    }

    const resolvedTarget = target ?? (await defaultBranch(this.workspace));
    if (await this.hasRemote()) {
      await vcs.run(["fetch", config.remote, resolvedTarget]);
    }
    const onto = await this.targetRef(resolvedTarget);

    // The stash stack is shared by every worktree of the bare store; other
    // processes may push or drop entries at any time. The entry is found by
    // its unique message, never by position.
    let stash: Autostash | null = null;
    if (await this.registry.isDirty(path)) {
      const message = autostashMessage(branch);
      await vcs.runInDir(path, ["stash", "push", "--include-untracked", "-m", message]);
      const entry = await this.findStash(path, message);
      if (!entry) {
        throw new Error(`The autostash "${message}" is missing from the stash list; the rebase was not started.`);
      }
      stash = {sha: entry.sha, message};
    }
    const stashed = stash !== null;

    try {
      await vcs.runInDir(path, ["rebase", onto]);
    } catch (error) {
      if (!(error instanceof VcsError)) {
        throw error;
      }
      const paths = await this.conflictedPaths(path);
      if (paths.length === 0) {
        // Rebase never started; put the changes back before reporting
        if (stash) {
          await this.restoreStash(path, stash);
        }
        throw error;
      }
      const note = stash
        ? `\nLocal changes are kept in stash commit ${stash.sha}; run \`git stash apply ${stash.sha}\` once the rebase is finished.`
        : "";
      throw new RebaseConflictError(branch, "rebase", paths, error.stderr + note);
    }

    if (stash) {
      try {
        await this.restoreStash(path, stash);
      } catch (error) {
        if (!(error instanceof VcsError)) {
          throw error;
        }
        const paths = await this.conflictedPaths(path);
        throw new RebaseConflictError(branch, "autostash", paths, error.stderr || error.message);
      }
    }

    return {branch, path, onto, stashed};
  }

  /**
   * Apply the stash commit, then drop its entry; a failed apply keeps it.
   * The entry's position is looked up again right before the drop.
   */
  private async restoreStash(path: string, stash: Autostash): Promise<void> {
    const {vcs} = this.workspace;
    await vcs.runInDir(path, ["stash", "apply", stash.sha]);
    const entry = await this.findStash(path, stash.message);
    if (entry && entry.sha === stash.sha) {
      await vcs.runInDir(path, ["stash", "drop", `stash@{${entry.index}}`]);
    }
  }

  private async findStash(path: string, message: string): Promise<StashEntry | null> {
    const {stdout} = await this.workspace.vcs.runInDir(path, ["stash", "list", "--format=%H %gs"]);
    const entries = lines(stdout);
    for (let index = 0; index < entries.length; index++) {
      const [sha, subject] = splitOnce(entries[index], " ");
      // Subjects read "On <branch>: <message>"
      if (subject.endsWith(`: ${message}`)) {
        return {sha, index};
      }
    }
    return null;
  }

  private async revParse(ref: string): Promise<string> {
    const {stdout} = await this.workspace.vcs.run(["rev-parse", "--verify", `${ref}^{commit}`]);
    return stdout.trim();
  }

  private async hasRemote(): Promise<boolean> {
    const {stdout} = await this.workspace.vcs.run(["remote"]);
    return lines(stdout).includes(this.workspace.config.remote);
  }

  private async conflictedPaths(path: string): Promise<string[]> {
    const {stdout} = await this.workspace.vcs.runInDir(path, ["diff", "--name-only", "--diff-filter=U"]);
    return lines(stdout);
  }
}
