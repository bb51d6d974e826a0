import {DirtyWorktreeError, VcsError, WtError} from "./errors";
import {refExists} from "./git";
import {LifecycleController} from "./lifecycle";
import {defaultBranch, type Workspace} from "./project";
import {SyncEngine} from "./status";
import type {CleanupOutcome, SyncState} from "./worktree";

export interface CleanupPlan {
  target: string;
  targetRef: string;
  /** Branches whose worktrees are merged into the target, in registry order */
  branches: string[];
  states: SyncState[];
}

/**
 * Finds worktrees merged into a target and removes them together with
 * their local and remote branches.
 */
export class CleanupPlanner {
  private readonly engine: SyncEngine;
  private readonly lifecycle: LifecycleController;

  constructor(
    private readonly workspace: Workspace,
    engine?: SyncEngine,
    lifecycle?: LifecycleController
  ) {
    this.engine = engine ?? new SyncEngine(workspace);
    this.lifecycle = lifecycle ?? new LifecycleController(workspace);
  }

  async plan(target?: string): Promise<CleanupPlan> {
    const report = await this.engine.status(target);
    // The default worktree lives for the whole life of the project
    const keep = new Set([report.target, await defaultBranch(this.workspace)]);
    const merged = report.states.filter((state) => state.merged && !keep.has(state.branch));
    return {
      target: report.target,
      targetRef: report.targetRef,
      branches: merged.map((state) => state.branch),
      states: report.states
    };
  }

  /**
   * Removes every planned worktree. One failure never stops the rest; every
   * outcome is returned.
   */
  async execute(plan: CleanupPlan): Promise<CleanupOutcome[]> {
    const outcomes: CleanupOutcome[] = [];
    for (const branch of plan.branches) {
      outcomes.push(await this.removeOne(branch, plan.targetRef));
    }
    return outcomes;
  }

  private async removeOne(branch: string, targetRef: string): Promise<CleanupOutcome> {
    const {vcs, config} = this.workspace;

    try {
      await this.lifecycle.rm(branch, {deleteBranch: true, mergedInto: targetRef});
    } catch (error) {
      if (error instanceof DirtyWorktreeError) {
        return {branch, outcome: "skipped", remoteDeleted: false, reason: "uncommitted changes"};
      }
      if (error instanceof WtError) {
        return {branch, outcome: "failed", remoteDeleted: false, reason: describe(error)};
      }
      throw error;
    }

    if (!(await refExists(vcs, `refs/remotes/${config.remote}/${branch}`))) {
      return {branch, outcome: "removed", remoteDeleted: false};
    }

    try {
      await vcs.run(["push", config.remote, "--delete", branch]);
    } catch (error) {
      if (error instanceof VcsError) {
        return {
          branch,
          outcome: "failed",
          remoteDeleted: false,
          reason: `worktree removed but deleting ${config.remote}/${branch} failed: ${error.stderr}`
        };
      }
      throw error;
    }
    return {branch, outcome: "removed", remoteDeleted: true};
  }
}

function describe(error: WtError): string {
  return error.diagnostic ? `${error.message}: ${error.diagnostic}` : error.message;
}
