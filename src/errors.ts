/**
 * Error kinds raised by the worktree manager.
 * Every kind carries the process exit code the CLI reports for it.
 */

export const ExitCode = {
  Unexpected: 1,
  Vcs: 10,
  ReservedName: 11,
  PathCollision: 12,
  BranchInUse: 13,
  DirtyWorktree: 14,
  Rename: 15,
  RebaseConflict: 16,
  RegistryInconsistency: 17,
  Clone: 18,
  WorktreeNotFound: 19,
  InvalidBranchName: 20,
  ProjectNotFound: 21,
  UnpushedCommits: 22,
  PartialFailure: 23,
  InvalidPath: 24,
  BranchNotFound: 25
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export interface WtErrorContext {
  branch?: string;
  path?: string;
  /** Diagnostic text of the underlying tool, kept verbatim */
  diagnostic?: string;
}

export abstract class WtError extends Error {
  /** Process exit status the CLI reports for this kind */
  abstract readonly exitStatus: ExitCodeValue;
  readonly branch?: string;
  readonly path?: string;
  readonly diagnostic?: string;

  constructor(message: string, context: WtErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.branch = context.branch;
    this.path = context.path;
    this.diagnostic = context.diagnostic;
  }
}

export class VcsError extends WtError {
  readonly exitStatus = ExitCode.Vcs;

  constructor(
    readonly command: string[],
    readonly exitCode: number,
    readonly stderr: string
  ) {
    super(`git ${command.join(" ")} failed with exit code ${exitCode}`, {
      diagnostic: stderr
    });
  }
}

export class ReservedNameError extends WtError {
  readonly exitStatus = ExitCode.ReservedName;

  constructor(branch: string, reserved: string) {
    super(`Branch "${branch}" uses the reserved name "${reserved}"`, {branch});
  }
}

export class InvalidBranchNameError extends WtError {
  readonly exitStatus = ExitCode.InvalidBranchName;

  constructor(branch: string, reason: string, diagnostic?: string) {
    super(`Invalid branch name "${branch}": ${reason}`, {branch, diagnostic});
  }
}

export class InvalidPathError extends WtError {
  readonly exitStatus = ExitCode.InvalidPath;

  constructor(path: string, reason: string) {
    super(`${path} is not a worktree location: ${reason}`, {path});
  }
}

export class PathCollisionError extends WtError {
  readonly exitStatus = ExitCode.PathCollision;

  constructor(branch: string, path: string, diagnostic?: string) {
    super(`Cannot place "${branch}" at ${path}: path already exists and is not an empty directory`, {
      branch,
      path,
      diagnostic
    });
  }
}

export class BranchInUseError extends WtError {
  readonly exitStatus = ExitCode.BranchInUse;

  constructor(branch: string, detail: string, context: {path?: string; diagnostic?: string} = {}) {
    super(`Branch "${branch}" ${detail}`, {branch, ...context});
  }
}

export class DirtyWorktreeError extends WtError {
  readonly exitStatus = ExitCode.DirtyWorktree;

  constructor(branch: string, path: string) {
    super(`Worktree "${branch}" at ${path} has uncommitted changes. Use --force to remove anyway.`, {
      branch,
      path
    });
  }
}

export class UnpushedCommitsError extends WtError {
  readonly exitStatus = ExitCode.UnpushedCommits;

  constructor(branch: string, readonly count: number) {
    super(
      `Branch "${branch}" has ${count} commit(s) not on any remote. Use --force to delete it anyway.`,
      {branch}
    );
  }
}

export class RenameError extends WtError {
  readonly exitStatus = ExitCode.Rename;

  constructor(
    readonly from: string,
    readonly to: string,
    readonly residualState: string,
    diagnostic?: string
  ) {
    super(`Renaming "${from}" to "${to}" failed: ${residualState}`, {branch: from, diagnostic});
  }
}

export type ConflictStage = "rebase" | "autostash";

export class RebaseConflictError extends WtError {
  readonly exitStatus = ExitCode.RebaseConflict;

  constructor(
    branch: string,
    readonly stage: ConflictStage,
    readonly paths: string[],
    diagnostic?: string
  ) {
    super(
      stage === "rebase"
        ? `Rebase of "${branch}" stopped on conflicts in: ${paths.join(", ") || "(unknown paths)"}`
        : `Rebase of "${branch}" finished but restoring stashed changes conflicted in: ${
            paths.join(", ") || "(unknown paths)"
          }. The stash was kept.`,
      {branch, diagnostic}
    );
  }
}

export type InconsistencyKind = "missing-directory" | "unregistered-directory";

export class RegistryInconsistency extends WtError {
  readonly exitStatus = ExitCode.RegistryInconsistency;

  constructor(readonly kind: InconsistencyKind, path: string, branch?: string) {
    super(
      kind === "missing-directory"
        ? `Worktree${branch ? ` "${branch}"` : ""} is registered at ${path} but the directory is missing`
        : `Directory ${path} is not a registered worktree`,
      {branch, path}
    );
  }
}

export class CloneError extends WtError {
  readonly exitStatus = ExitCode.Clone;

  constructor(path: string, reason: string, diagnostic?: string) {
    super(`Cannot clone into ${path}: ${reason}`, {path, diagnostic});
  }
}

export class WorktreeNotFoundError extends WtError {
  readonly exitStatus = ExitCode.WorktreeNotFound;

  constructor(branch: string) {
    super(`No worktree is checked out for branch "${branch}"`, {branch});
  }
}

export class BranchNotFoundError extends WtError {
  readonly exitStatus = ExitCode.BranchNotFound;

  constructor(branch: string) {
    super(`Branch "${branch}" exists neither locally nor on the remote`, {branch});
  }
}

export class ProjectNotFoundError extends WtError {
  readonly exitStatus = ExitCode.ProjectNotFound;

  constructor(start: string) {
    super(`${start} is not inside a worktree project (no .bare directory found)`, {path: start});
  }
}

export class PartialFailureError extends WtError {
  readonly exitStatus = ExitCode.PartialFailure;

  constructor(operation: string, readonly failed: string[]) {
    super(`${operation} failed for ${failed.length} worktree(s): ${failed.join(", ")}`);
  }
}
