/**
 * Worktree types shared by the registry, lifecycle and status modules
 */

export interface ProjectRoot {
  /** Absolute path of the directory holding the bare store and every worktree */
  path: string;
  /** Absolute path of the bare store, always `<path>/.bare` */
  bareDir: string;
}

export interface Worktree {
  /** Checked-out branch, null when `detached` */
  branch: string | null;
  path: string;
  head: string;
  /** Remote-tracking ref the branch follows, e.g. `origin/feat/login` */
  upstream?: string;
  dirty: boolean;
  /** Registered with git but absent on disk */
  missing: boolean;
  detached: boolean;
  locked: boolean;
}

export interface SyncState {
  branch: string;
  path: string;
  ahead: number;
  behind: number;
  merged: boolean;
  dirty: boolean;
}

export type SyncOutcomeKind =
  | "up-to-date"
  | "updated"
  | "ahead"
  | "diverged"
  | "no-upstream"
  | "gone"
  | "failed";

export interface SyncOutcome {
  branch: string;
  outcome: SyncOutcomeKind;
  upstream?: string;
  ahead: number;
  behind: number;
  error?: string;
}

export type CleanupOutcomeKind = "removed" | "skipped" | "failed";

export interface CleanupOutcome {
  branch: string;
  outcome: CleanupOutcomeKind;
  remoteDeleted: boolean;
  reason?: string;
}
