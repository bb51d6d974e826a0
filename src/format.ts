import {relative} from "path";
import type {StatusReport} from "./status";
import type {CleanupOutcome, SyncOutcome, Worktree} from "./worktree";

/**
 * Lay out rows in columns separated by two spaces. The last column is not
 * padded.
 */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length))
  );
  const render = (cells: string[]): string =>
    cells
      .map((cell, column) => (column === cells.length - 1 ? cell : cell.padEnd(widths[column])))
      .join("  ")
      .trimEnd();
  return [render(headers), ...rows.map(render)].join("\n");
}

export function displayPath(path: string, root: string): string {
  const rel = relative(root, path);
  return rel && !rel.startsWith("..") ? rel : path;
}

function describeWorktree(worktree: Worktree): string {
  const parts: string[] = [];
  if (worktree.missing) {
    parts.push("missing");
  } else {
    parts.push(worktree.dirty ? "dirty" : "clean");
  }
  if (worktree.locked) {
    parts.push("locked");
  }
  if (worktree.upstream) {
    parts.push(`tracks ${worktree.upstream}`);
  }
  return parts.join(", ");
}

export function formatWorktreeList(worktrees: Worktree[], root: string): string {
  if (worktrees.length === 0) {
    return "No worktrees found.";
  }
  return formatTable(
    ["BRANCH", "PATH", "STATE"],
    worktrees.map((worktree) => [
      worktree.detached || worktree.branch === null
        ? `(detached at ${worktree.head.slice(0, 7)})`
        : worktree.branch,
      displayPath(worktree.path, root),
      describeWorktree(worktree)
    ])
  );
}

export function shortRef(ref: string): string {
  return ref.replace(/^refs\/(heads|remotes)\//, "");
}

const yesNo = (value: boolean): string => (value ? "yes" : "no");

export function formatStatus(report: StatusReport): string {
  const header = `Compared with ${shortRef(report.targetRef)}`;
  if (report.states.length === 0) {
    return `${header}\nNo worktrees found.`;
  }
  const table = formatTable(
    ["BRANCH", "AHEAD", "BEHIND", "MERGED", "DIRTY"],
    report.states.map((state) => [
      state.branch,
      String(state.ahead),
      String(state.behind),
      yesNo(state.merged),
      yesNo(state.dirty)
    ])
  );
  return `${header}\n${table}`;
}

function describeSync(outcome: SyncOutcome): string {
  const upstream = outcome.upstream ?? "upstream";
  switch (outcome.outcome) {
    case "up-to-date":
      return "up to date";
    case "updated":
      return `fast-forwarded ${outcome.behind} commit(s) from ${upstream}`;
    case "ahead":
      return `${outcome.ahead} commit(s) ahead of ${upstream}, nothing to pull`;
    case "diverged":
      return `diverged from ${upstream} (${outcome.ahead} ahead, ${outcome.behind} behind), skipped`;
    case "no-upstream":
      return "no upstream, skipped";
    case "gone":
      return `upstream ${upstream} no longer exists, skipped`;
    case "failed":
      return `failed: ${outcome.error ?? "unknown error"}`;
  }
}

export function formatSyncReport(outcomes: SyncOutcome[]): string {
  if (outcomes.length === 0) {
    return "No worktrees to sync.";
  }
  return outcomes.map((outcome) => `${outcome.branch}: ${describeSync(outcome)}`).join("\n");
}

export function formatCleanupReport(outcomes: CleanupOutcome[]): string {
  return outcomes
    .map((outcome) => {
      switch (outcome.outcome) {
        case "removed":
          return outcome.remoteDeleted
            ? `removed ${outcome.branch} (remote branch deleted)`
            : `removed ${outcome.branch}`;
        case "skipped":
          return `skipped ${outcome.branch}: ${outcome.reason ?? "not removable"}`;
        case "failed":
          return `failed ${outcome.branch}: ${outcome.reason ?? "unknown error"}`;
      }
    })
    .join("\n");
}
