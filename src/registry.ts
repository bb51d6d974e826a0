import {existsSync, readdirSync} from "fs";
import {join, resolve, dirname} from "path";
import {RegistryInconsistency, WorktreeNotFoundError} from "./errors";
import {lines} from "./git";
import type {Workspace} from "./project";
import type {Worktree} from "./worktree";

export interface RegistrySnapshot {
  worktrees: Worktree[];
  inconsistencies: RegistryInconsistency[];
}

interface PorcelainEntry {
  path: string;
  head: string;
  branch: string | null;
  bare: boolean;
  detached: boolean;
  locked: boolean;
}

const HEADS_PREFIX = "refs/heads/";

/**
 * Parse `git worktree list --porcelain`: blank-line separated records of
 * `key value` lines.
 */
export function parseWorktreeList(stdout: string): PorcelainEntry[] {
  const entries: PorcelainEntry[] = [];
  let current: PorcelainEntry | null = null;

  for (const raw of stdout.split("\n")) {
    const line = raw.trimEnd();
    if (!line) {
      current = null;
      continue;
    }

    const space = line.indexOf(" ");
    const key = space === -1 ? line : line.slice(0, space);
    const value = space === -1 ? "" : line.slice(space + 1);

    if (key === "worktree") {
      current = {path: value, head: "", branch: null, bare: false, detached: false, locked: false};
      entries.push(current);
      continue;
    }
    if (!current) {
      continue;
    }

    if (key === "HEAD") current.head = value;
    if (key === "branch") {
      current.branch = value.startsWith(HEADS_PREFIX) ? value.slice(HEADS_PREFIX.length) : value;
    }
    if (key === "bare") current.bare = true;
    if (key === "detached") current.detached = true;
    if (key === "locked") current.locked = true;
  }

  return entries;
}

/**
 * Read model over the worktrees registered in the project's bare store.
 * Drift between registrations and directories is reported, never repaired.
 */
export class WorktreeRegistry {
  constructor(private readonly workspace: Workspace) {}

  async list(): Promise<RegistrySnapshot> {
    const {vcs} = this.workspace;
    const {stdout} = await vcs.run(["worktree", "list", "--porcelain"]);
    const entries = parseWorktreeList(stdout).filter((entry) => !entry.bare);
    const upstreams = await this.readUpstreams();

    const worktrees: Worktree[] = [];
    const inconsistencies: RegistryInconsistency[] = [];

    for (const entry of entries) {
      const missing = !existsSync(entry.path);
      if (missing) {
        inconsistencies.push(
          new RegistryInconsistency("missing-directory", entry.path, entry.branch ?? undefined)
        );
      }

      worktrees.push({
        branch: entry.branch,
        path: entry.path,
        head: entry.head,
        upstream: entry.branch ? upstreams.get(entry.branch) : undefined,
        dirty: missing ? false : await this.isDirty(entry.path),
        missing,
        detached: entry.detached,
        locked: entry.locked
      });
    }

    inconsistencies.push(...this.findUnregistered(worktrees.map((worktree) => worktree.path)));
    return {worktrees, inconsistencies};
  }

  async find(branch: string): Promise<Worktree | undefined> {
    const {worktrees} = await this.list();
    return worktrees.find((worktree) => worktree.branch === branch);
  }

  async get(branch: string): Promise<Worktree> {
    const worktree = await this.find(branch);
    if (!worktree) {
      throw new WorktreeNotFoundError(branch);
    }
    return worktree;
  }

  async assertConsistent(): Promise<RegistrySnapshot> {
    const snapshot = await this.list();
    if (snapshot.inconsistencies.length > 0) {
      throw snapshot.inconsistencies[0];
    }
    return snapshot;
  }

  async isDirty(path: string): Promise<boolean> {
    const {stdout} = await this.workspace.vcs.runInDir(path, ["status", "--porcelain"]);
    return stdout.trim().length > 0;
  }

  private async readUpstreams(): Promise<Map<string, string>> {
    const {stdout} = await this.workspace.vcs.run([
      "for-each-ref",
      "--format=%(refname)%09%(upstream:short)",
      HEADS_PREFIX
    ]);

    const upstreams = new Map<string, string>();
    for (const line of lines(stdout)) {
      const [ref, upstream] = line.split("\t");
      if (ref && upstream) {
        upstreams.set(ref.slice(HEADS_PREFIX.length), upstream);
      }
    }
    return upstreams;
  }

  /**
   * Directories under the root that are neither a registered worktree, an
   * ancestor of one, nor reserved.
   */
  private findUnregistered(registeredPaths: string[]): RegistryInconsistency[] {
    const {layout} = this.workspace;
    const registered = new Set(registeredPaths.map((path) => resolve(path)));
    const ancestors = new Set<string>();

    for (const path of registered) {
      if (!layout.contains(path)) {
        continue;
      }
      let dir = dirname(path);
      while (dir !== layout.root && layout.contains(dir)) {
        ancestors.add(dir);
        dir = dirname(dir);
      }
    }

    const found: RegistryInconsistency[] = [];
    const walk = (dir: string): void => {
      for (const entry of readdirSync(dir, {withFileTypes: true})) {
        if (!entry.isDirectory()) {
          continue;
        }
        if (dir === layout.root && layout.reserved.has(entry.name)) {
          continue;
        }
        const full = join(dir, entry.name);
        if (registered.has(full)) {
          continue;
        }
        if (ancestors.has(full)) {
          walk(full);
        } else {
          found.push(new RegistryInconsistency("unregistered-directory", full));
        }
      }
    };

    walk(layout.root);
    return found;
  }
}
