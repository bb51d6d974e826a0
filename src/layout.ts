import {existsSync, readdirSync, rmdirSync} from "fs";
import {dirname, isAbsolute, join, relative, resolve, sep, basename} from "path";
import {InvalidBranchNameError, InvalidPathError, ReservedNameError} from "./errors";

export const BARE_DIR = ".bare";
export const GIT_FILE = ".git";

const BRANCH_SEPARATOR = "/";

/**
 * Maps branch names to directories under the project root and back.
 * `feat/add-login` lives at `<root>/feat/add-login`.
 */
export class Layout {
  readonly root: string;
  readonly reserved: ReadonlySet<string>;

  constructor(root: string, extraReserved: string[] = []) {
    this.root = resolve(root);
    this.reserved = new Set([BARE_DIR, GIT_FILE, ...extraReserved]);
  }

  validateBranch(branch: string): void {
    if (!branch) {
      throw new InvalidBranchNameError(branch, "name is empty");
    }
    if (branch.includes("\\")) {
      throw new InvalidBranchNameError(branch, "backslashes are not allowed");
    }
    if (branch.startsWith(BRANCH_SEPARATOR) || branch.endsWith(BRANCH_SEPARATOR)) {
      throw new InvalidBranchNameError(branch, "name cannot start or end with /");
    }

    const segments = branch.split(BRANCH_SEPARATOR);
    if (segments.some((segment) => segment === "" || segment === "." || segment === "..")) {
      throw new InvalidBranchNameError(branch, "empty, . and .. path segments are not allowed");
    }
    if (this.reserved.has(segments[0])) {
      throw new ReservedNameError(branch, segments[0]);
    }
  }

  branchToPath(branch: string): string {
    this.validateBranch(branch);
    return join(this.root, ...branch.split(BRANCH_SEPARATOR));
  }

  pathToBranch(path: string): string {
    const rel = relative(this.root, resolve(this.root, path));
    if (!rel) {
      throw new InvalidPathError(path, "the project root itself holds no branch");
    }
    if (rel.startsWith("..") || isAbsolute(rel)) {
      throw new InvalidPathError(path, "outside the project root");
    }

    const segments = rel.split(sep);
    if (this.reserved.has(segments[0])) {
      throw new InvalidPathError(path, `"${segments[0]}" is reserved`);
    }
    return segments.join(BRANCH_SEPARATOR);
  }

  /** True when `path` is strictly inside the project root */
  contains(path: string): boolean {
    const rel = relative(this.root, resolve(path));
    return rel.length > 0 && !rel.startsWith("..") && !isAbsolute(rel);
  }

  /**
   * Directories left empty by removing the worktree at `path`, deepest first.
   * The walk stops at the project root or at the first directory that holds
   * anything besides the chain being removed.
   */
  orphanedParents(path: string): string[] {
    const chain: string[] = [];
    let child = resolve(path);
    let dir = dirname(child);

    while (dir !== this.root && this.contains(dir)) {
      if (!existsSync(dir)) {
        child = dir;
        dir = dirname(dir);
        continue;
      }
      const others = readdirSync(dir).filter((entry) => entry !== basename(child));
      if (others.length > 0) {
        break;
      }
      chain.push(dir);
      child = dir;
      dir = dirname(dir);
    }

    return chain;
  }

  /**
   * Deletes the orphaned parents of `path`. Uses rmdir so a directory that
   * gained an entry in the meantime stops the walk instead of being deleted.
   */
  removeOrphanedParents(path: string): string[] {
    const removed: string[] = [];
    for (const dir of this.orphanedParents(path)) {
      try {
        rmdirSync(dir);
      } catch (error) {
        if (isFsError(error, "ENOTEMPTY") || isFsError(error, "EEXIST")) {
          break;
        }
        if (isFsError(error, "ENOENT")) {
          continue;
        }
        throw error;
      }
      removed.push(dir);
    }
    return removed;
  }
}

export function isFsError(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export function isEmptyDirectory(path: string): boolean {
  try {
    return readdirSync(path).length === 0;
  } catch (error) {
    if (isFsError(error, "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}
