import {existsSync, realpathSync, statSync} from "fs";
import {dirname, join, resolve} from "path";
import type {WtConfig} from "./config";
import {ProjectNotFoundError} from "./errors";
import {GitAdapter, type Vcs} from "./git";
import {BARE_DIR, Layout} from "./layout";
import type {ProjectRoot} from "./worktree";

/**
 * Everything an operation needs to act on one project.
 */
export interface Workspace {
  root: ProjectRoot;
  vcs: Vcs;
  layout: Layout;
  config: WtConfig;
}

/**
 * Symlinks are resolved so paths compare equal to the ones git reports.
 */
export function projectRootAt(path: string): ProjectRoot {
  const root = existsSync(path) ? realpathSync(path) : resolve(path);
  return {path: root, bareDir: join(root, BARE_DIR)};
}

export function isProjectRoot(path: string): boolean {
  const bareDir = join(path, BARE_DIR);
  return existsSync(bareDir) && statSync(bareDir).isDirectory();
}

/**
 * Walks up from `start` to the first directory holding a `.bare` store.
 */
export function findProjectRoot(start: string): ProjectRoot {
  let dir = resolve(start);
  for (;;) {
    if (isProjectRoot(dir)) {
      return projectRootAt(dir);
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new ProjectNotFoundError(resolve(start));
    }
    dir = parent;
  }
}

export function openWorkspace(root: ProjectRoot, config: WtConfig, vcs?: Vcs): Workspace {
  return {
    root,
    vcs: vcs ?? new GitAdapter(root.path, config.git),
    layout: new Layout(root.path, config.reservedNames),
    config
  };
}

/**
 * The default branch is the one the bare store's HEAD names, unless
 * overridden in the configuration.
 */
export async function defaultBranch(workspace: Workspace): Promise<string> {
  if (workspace.config.defaultBranch) {
    return workspace.config.defaultBranch;
  }
  const {stdout} = await workspace.vcs.runInDir(workspace.root.bareDir, [
    "symbolic-ref",
    "--short",
    "HEAD"
  ]);
  return stdout.trim();
}
