import execa from "execa";
import {existsSync, realpathSync} from "fs";
import {defaultBranch, type Workspace} from "./project";
import {WorktreeRegistry} from "./registry";

/** Starts `command` in `cwd` attached to the terminal; resolves to its exit code */
export type TerminalRunner = (command: string, cwd: string) => Promise<number>;

export interface LaunchResult {
  dir: string;
  relocated: boolean;
  exitCode: number;
}

export const runInTerminal: TerminalRunner = async (command, cwd) => {
  const result = await execa(command, [], {
    cwd,
    stdio: "inherit",
    reject: false
  });
  if (result.failed && typeof result.exitCode !== "number") {
    throw new Error(`${command} could not be started in ${cwd}`);
  }
  return result.exitCode;
};

export interface LaunchOptions {
  run?: TerminalRunner;
  /** Called before starting when the tool is moved out of the project root */
  onRelocate?: (dir: string) => void;
}

/**
 * Runs the terminal UI. From the project root, which is no worktree, it
 * moves into the default worktree first.
 */
export async function launch(
  workspace: Workspace | null,
  cwd: string,
  command: string,
  options: LaunchOptions = {}
): Promise<LaunchResult> {
  const here = existsSync(cwd) ? realpathSync(cwd) : cwd;

  let dir = here;
  if (workspace && here === workspace.root.path) {
    const branch = await defaultBranch(workspace);
    const worktree = await new WorktreeRegistry(workspace).get(branch);
    dir = worktree.path;
    options.onRelocate?.(dir);
  }

  const run = options.run ?? runInTerminal;
  const exitCode = await run(command, dir);
  return {dir, relocated: dir !== here, exitCode};
}
