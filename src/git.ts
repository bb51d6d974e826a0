import execa from "execa";
import {VcsError} from "./errors";

export interface VcsResult {
  stdout: string;
  exitCode: number;
}

/**
 * Runs version-control subcommands. Every non-zero exit is raised as a
 * VcsError; callers that expect a negative answer catch it and read exitCode.
 */
export interface Vcs {
  run(args: string[]): Promise<VcsResult>;
  runInDir(dir: string, args: string[]): Promise<VcsResult>;
}

export class GitAdapter implements Vcs {
  constructor(
    private readonly cwd: string,
    private readonly binary: string = "git"
  ) {}

  run(args: string[]): Promise<VcsResult> {
    return this.runInDir(this.cwd, args);
  }

  async runInDir(dir: string, args: string[]): Promise<VcsResult> {
    const result = await execa(this.binary, args, {
      cwd: dir,
      reject: false,
      stdin: "ignore",
      env: {
        // A credential prompt would block forever without a terminal
        GIT_TERMINAL_PROMPT: "0"
      }
    });

    if (result.failed || result.exitCode !== 0) {
      throw new VcsError(args, result.exitCode ?? -1, describeFailure(result));
    }

    return {stdout: result.stdout, exitCode: result.exitCode};
  }
}

function describeFailure(result: execa.ExecaReturnValue): string {
  if (result.stderr) {
    return result.stderr;
  }
  if (result.timedOut) {
    return "timed out";
  }
  if (result.signal) {
    return `terminated by ${result.signal}`;
  }
  return result.stdout || `${result.command} could not be run`;
}

/**
 * Runs a command whose negative answer is a non-zero exit, such as
 * `show-ref --verify` or `merge-base --is-ancestor`.
 */
export async function succeeds(
  vcs: Vcs,
  args: string[],
  dir?: string
): Promise<boolean> {
  try {
    if (dir) {
      await vcs.runInDir(dir, args);
    } else {
      await vcs.run(args);
    }
    return true;
  } catch (error) {
    if (error instanceof VcsError && error.exitCode === 1) {
      return false;
    }
    throw error;
  }
}

export function refExists(vcs: Vcs, ref: string): Promise<boolean> {
  return succeeds(vcs, ["show-ref", "--verify", "--quiet", ref]);
}

export function lines(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
