import {execSync} from "child_process";
import {mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync} from "fs";
import {join} from "path";
import {tmpdir} from "os";
import {vi} from "vitest";
import {reportError, runCommand, type WtCommand} from "../../src/commands";
import {loadConfig} from "../../src/config";

// Commits made by the tool itself (rebase) need an identity too, and the
// user's own git configuration must not leak into the tests.
Object.assign(process.env, {
  GIT_AUTHOR_NAME: "Test User",
  GIT_AUTHOR_EMAIL: "test@example.com",
  GIT_COMMITTER_NAME: "Test User",
  GIT_COMMITTER_EMAIL: "test@example.com",
  GIT_CONFIG_NOSYSTEM: "1",
  GIT_CONFIG_GLOBAL: "/dev/null"
});

export interface TestRemote {
  /** Scratch directory holding everything below */
  base: string;
  /** Bare repository playing the part of the server */
  remote: string;
  /** Ordinary clone used to push changes "from someone else" */
  seed: string;
  cleanup: () => void;
}

export function git(cwd: string, args: string): string {
  return execSync(`git ${args}`, {cwd, stdio: "pipe", encoding: "utf-8"}).trim();
}

export function commitFile(dir: string, file: string, content: string, message: string): string {
  writeFileSync(join(dir, file), content);
  git(dir, `add ${file}`);
  git(dir, `commit -q -m "${message}"`);
  return git(dir, "rev-parse HEAD");
}

/**
 * Create an isolated remote with one commit on main, plus a seed clone
 * that can push to it.
 */
export function createTestRemote(name: string): TestRemote {
  const base = realpathSync(mkdtempSync(join(tmpdir(), `wt-e2e-${name}-`)));
  const seed = join(base, "seed");
  const remote = join(base, "remote.git");

  mkdirSync(seed);
  git(seed, "init -q");
  git(seed, "symbolic-ref HEAD refs/heads/main");
  commitFile(seed, "README.md", "# Test Repo\n", "Initial commit");
  git(base, `clone -q --bare seed remote.git`);
  git(seed, `remote add origin ${remote}`);
  git(seed, "fetch -q origin");
  git(seed, "branch -q --set-upstream-to=origin/main main");

  return {
    base,
    remote,
    seed,
    cleanup: () => rmSync(base, {recursive: true, force: true})
  };
}

export interface WtRun {
  exitCode: number;
  stdout: string[];
  stderr: string[];
}

/**
 * Run one command in-process against the real git binary, capturing what
 * it prints.
 */
export async function wt(cwd: string, command: WtCommand): Promise<WtRun> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const log = vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    stdout.push(args.join(" "));
  });
  const error = vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    stderr.push(args.join(" "));
  });

  try {
    const exitCode = await runCommand(command, {cwd, config: loadConfig({}), interactive: false});
    return {exitCode, stdout, stderr};
  } catch (caught) {
    return {exitCode: reportError(caught), stdout, stderr};
  } finally {
    log.mockRestore();
    error.mockRestore();
  }
}
