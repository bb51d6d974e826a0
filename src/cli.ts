import {Command} from "commander";
import type {WtCommand} from "./commands";

export interface GlobalOptions {
  directory?: string;
}

export type Dispatch = (command: WtCommand, options: GlobalOptions) => Promise<void>;

/**
 * Parses argv into a WtCommand and hands it to `dispatch`.
 */
export function buildProgram(dispatch: Dispatch): Command {
  const program = new Command();
  const run = (command: WtCommand): Promise<void> => dispatch(command, program.opts<GlobalOptions>());

  program
    .name("wt")
    .description("Work on a bare git repository with one directory per branch")
    .option("-C, --directory <dir>", "Run as if wt was started in <dir>")
    .showHelpAfterError();

  program
    .command("clone")
    .description("Clone a repository as a bare store and check out its default branch")
    .argument("<url>", "Repository URL")
    .argument("[dir]", "Target directory (default: repository name)")
    .action(async (url: string, dir: string | undefined) => {
      await run({kind: "clone", url, dir});
    });

  program
    .command("add")
    .description("Create a worktree for a branch, creating the branch from <base> if needed")
    .argument("<branch>", "Branch to check out")
    .argument("[base]", "Ref to start a new branch from (default: the default branch)")
    .action(async (branch: string, base: string | undefined) => {
      await run({kind: "add", branch, base});
    });

  program
    .command("rm")
    .description("Remove a worktree and the empty directories it leaves behind")
    .argument("<branch>", "Branch whose worktree to remove")
    .option("-f, --force", "Remove even with uncommitted changes or unpushed commits")
    .option("-D, --delete-branch", "Delete the local branch as well")
    .action(async (branch: string, options: {force?: boolean; deleteBranch?: boolean}) => {
      await run({
        kind: "rm",
        branch,
        force: options.force ?? false,
        deleteBranch: options.deleteBranch ?? false
      });
    });

  program
    .command("ls")
    .description("List worktrees")
    .option("--strict", "Exit non-zero when worktrees and directories disagree")
    .action(async (options: {strict?: boolean}) => {
      await run({kind: "ls", strict: options.strict ?? false});
    });

  program
    .command("status")
    .description("Show how each worktree relates to a target branch")
    .argument("[target]", "Branch to compare with (default: the default branch)")
    .option("--only <branch>", "Show a single worktree")
    .option("--fetch", "Fetch from the remote first")
    .action(async (target: string | undefined, options: {only?: string; fetch?: boolean}) => {
      await run({kind: "status", target, only: options.only, fetch: options.fetch ?? false});
    });

  program
    .command("sync")
    .description("Fast-forward every worktree that follows an upstream")
    .action(async () => {
      await run({kind: "sync"});
    });

  program
    .command("rebase")
    .description("Rebase the current worktree onto a target, stashing local changes around it")
    .argument("[target]", "Branch to rebase onto (default: the default branch)")
    .action(async (target: string | undefined) => {
      await run({kind: "rebase", target});
    });

  program
    .command("clean")
    .description("Remove worktrees merged into a target, with their local and remote branches")
    .argument("[target]", "Branch merged into (default: the default branch)")
    .option("-n, --dry-run", "Only list what would be removed")
    .option("-y, --yes", "Do not ask for confirmation")
    .action(async (target: string | undefined, options: {dryRun?: boolean; yes?: boolean}) => {
      await run({
        kind: "clean",
        target,
        dryRun: options.dryRun ?? false,
        yes: options.yes ?? false
      });
    });

  program
    .command("rename")
    .description("Rename a branch and move its worktree to match")
    .argument("<old>", "Current branch name")
    .argument("<new>", "New branch name")
    .action(async (from: string, to: string) => {
      await run({kind: "rename", from, to});
    });

  program
    .command("lazygit")
    .description("Start the terminal UI, moving into the default worktree from the project root")
    .action(async () => {
      await run({kind: "lazygit"});
    });

  return program;
}
