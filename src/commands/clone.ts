import {cloneProject} from "../lifecycle";
import type {CommandContext, CommandOf} from "./types";

export async function cloneCommand(
  command: CommandOf<"clone">,
  context: CommandContext
): Promise<number> {
  const result = await cloneProject(command.url, command.dir, {
    cwd: context.cwd,
    config: context.config,
    vcs: context.vcs
  });

  if (result.alreadyCloned) {
    console.log(`${result.root.path} already holds a worktree project.`);
  } else {
    console.log(`Cloned ${command.url} into ${result.root.bareDir}.`);
  }
  console.log(`Worktree ${result.defaultBranch} is ready at ${result.worktree.path}.`);
  return 0;
}
