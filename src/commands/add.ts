import {LifecycleController} from "../lifecycle";
import type {CommandContext, CommandOf} from "./types";
import {workspaceFor} from "./workspace";

export async function addCommand(
  command: CommandOf<"add">,
  context: CommandContext
): Promise<number> {
  const lifecycle = new LifecycleController(workspaceFor(context));
  const worktree = await lifecycle.add(command.branch, command.base);
  console.log(`Worktree ${command.branch} is ready at ${worktree.path}.`);
  return 0;
}
