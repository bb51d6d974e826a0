import {displayPath} from "../format";
import {LifecycleController} from "../lifecycle";
import type {CommandContext, CommandOf} from "./types";
import {workspaceFor} from "./workspace";

export async function removeCommand(
  command: CommandOf<"rm">,
  context: CommandContext
): Promise<number> {
  const workspace = workspaceFor(context);
  const result = await new LifecycleController(workspace).rm(command.branch, {
    force: command.force,
    deleteBranch: command.deleteBranch
  });

  console.log(`Removed worktree ${result.branch} at ${result.path}.`);
  for (const dir of result.removedParents) {
    console.log(`Removed empty directory ${displayPath(dir, workspace.root.path)}.`);
  }
  if (result.branchDeleted) {
    console.log(`Deleted branch ${result.branch}.`);
  }
  return 0;
}
