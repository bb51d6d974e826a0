import {formatWorktreeList} from "../format";
import {WorktreeRegistry} from "../registry";
import type {CommandContext, CommandOf} from "./types";
import {workspaceFor} from "./workspace";

export async function listCommand(
  command: CommandOf<"ls">,
  context: CommandContext
): Promise<number> {
  const workspace = workspaceFor(context);
  const {worktrees, inconsistencies} = await new WorktreeRegistry(workspace).list();

  console.log(formatWorktreeList(worktrees, workspace.root.path));
  for (const inconsistency of inconsistencies) {
    console.error(`warning: ${inconsistency.message}`);
  }

  if (command.strict && inconsistencies.length > 0) {
    return inconsistencies[0].exitStatus;
  }
  return 0;
}
