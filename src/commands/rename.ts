import {displayPath} from "../format";
import {LifecycleController} from "../lifecycle";
import type {CommandContext, CommandOf} from "./types";
import {workspaceFor} from "./workspace";

export async function renameCommand(
  command: CommandOf<"rename">,
  context: CommandContext
): Promise<number> {
  const workspace = workspaceFor(context);
  const result = await new LifecycleController(workspace).rename(command.from, command.to);

  console.log(`Renamed ${result.from} to ${result.to}, now at ${result.path}.`);
  for (const dir of result.removedParents) {
    console.log(`Removed empty directory ${displayPath(dir, workspace.root.path)}.`);
  }
  return 0;
}
