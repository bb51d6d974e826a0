import {shortRef} from "../format";
import {SyncEngine} from "../status";
import type {CommandContext, CommandOf} from "./types";
import {workspaceFor} from "./workspace";

export async function rebaseCommand(
  command: CommandOf<"rebase">,
  context: CommandContext
): Promise<number> {
  const engine = new SyncEngine(workspaceFor(context));
  const result = await engine.rebase(context.cwd, command.target);

  console.log(`Rebased ${result.branch} onto ${shortRef(result.onto)}.`);
  if (result.stashed) {
    console.log("Local changes were stashed and restored.");
  }
  return 0;
}
