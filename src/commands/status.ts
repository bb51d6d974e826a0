import {formatStatus} from "../format";
import {SyncEngine} from "../status";
import type {CommandContext, CommandOf} from "./types";
import {workspaceFor} from "./workspace";

export async function statusCommand(
  command: CommandOf<"status">,
  context: CommandContext
): Promise<number> {
  const engine = new SyncEngine(workspaceFor(context));
  const report = await engine.status(command.target, {only: command.only, fetch: command.fetch});
  console.log(formatStatus(report));
  return 0;
}
