import {PartialFailureError} from "../errors";
import {formatSyncReport} from "../format";
import {SyncEngine} from "../status";
import type {CommandContext} from "./types";
import {workspaceFor} from "./workspace";

export async function syncCommand(context: CommandContext): Promise<number> {
  const outcomes = await new SyncEngine(workspaceFor(context)).sync();
  console.log(formatSyncReport(outcomes));

  const failed = outcomes.filter((outcome) => outcome.outcome === "failed");
  if (failed.length > 0) {
    throw new PartialFailureError("sync", failed.map((outcome) => outcome.branch));
  }
  return 0;
}
