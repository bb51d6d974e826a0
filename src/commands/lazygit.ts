import {ProjectNotFoundError} from "../errors";
import {launch, runInTerminal} from "../launcher";
import {findProjectRoot, openWorkspace, type Workspace} from "../project";
import {isInteractive} from "../utils/prompt";
import type {CommandContext} from "./types";

export async function lazygitCommand(context: CommandContext): Promise<number> {
  const run = context.runTerminal ?? (isInteractive() ? runInTerminal : null);
  if (!run) {
    console.log(`${context.config.tui} skipped because this session is not attached to a terminal.`);
    return 0;
  }

  let workspace: Workspace | null = null;
  try {
    workspace = openWorkspace(findProjectRoot(context.cwd), context.config, context.vcs);
  } catch (error) {
    // Outside any project the tool simply starts where it was asked to
    if (!(error instanceof ProjectNotFoundError)) {
      throw error;
    }
  }

  const {tui} = context.config;
  const result = await launch(workspace, context.cwd, tui, {
    run,
    onRelocate: (dir) => console.log(`Starting ${tui} in ${dir}.`)
  });
  return result.exitCode;
}
