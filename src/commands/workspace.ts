import {findProjectRoot, openWorkspace, type Workspace} from "../project";
import type {CommandContext} from "./types";

export function workspaceFor(context: CommandContext): Workspace {
  return openWorkspace(findProjectRoot(context.cwd), context.config, context.vcs);
}
