import {ExitCode, WtError} from "../errors";
import {addCommand} from "./add";
import {cleanCommand} from "./clean";
import {cloneCommand} from "./clone";
import {lazygitCommand} from "./lazygit";
import {listCommand} from "./list";
import {rebaseCommand} from "./rebase";
import {removeCommand} from "./remove";
import {renameCommand} from "./rename";
import {statusCommand} from "./status";
import {syncCommand} from "./sync";
import type {CommandContext, WtCommand} from "./types";

export type {CommandContext, WtCommand} from "./types";

function assertNever(command: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(command)}`);
}

/**
 * Runs one command and resolves to the process exit code.
 */
export async function runCommand(command: WtCommand, context: CommandContext): Promise<number> {
  switch (command.kind) {
    case "clone":
      return cloneCommand(command, context);
    case "add":
      return addCommand(command, context);
    case "rm":
      return removeCommand(command, context);
    case "ls":
      return listCommand(command, context);
    case "status":
      return statusCommand(command, context);
    case "sync":
      return syncCommand(context);
    case "rebase":
      return rebaseCommand(command, context);
    case "clean":
      return cleanCommand(command, context);
    case "rename":
      return renameCommand(command, context);
    case "lazygit":
      return lazygitCommand(context);
    default:
      return assertNever(command);
  }
}

/**
 * Print an error the way the CLI reports it and return its exit code.
 */
export function reportError(error: unknown): number {
  if (error instanceof WtError) {
    console.error(`error: ${error.message}`);
    if (error.diagnostic) {
      console.error(error.diagnostic.trimEnd());
    }
    return error.exitStatus;
  }
  console.error(error instanceof Error ? error.message : error);
  return ExitCode.Unexpected;
}
