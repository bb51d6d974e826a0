import type {WtConfig} from "../config";
import type {Vcs} from "../git";
import type {TerminalRunner} from "../launcher";

/**
 * One variant per command of the CLI, each with its typed input.
 */
export type WtCommand =
  | {kind: "clone"; url: string; dir?: string}
  | {kind: "add"; branch: string; base?: string}
  | {kind: "rm"; branch: string; force: boolean; deleteBranch: boolean}
  | {kind: "ls"; strict: boolean}
  | {kind: "status"; target?: string; only?: string; fetch: boolean}
  | {kind: "sync"}
  | {kind: "rebase"; target?: string}
  | {kind: "clean"; target?: string; dryRun: boolean; yes: boolean}
  | {kind: "rename"; from: string; to: string}
  | {kind: "lazygit"};

export type CommandOf<K extends WtCommand["kind"]> = Extract<WtCommand, {kind: K}>;

export interface CommandContext {
  cwd: string;
  config: WtConfig;
  /** Replaces the git adapter, for tests */
  vcs?: Vcs;
  /** Replaces the terminal runner of the launcher */
  runTerminal?: TerminalRunner;
  /** Whether prompts may be shown; defaults to whether a terminal is attached */
  interactive?: boolean;
}
