/**
 * Settings taken from the environment.
 */

export interface WtConfig {
  remote: string;
  /** Overrides the default branch recorded in the bare store's HEAD */
  defaultBranch?: string;
  tui: string;
  git: string;
  reservedNames: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WtConfig {
  return {
    remote: env.WT_REMOTE || "origin",
    defaultBranch: env.WT_DEFAULT_BRANCH || undefined,
    tui: env.WT_TUI || "lazygit",
    git: env.WT_GIT || "git",
    reservedNames: (env.WT_RESERVED ?? "")
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
  };
}
