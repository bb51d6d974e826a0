import {PartialFailureError} from "../errors";
import {formatCleanupReport, shortRef} from "../format";
import {CleanupPlanner} from "../cleanup";
import {confirm, isInteractive} from "../utils/prompt";
import type {CommandContext, CommandOf} from "./types";
import {workspaceFor} from "./workspace";

export async function cleanCommand(
  command: CommandOf<"clean">,
  context: CommandContext
): Promise<number> {
  const planner = new CleanupPlanner(workspaceFor(context));
  const plan = await planner.plan(command.target);
  const target = shortRef(plan.targetRef);

  if (plan.branches.length === 0) {
    console.log(`Nothing to clean: no worktree is merged into ${target}.`);
    return 0;
  }

  if (command.dryRun) {
    console.log(`Merged into ${target}, would be removed:`);
    for (const branch of plan.branches) {
      console.log(`  ${branch}`);
    }
    return 0;
  }

  const interactive = context.interactive ?? isInteractive();
  if (interactive && !command.yes) {
    const proceed = await confirm(
      `Remove ${plan.branches.length} worktree(s) merged into ${target} and their branches?`
    );
    if (!proceed) {
      console.log("Nothing removed.");
      return 0;
    }
  }

  const outcomes = await planner.execute(plan);
  console.log(formatCleanupReport(outcomes));
  for (const outcome of outcomes) {
    if (outcome.outcome === "skipped") {
      console.error(`warning: ${outcome.branch} is merged but was kept: ${outcome.reason ?? ""}`);
    }
  }

  const failed = outcomes.filter((outcome) => outcome.outcome === "failed");
  if (failed.length > 0) {
    throw new PartialFailureError("clean", failed.map((outcome) => outcome.branch));
  }
  return 0;
}
