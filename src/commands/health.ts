import { runValidation } from "../core/steps/validate.js";
import type { StepResult } from "../types/deployment.js";
import type { StackContext } from "./context.js";

/** Run the post-deploy validator against whatever is currently running. */
export function health(ctx: StackContext): Promise<StepResult> {
  return runValidation(ctx.config.validation, {
    runtime: ctx.runtime,
    logger: ctx.logger,
    probe: ctx.probe,
    logTailLines: ctx.config.polling.log_tail_lines,
  });
}
