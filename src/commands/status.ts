import { printServiceSummary, printStatus, readLatestReport } from "../core/report.js";
import type { StepResult } from "../types/deployment.js";
import type { StackContext } from "./context.js";

/**
 * Read-only report: container states, configured URLs and the last deploy run.
 */
export async function status(ctx: StackContext): Promise<StepResult> {
  await printStatus(ctx.runtime, ctx.logger, {
    serviceUrls: ctx.config.service_urls,
    healthEndpoints: ctx.config.health_endpoints,
  });

  const last = readLatestReport(ctx.paths.logDir);
  if (last) {
    printServiceSummary(ctx.logger, last);
  } else {
    ctx.logger.info("No deploy runs recorded yet.");
  }
  return { ok: true, value: undefined, warnings: [] };
}
