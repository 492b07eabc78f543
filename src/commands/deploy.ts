import { Orchestrator, type DeployResult } from "../core/orchestrator.js";
import type { PrerequisiteDeps } from "../core/steps/prerequisites.js";
import type { StepResult } from "../types/deployment.js";
import type { StackContext } from "./context.js";

export async function deploy(ctx: StackContext, prerequisites?: PrerequisiteDeps): Promise<StepResult<DeployResult>> {
  const orch = new Orchestrator({
    config: ctx.config,
    paths: ctx.paths,
    services: ctx.services,
    runtime: ctx.runtime,
    logger: ctx.logger,
    backups: ctx.backups,
    poller: ctx.poller,
    probe: ctx.probe,
    prerequisites,
    clock: ctx.clock,
    runId: ctx.runId,
  });

  const result = await orch.deploy();
  if (!result.success && result.run.failure) {
    return { ok: false, error: result.run.failure };
  }
  return { ok: true, value: result, warnings: result.report.warnings };
}
