import { runBuild } from "../core/steps/build.js";
import { runValidation } from "../core/steps/validate.js";
import type { CommandOutcome } from "../runtime/compose.js";
import type { StepResult } from "../types/deployment.js";
import type { StackContext } from "./context.js";

const OK: StepResult = { ok: true, value: undefined, warnings: [] };

function runtimeFailure(operation: string, res: CommandOutcome): StepResult {
  return {
    ok: false,
    error: {
      kind: "RuntimeError",
      operation,
      message: `${operation} failed (exit ${res.exitCode}): ${(res.stderr || res.stdout).trim().split("\n").slice(-5).join("\n")}`,
      exitCode: res.exitCode,
    },
  };
}

/** Health-poll every service, then run the validator. */
export async function verifyStack(ctx: StackContext): Promise<StepResult> {
  const polled = await ctx.poller.pollAll(ctx.services);
  if (!polled.ok) return { ok: false, error: polled.error };
  return runValidation(ctx.config.validation, {
    runtime: ctx.runtime,
    logger: ctx.logger,
    probe: ctx.probe,
    logTailLines: ctx.config.polling.log_tail_lines,
  });
}

export async function restart(ctx: StackContext): Promise<StepResult> {
  ctx.logger.info("Restarting services...");
  const res = await ctx.runtime.restart();
  if (res.exitCode !== 0) return runtimeFailure("restart", res);

  const verified = await verifyStack(ctx);
  if (verified.ok) ctx.logger.success("Services restarted successfully");
  return verified;
}

/** Graceful shutdown; volumes are kept. */
export async function stop(ctx: StackContext): Promise<StepResult> {
  ctx.logger.info("Stopping services...");
  const res = await ctx.runtime.down({ volumes: false });
  if (res.exitCode !== 0) return runtimeFailure("stop", res);
  ctx.logger.success("Services stopped");
  return OK;
}

export async function update(ctx: StackContext): Promise<StepResult> {
  ctx.logger.info("Updating services...");
  const pulled = await ctx.runtime.pull();
  if (pulled.exitCode !== 0) return runtimeFailure("pull", pulled);

  const built = await runBuild(ctx.runtime, ctx.logger);
  if (!built.ok) return built;

  const up = await ctx.runtime.up();
  if (up.exitCode !== 0) return { ok: false, error: { kind: "StartError", message: "Failed to start services", exitCode: up.exitCode } };

  const verified = await verifyStack(ctx);
  if (verified.ok) ctx.logger.success("Services updated successfully");
  return verified;
}

/**
 * Tear the stack down including volumes and prune unused runtime resources.
 * Irreversible without a backup.
 */
export async function cleanup(ctx: StackContext): Promise<StepResult> {
  const warnings: string[] = [];
  if (!ctx.backups.latest()) {
    const msg = "No backup exists; volume data removed by cleanup cannot be rolled back";
    ctx.logger.warn(msg);
    warnings.push(msg);
  }

  ctx.logger.info("Cleaning up...");
  const down = await ctx.runtime.down({ volumes: true });
  if (down.exitCode !== 0) return runtimeFailure("down", down);

  const pruned = await ctx.runtime.prune();
  if (pruned.exitCode !== 0) return runtimeFailure("prune", pruned);

  ctx.logger.success("Cleanup completed");
  return { ok: true, value: undefined, warnings };
}
