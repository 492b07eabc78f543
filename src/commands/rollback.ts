import path from "node:path";
import { advance, createRun, fail } from "../core/state-machine.js";
import type { BackupArtifact, DeploymentRun, StepResult } from "../types/deployment.js";
import type { StackContext } from "./context.js";
import { verifyStack } from "./lifecycle.js";

export type RollbackOptions = {
  /** Explicit archive; defaults to the newest backup. */
  archive?: string;
  /** Stop the stack before restoring, then start and verify it. */
  restart: boolean;
};

export async function rollback(ctx: StackContext, opts: RollbackOptions): Promise<StepResult<DeploymentRun>> {
  const { logger, runtime, backups } = ctx;
  let run = createRun({
    id: ctx.runId,
    projectName: ctx.config.project_name,
    manifestPath: ctx.paths.manifestPath,
    now: ctx.clock(),
  });
  run = advance(run, "RollingBack", ctx.clock());
  logger.info("Rolling back to previous backup...");

  const artifact: BackupArtifact | null = opts.archive
    ? backups.fromPath(path.resolve(ctx.paths.projectRoot, opts.archive))
    : backups.latest();

  const staged = await backups.stage(artifact);
  if (!staged.ok) {
    run = fail(run, staged.error, ctx.clock());
    logger.error(staged.error.message);
    return { ok: false, error: staged.error };
  }

  if (opts.restart) {
    const down = await runtime.down({ volumes: false });
    if (down.exitCode !== 0) {
      backups.discard(staged);
      const error = { kind: "RuntimeError", operation: "stop", message: `Failed to stop services (exit ${down.exitCode})`, exitCode: down.exitCode } as const;
      run = fail(run, error, ctx.clock());
      logger.error(error.message);
      return { ok: false, error };
    }
  }

  backups.commit(staged);

  if (opts.restart) {
    const up = await runtime.up();
    if (up.exitCode !== 0) {
      const error = { kind: "StartError", message: "Failed to start services after restore", exitCode: up.exitCode } as const;
      run = fail(run, error, ctx.clock());
      logger.error(error.message);
      return { ok: false, error };
    }
    const verified = await verifyStack(ctx);
    if (!verified.ok) {
      run = fail(run, verified.error, ctx.clock());
      logger.error(verified.error.message);
      return verified;
    }
  }

  run = advance(run, "RolledBack", ctx.clock());
  logger.success("Rollback completed");
  return { ok: true, value: run, warnings: [] };
}

/** Standalone backup of the data directory. */
export async function backup(ctx: StackContext): Promise<StepResult<BackupArtifact | null>> {
  const artifact = await ctx.backups.backup();
  if (artifact) ctx.backups.prune(ctx.config.backup.retain);
  return { ok: true, value: artifact, warnings: [] };
}
