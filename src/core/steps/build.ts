import type { ContainerRuntime } from "../../runtime/compose.js";
import type { Logger } from "../../logging/logger.js";
import type { StepResult } from "../../types/deployment.js";

function tail(text: string, lines = 20): string {
  return text.trimEnd().split("\n").slice(-lines).join("\n");
}

/**
 * Build step: clean (no-cache) image build of every service in the manifest.
 * A non-zero exit aborts the run; the build is never retried.
 */
export async function runBuild(runtime: ContainerRuntime, logger: Logger): Promise<StepResult> {
  logger.info("Building images...");
  const res = await runtime.build({ noCache: true });
  if (res.exitCode !== 0) {
    logger.block("Build output:", tail(res.stderr || res.stdout));
    return { ok: false, error: { kind: "BuildError", message: "Image build failed", exitCode: res.exitCode } };
  }
  logger.success("Images built successfully");
  return { ok: true, value: undefined, warnings: [] };
}

/**
 * Start step: bring the whole stack up in the background.
 */
export async function runStart(runtime: ContainerRuntime, logger: Logger): Promise<StepResult> {
  logger.info("Starting services...");
  const res = await runtime.up();
  if (res.exitCode !== 0) {
    logger.block("Start output:", tail(res.stderr || res.stdout));
    return { ok: false, error: { kind: "StartError", message: "Failed to start services", exitCode: res.exitCode } };
  }
  logger.success("Services started successfully");
  return { ok: true, value: undefined, warnings: [] };
}
