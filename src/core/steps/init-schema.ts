import type { ContainerRuntime } from "../../runtime/compose.js";
import type { Logger } from "../../logging/logger.js";
import type { ExecStepConfig } from "../../types/config.js";
import type { SchemaError } from "../../types/deployment.js";

/**
 * Run the idempotent schema setup inside the API service. Returns the error
 * for the caller to report as a warning; it never ends a run.
 */
export async function runSchemaInit(
  cfg: ExecStepConfig,
  runtime: ContainerRuntime,
  logger: Logger,
): Promise<SchemaError | null> {
  logger.info("Initializing database schema...");
  const res = await runtime.exec(cfg.service, cfg.command);
  if (res.exitCode === 0) {
    logger.success("Schema initialized");
    return null;
  }
  const message = "Schema initialization failed (may already exist)";
  logger.warn(message, { exitCode: res.exitCode });
  return { kind: "SchemaError", message, exitCode: res.exitCode };
}
