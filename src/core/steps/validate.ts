import type { ContainerRuntime } from "../../runtime/compose.js";
import type { Logger } from "../../logging/logger.js";
import type { StepResult } from "../../types/deployment.js";
import type { ValidationConfig } from "../../types/config.js";
import { dumpServiceLogs } from "./health-poll.js";

export type HttpProbe = (url: string, timeoutMs: number) => Promise<{ ok: boolean; status: number | null; error?: string }>;

/** GET `url`; any 2xx is a pass. Network errors and timeouts resolve as failures. */
export const httpProbe: HttpProbe = async (url, timeoutMs) => {
  try {
    const res = await fetch(url, { method: "GET", signal: AbortSignal.timeout(timeoutMs) });
    await res.body?.cancel();
    return { ok: res.ok, status: res.status };
  } catch (e: unknown) {
    return { ok: false, status: null, error: e instanceof Error ? e.message : String(e) };
  }
};

export type ValidatorDeps = {
  runtime: ContainerRuntime;
  logger: Logger;
  probe: HttpProbe;
  logTailLines: number;
};

function describeProbe(res: { status: number | null; error?: string }): string {
  return res.status === null ? (res.error ?? "no response") : `HTTP ${res.status}`;
}

/**
 * Post-deploy smoke checks. Liveness and data-store connectivity are fatal;
 * the modules endpoint only warns.
 */
export async function runValidation(cfg: ValidationConfig, deps: ValidatorDeps): Promise<StepResult> {
  const { runtime, logger, probe } = deps;
  const timeoutMs = cfg.timeout_seconds * 1000;
  const warnings: string[] = [];
  logger.info("Running health checks...");

  logger.info("Checking API health endpoint...");
  const live = await probe(cfg.health_url, timeoutMs);
  if (!live.ok) {
    const message = `API health check failed: ${cfg.health_url} (${describeProbe(live)})`;
    logger.error(message);
    await dumpServiceLogs(runtime, logger, cfg.primary_service, deps.logTailLines);
    return { ok: false, error: { kind: "ValidationError", check: "liveness", message } };
  }
  logger.success("API health check passed");

  logger.info("Checking database connectivity...");
  const conn = await runtime.exec(cfg.primary_service, cfg.connectivity_command);
  if (conn.exitCode !== 0) {
    const message = `Database connectivity check failed (exit ${conn.exitCode})`;
    logger.error(message);
    return { ok: false, error: { kind: "ValidationError", check: "connectivity", message } };
  }
  logger.success("Database connectivity check passed");

  logger.info("Checking modules...");
  const modules = await probe(cfg.modules_url, timeoutMs);
  if (modules.ok) {
    logger.success("Modules health check passed");
  } else {
    const msg = `Modules health check failed (${describeProbe(modules)}); the endpoint may not be implemented yet`;
    logger.warn(msg);
    warnings.push(msg);
  }

  logger.success("Health checks completed");
  return { ok: true, value: undefined, warnings };
}
