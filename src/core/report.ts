import fs from "node:fs";
import path from "node:path";
import type { Logger } from "../logging/logger.js";
import type { ContainerRuntime } from "../runtime/compose.js";
import type { NamedUrl } from "../types/config.js";
import type { BackupArtifact, DeploymentRun, HealthCheckResult, TestOutcome } from "../types/deployment.js";

/** JSON run report written to `<log_dir>/deploy_<runId>.json`. */
export type DeploymentReport = {
  run: DeploymentRun;
  services: Array<{ name: string; status: "healthy" | "unhealthy"; attempts: number; checked_at: string }>;
  backup: BackupArtifact | null;
  schema_initialized: boolean | null;
  tests: TestOutcome | null;
  warnings: string[];
};

export function buildReport(input: {
  run: DeploymentRun;
  health: readonly HealthCheckResult[];
  backup: BackupArtifact | null;
  schemaInitialized: boolean | null;
  tests: TestOutcome | null;
  warnings: readonly string[];
}): DeploymentReport {
  return {
    run: input.run,
    services: input.health.map((h) => ({
      name: h.service,
      status: h.healthy ? "healthy" : "unhealthy",
      attempts: h.attempt,
      checked_at: h.checkedAt,
    })),
    backup: input.backup,
    schema_initialized: input.schemaInitialized,
    tests: input.tests,
    warnings: [...input.warnings],
  };
}

export function reportPath(logDir: string, runId: string): string {
  return path.join(logDir, `deploy_${runId}.json`);
}

export function writeReport(logDir: string, report: DeploymentReport): string {
  const p = reportPath(logDir, report.run.id);
  fs.mkdirSync(logDir, { recursive: true });
  fs.writeFileSync(p, JSON.stringify(report, null, 2) + "\n", "utf8");
  return p;
}

function isReport(value: unknown): value is DeploymentReport {
  return (
    value !== null &&
    typeof value === "object" &&
    "run" in value &&
    value.run !== null &&
    typeof value.run === "object" &&
    "stage" in value.run &&
    "services" in value &&
    Array.isArray(value.services)
  );
}

/**
 * Most recent deploy report in the log directory, or null when there is none.
 * Run ids start with a sortable timestamp, so name order is time order.
 */
export function readLatestReport(logDir: string): DeploymentReport | null {
  if (!fs.existsSync(logDir)) return null;

  const names = fs
    .readdirSync(logDir, { withFileTypes: true })
    .filter((e) => e.isFile() && /^deploy_.+\.json$/.test(e.name))
    .map((e) => e.name)
    .sort()
    .reverse();

  for (const name of names) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(path.join(logDir, name), "utf8"));
      if (isReport(parsed)) return parsed;
    } catch {
      // Unreadable report: fall through to the next newest.
      continue;
    }
  }
  return null;
}

/**
 * Print container states and the configured URLs. Read-only.
 */
export async function printStatus(
  runtime: ContainerRuntime,
  logger: Logger,
  urls: { serviceUrls: readonly NamedUrl[]; healthEndpoints: readonly NamedUrl[] },
): Promise<void> {
  logger.info("Deployment status:");
  const ps = await runtime.ps();
  if (ps.exitCode === 0) {
    logger.block("Containers:", ps.stdout);
  } else {
    logger.warn(`Could not read container states (exit ${ps.exitCode})`);
  }

  logger.block("Service URLs:", urls.serviceUrls.map((u) => `  ${u.name}: ${u.url}`).join("\n"));
  logger.block("Health endpoints:", urls.healthEndpoints.map((u) => `  ${u.name}: curl ${u.url}`).join("\n"));
}

export function printServiceSummary(logger: Logger, report: DeploymentReport): void {
  const lines = report.services.map((s) => `  ${s.name}: ${s.status}`);
  logger.block(`Run ${report.run.id}: ${report.run.stage}`, lines.join("\n"));
}
