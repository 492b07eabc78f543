import type { DeploymentRun, FatalError, Stage } from "../types/deployment.js";

/**
 * Success-path order of a deploy run.
 */
export const DEPLOY_STAGES = [
  "Provisioning",
  "BackingUp",
  "Building",
  "Starting",
  "HealthPolling",
  "Validating",
  "InitializingSchema",
  "Testing",
  "Ready",
] as const satisfies readonly Stage[];

export type DeployStage = (typeof DEPLOY_STAGES)[number];

const TERMINAL: ReadonlySet<Stage> = new Set<Stage>(["Ready", "Failed", "RolledBack"]);

export class StageTransitionError extends Error {
  constructor(
    readonly from: Stage,
    readonly to: Stage,
  ) {
    super(`Illegal stage transition: ${from} -> ${to}`);
    this.name = "StageTransitionError";
  }
}

export function isTerminal(stage: Stage): boolean {
  return TERMINAL.has(stage);
}

/**
 * Pure function: the stage that follows `current` on the success path.
 */
export function nextStage(current: Stage): Stage {
  if (current === "NotStarted") return DEPLOY_STAGES[0];
  if (current === "RollingBack") return "RolledBack";
  const idx = DEPLOY_STAGES.findIndex((s) => s === current);
  if (idx === -1 || idx === DEPLOY_STAGES.length - 1) {
    throw new StageTransitionError(current, current);
  }
  return DEPLOY_STAGES[idx + 1];
}

function allowed(from: Stage, to: Stage): boolean {
  if (isTerminal(from)) return false;
  if (to === "Failed") return true;
  if (to === "RollingBack") return from === "NotStarted";
  if (from === "RollingBack") return to === "RolledBack";
  return nextStage(from) === to;
}

export function createRun(opts: { id: string; projectName: string; manifestPath: string; now: Date }): DeploymentRun {
  return {
    id: opts.id,
    projectName: opts.projectName,
    manifestPath: opts.manifestPath,
    stage: "NotStarted",
    startedAt: opts.now.toISOString(),
  };
}

/**
 * Move a run to its next success-path stage. Returns a new run; the input is left untouched.
 */
export function advance(run: DeploymentRun, to: Stage, now: Date): DeploymentRun {
  if (!allowed(run.stage, to) || to === "Failed") {
    throw new StageTransitionError(run.stage, to);
  }
  const next: DeploymentRun = { ...run, stage: to };
  if (isTerminal(to)) next.completedAt = now.toISOString();
  return next;
}

/**
 * Terminate a run: the failing stage is kept for the report.
 */
export function fail(run: DeploymentRun, error: FatalError, now: Date): DeploymentRun {
  if (!allowed(run.stage, "Failed")) {
    throw new StageTransitionError(run.stage, "Failed");
  }
  return {
    ...run,
    stage: "Failed",
    failedStage: run.stage,
    failure: error,
    completedAt: now.toISOString(),
  };
}
