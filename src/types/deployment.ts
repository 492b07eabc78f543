/** Deployment lifecycle types shared by the orchestrator, steps and commands. */

export type Service = Readonly<{
  name: string;
  healthProbe: readonly string[];
  maxAttempts: number;
  pollIntervalSeconds: number;
}>;

export type Stage =
  | "NotStarted"
  | "Provisioning"
  | "BackingUp"
  | "Building"
  | "Starting"
  | "HealthPolling"
  | "Validating"
  | "InitializingSchema"
  | "Testing"
  | "Ready"
  | "Failed"
  | "RollingBack"
  | "RolledBack";

export type HealthCheckResult = {
  service: string;
  attempt: number;
  healthy: boolean;
  checkedAt: string;
};

export type BackupArtifact = {
  path: string;
  createdAt: string;
  sourceVolume: string;
  sha256?: string;
};

export type PrerequisiteError = {
  kind: "PrerequisiteError";
  reason: "missingTool" | "missingManifest" | "missingEnv";
  message: string;
  subject: string;
};

export type BuildError = { kind: "BuildError"; message: string; exitCode: number };

export type StartError = { kind: "StartError"; message: string; exitCode: number };

export type HealthError = { kind: "HealthError"; reason: "Timeout"; service: string; attempts: number; message: string };

export type ValidationError = {
  kind: "ValidationError";
  check: "liveness" | "connectivity";
  message: string;
};

export type SchemaError = { kind: "SchemaError"; message: string; exitCode: number };

export type RollbackError = {
  kind: "RollbackError";
  reason: "NoBackupFound" | "ChecksumMismatch" | "UnreadableArchive";
  message: string;
};

export type RuntimeError = { kind: "RuntimeError"; operation: string; message: string; exitCode: number };

export type UnexpectedError = { kind: "UnexpectedError"; message: string };

/** Every outcome that ends a stage sequence. */
export type FatalError =
  | PrerequisiteError
  | BuildError
  | StartError
  | HealthError
  | ValidationError
  | RollbackError
  | RuntimeError
  | UnexpectedError;

export type DeploymentRun = {
  id: string;
  projectName: string;
  manifestPath: string;
  stage: Stage;
  startedAt: string;
  completedAt?: string;
  /** Stage that was executing when the run failed. */
  failedStage?: Stage;
  failure?: FatalError;
};

export type TestOutcome = {
  passed: boolean;
  exitCode: number;
};

export type StepResult<T = void> = { ok: true; value: T; warnings: string[] } | { ok: false; error: FatalError };
