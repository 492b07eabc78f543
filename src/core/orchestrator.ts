import fs from "node:fs";
import type { StackConfig } from "../types/config.js";
import type {
  BackupArtifact,
  DeploymentRun,
  FatalError,
  HealthCheckResult,
  Service,
  StepResult,
  TestOutcome,
} from "../types/deployment.js";
import type { Logger } from "../logging/logger.js";
import type { ContainerRuntime } from "../runtime/compose.js";
import type { BackupManager } from "../backup/manager.js";
import { advance, createRun, fail, type DeployStage } from "./state-machine.js";
import { generateRunId } from "./run-id.js";
import { buildReport, printServiceSummary, printStatus, writeReport, type DeploymentReport } from "./report.js";
import { checkPrerequisites, type PrerequisiteDeps } from "./steps/prerequisites.js";
import { runBuild, runStart } from "./steps/build.js";
import type { HealthPoller } from "./steps/health-poll.js";
import { runValidation, type HttpProbe } from "./steps/validate.js";
import { runSchemaInit } from "./steps/init-schema.js";
import { runTestSuite } from "./steps/test-suite.js";

/** Config paths resolved against the project root. */
export type ResolvedPaths = {
  projectRoot: string;
  manifestPath: string;
  dataDir: string;
  backupDir: string;
  logDir: string;
};

export type OrchestratorDeps = {
  config: StackConfig;
  paths: ResolvedPaths;
  services: readonly Service[];
  runtime: ContainerRuntime;
  logger: Logger;
  backups: BackupManager;
  poller: HealthPoller;
  probe: HttpProbe;
  prerequisites?: PrerequisiteDeps;
  clock?: () => Date;
  runId?: string;
};

export type DeployResult = {
  success: boolean;
  run: DeploymentRun;
  report: DeploymentReport;
  reportPath: string;
};

type StageStep = {
  stage: DeployStage;
  execute: () => Promise<StepResult<unknown>>;
};

function describeError(e: unknown): FatalError {
  return { kind: "UnexpectedError", message: e instanceof Error ? e.message : String(e) };
}

/**
 * Orchestrator: drives one deploy run through the stage sequence.
 *
 * Each stage either advances the run or fails it; after a failure no further
 * stage executes. The run is held in memory and ends up only in the log file
 * and the JSON report.
 */
export class Orchestrator {
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async deploy(): Promise<DeployResult> {
    const { config, paths, logger, runtime } = this.deps;
    let run = createRun({
      id: this.deps.runId ?? generateRunId(this.clock()),
      projectName: config.project_name,
      manifestPath: paths.manifestPath,
      now: this.clock(),
    });

    const warnings: string[] = [];
    let health: HealthCheckResult[] = [];
    let backup: BackupArtifact | null = null;
    let schemaInitialized: boolean | null = null;
    let tests: TestOutcome | null = null;

    logger.info(`Starting deployment of ${config.project_name} (run ${run.id})`);

    const steps: StageStep[] = [
      {
        stage: "Provisioning",
        execute: async () => {
          const res = await checkPrerequisites(
            {
              requiredTools: config.required_tools,
              manifestPath: paths.manifestPath,
              requiredEnv: config.required_env,
              minFreeDiskGb: config.min_free_disk_gb,
              diskPath: paths.projectRoot,
            },
            logger,
            this.deps.prerequisites,
          );
          if (res.ok) {
            for (const dir of [paths.backupDir, paths.logDir, paths.dataDir]) fs.mkdirSync(dir, { recursive: true });
          }
          return res;
        },
      },
      {
        stage: "BackingUp",
        execute: async () => {
          backup = await this.deps.backups.backup();
          if (backup) this.deps.backups.prune(config.backup.retain);
          return { ok: true, value: backup, warnings: [] };
        },
      },
      { stage: "Building", execute: () => runBuild(runtime, logger) },
      { stage: "Starting", execute: () => runStart(runtime, logger) },
      {
        stage: "HealthPolling",
        execute: async () => {
          const res = await this.deps.poller.pollAll(this.deps.services);
          health = res.results;
          return res.ok ? { ok: true, value: res.results, warnings: [] } : { ok: false, error: res.error };
        },
      },
      {
        stage: "Validating",
        execute: () =>
          runValidation(config.validation, {
            runtime,
            logger,
            probe: this.deps.probe,
            logTailLines: config.polling.log_tail_lines,
          }),
      },
      {
        stage: "InitializingSchema",
        execute: async () => {
          const err = await runSchemaInit(config.schema_init, runtime, logger);
          schemaInitialized = err === null;
          return { ok: true, value: undefined, warnings: err ? [err.message] : [] };
        },
      },
      {
        stage: "Testing",
        execute: async () => {
          tests = await runTestSuite(config.tests, runtime, logger);
          return { ok: true, value: tests, warnings: tests.passed ? [] : [`Some tests failed (exit ${tests.exitCode})`] };
        },
      },
    ];

    for (const step of steps) {
      run = advance(run, step.stage, this.clock());
      let res: StepResult<unknown>;
      try {
        res = await step.execute();
      } catch (e: unknown) {
        res = { ok: false, error: describeError(e) };
      }

      if (!res.ok) {
        run = fail(run, res.error, this.clock());
        logger.error(`Deployment failed at stage ${step.stage}`);
        break;
      }
      warnings.push(...res.warnings);
    }

    if (run.stage !== "Failed") {
      run = advance(run, "Ready", this.clock());
    }

    const report = buildReport({ run, health, backup, schemaInitialized, tests, warnings });
    const reportPath = writeReport(paths.logDir, report);

    if (run.stage === "Ready") {
      await printStatus(runtime, logger, { serviceUrls: config.service_urls, healthEndpoints: config.health_endpoints });
      printServiceSummary(logger, report);
      if (warnings.length > 0) logger.warn(`Deployment completed with ${warnings.length} warning(s)`);
      logger.success("Deployment completed successfully");
    }

    return { success: run.stage === "Ready", run, report, reportPath };
  }
}
