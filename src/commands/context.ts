import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { RunLogger, type Logger, type OutputFormat } from "../logging/logger.js";
import { DockerCompose, type ContainerRuntime } from "../runtime/compose.js";
import { BackupManager } from "../backup/manager.js";
import { buildRegistry } from "../registry/services.js";
import { HealthPoller, type Sleeper } from "../core/steps/health-poll.js";
import { httpProbe, type HttpProbe } from "../core/steps/validate.js";
import { generateRunId } from "../core/run-id.js";
import type { ResolvedPaths } from "../core/orchestrator.js";
import type { StackConfig } from "../types/config.js";
import type { Service } from "../types/deployment.js";

export type GlobalOptions = {
  configDir?: string;
  env?: string;
  format?: OutputFormat;
  cwd?: string;
};

/** Everything a command needs, built once per invocation. */
export type StackContext = {
  runId: string;
  config: StackConfig;
  paths: ResolvedPaths;
  services: readonly Service[];
  runtime: ContainerRuntime;
  logger: Logger;
  backups: BackupManager;
  poller: HealthPoller;
  probe: HttpProbe;
  clock: () => Date;
};

export type LoadConfigResult = { ok: true; config: StackConfig } | { ok: false; error: string };

export function loadStackConfig(opts: GlobalOptions): LoadConfigResult {
  try {
    const raw = loadConfig(opts.env, opts.configDir ? path.resolve(opts.cwd ?? process.cwd(), opts.configDir) : undefined);
    const res = validateConfig(raw);
    if (!res.valid) return { ok: false, error: `Invalid configuration: ${res.errors}` };
    return { ok: true, config: res.config };
  } catch (e: unknown) {
    return { ok: false, error: `Failed to load configuration: ${e instanceof Error ? e.message : String(e)}` };
  }
}

export function resolvePaths(config: StackConfig, cwd: string): ResolvedPaths {
  return {
    projectRoot: cwd,
    manifestPath: path.resolve(cwd, config.manifest_path),
    dataDir: path.resolve(cwd, config.data_dir),
    backupDir: path.resolve(cwd, config.backup_dir),
    logDir: path.resolve(cwd, config.log_dir),
  };
}

export type ContextOverrides = {
  runtime?: ContainerRuntime;
  logger?: Logger;
  probe?: HttpProbe;
  sleep?: Sleeper;
  clock?: () => Date;
};

/**
 * Wire the runtime adapter, logger, backup manager and poller for one verb.
 * The log file is `<log_dir>/<verb>_<runId>.log`.
 */
export function createContext(
  config: StackConfig,
  verb: string,
  opts: GlobalOptions,
  overrides: ContextOverrides = {},
): StackContext {
  const cwd = opts.cwd ?? process.cwd();
  const clock = overrides.clock ?? (() => new Date());
  const runId = generateRunId(clock());
  const paths = resolvePaths(config, cwd);

  const logger =
    overrides.logger ??
    new RunLogger({ filePath: path.join(paths.logDir, `${verb}_${runId}.log`), format: opts.format ?? "human" });

  const runtime =
    overrides.runtime ??
    new DockerCompose({
      command: config.runtime.command,
      manifestPath: paths.manifestPath,
      projectName: config.project_name,
      cwd,
    });

  const backups = new BackupManager(
    {
      projectName: config.project_name,
      backupDir: paths.backupDir,
      dataDir: paths.dataDir,
      dataDirLabel: config.data_dir,
      clock,
    },
    logger,
  );

  const poller = new HealthPoller({
    runtime,
    logger,
    healthyPattern: new RegExp(config.polling.healthy_pattern),
    logTailLines: config.polling.log_tail_lines,
    sleep: overrides.sleep,
    clock,
  });

  return {
    runId,
    config,
    paths,
    services: buildRegistry(config.services, config.polling),
    runtime,
    logger,
    backups,
    poller,
    probe: overrides.probe ?? httpProbe,
    clock,
  };
}
