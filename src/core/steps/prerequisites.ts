import fs from "node:fs";
import path from "node:path";
import type { PrerequisiteError, StepResult } from "../../types/deployment.js";
import type { Logger } from "../../logging/logger.js";

const GIB = 1024 ** 3;

export type PrerequisiteOptions = {
  requiredTools: readonly string[];
  manifestPath: string;
  requiredEnv: readonly string[];
  minFreeDiskGb: number;
  /** Directory whose filesystem is checked for free space. */
  diskPath: string;
};

export type PrerequisiteDeps = {
  resolveExecutable: (name: string, env: NodeJS.ProcessEnv) => string | null;
  freeDiskBytes: (dir: string) => Promise<number>;
  env: NodeJS.ProcessEnv;
};

/** Find `name` on PATH the way a shell would. Returns the resolved path or null. */
export function resolveExecutable(name: string, env: NodeJS.ProcessEnv): string | null {
  if (name.includes(path.sep)) return isExecutable(name) ? name : null;
  const dirs = (env.PATH ?? "").split(path.delimiter).filter((d) => d.length > 0);
  const exts = process.platform === "win32" ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";") : [""];
  for (const dir of dirs) {
    for (const ext of exts) {
      const candidate = path.join(dir, name + ext);
      if (isExecutable(candidate)) return candidate;
    }
  }
  return null;
}

function isExecutable(file: string): boolean {
  try {
    fs.accessSync(file, fs.constants.X_OK);
    return fs.statSync(file).isFile();
  } catch {
    return false;
  }
}

/** Bytes available to unprivileged users on the filesystem holding `dir`. */
export async function freeDiskBytes(dir: string): Promise<number> {
  const stats = await fs.promises.statfs(dir);
  return stats.bavail * stats.bsize;
}

export const defaultPrerequisiteDeps: PrerequisiteDeps = {
  resolveExecutable,
  freeDiskBytes,
  env: process.env,
};

function failure(reason: PrerequisiteError["reason"], subject: string, message: string): StepResult {
  return { ok: false, error: { kind: "PrerequisiteError", reason, subject, message } };
}

/**
 * Validate the host before any mutating action. Fails fast on the first
 * missing tool, manifest or environment variable; low disk space is a warning.
 */
export async function checkPrerequisites(
  opts: PrerequisiteOptions,
  logger: Logger,
  deps: PrerequisiteDeps = defaultPrerequisiteDeps,
): Promise<StepResult> {
  logger.info("Checking prerequisites...");

  for (const tool of opts.requiredTools) {
    if (!deps.resolveExecutable(tool, deps.env)) {
      return failure("missingTool", tool, `Required tool not found in PATH: ${tool}`);
    }
  }

  if (!fs.existsSync(opts.manifestPath) || !fs.statSync(opts.manifestPath).isFile()) {
    return failure("missingManifest", opts.manifestPath, `Compose manifest not found: ${opts.manifestPath}`);
  }

  for (const name of opts.requiredEnv) {
    const value = deps.env[name];
    if (value === undefined || value.length === 0) {
      return failure("missingEnv", name, `Required environment variable is not set: ${name}`);
    }
  }

  const warnings: string[] = [];
  const available = await deps.freeDiskBytes(opts.diskPath);
  if (available < opts.minFreeDiskGb * GIB) {
    const msg = `Low disk space: ${(available / GIB).toFixed(1)} GiB available, ${opts.minFreeDiskGb} GiB recommended`;
    logger.warn(msg);
    warnings.push(msg);
  }

  logger.success("Prerequisites check completed");
  return { ok: true, value: undefined, warnings };
}
