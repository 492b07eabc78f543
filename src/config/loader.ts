import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

const ENV_PREFIX = "STACKCTL_";

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): PlainObject {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) throw new Error(`Config file is not a mapping: ${filePath}`);
  return parsed;
}

/**
 * Apply STACKCTL_ prefixed environment variable overrides. `__` separates
 * nested keys: STACKCTL_POLLING__MAX_ATTEMPTS → polling.max_attempts.
 * Only existing scalar keys can be overridden; other variables are ignored.
 */
function applyEnvOverrides(config: PlainObject, env: NodeJS.ProcessEnv): PlainObject {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const keys = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    result = setExisting(result, keys, value);
  }
  return result;
}

/** Numeric strings become numbers where the overridden value is a number. */
function setExisting(target: PlainObject, keys: string[], value: string): PlainObject {
  const [head, ...rest] = keys;
  if (!head || !Object.hasOwn(target, head)) return target;
  const current = target[head];

  if (rest.length === 0) {
    if (isPlainObject(current) || Array.isArray(current)) return target;
    const numeric = typeof current === "number" && /^\d+(\.\d+)?$/.test(value);
    return { ...target, [head]: numeric ? Number(value) : value };
  }
  if (!isPlainObject(current)) return target;
  return { ...target, [head]: setExisting(current, rest, value) };
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← STACKCTL_* environment variables.
 *
 * The result is unchecked; run it through `validateConfig` before use.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): PlainObject {
  const dir = configDir ?? CONFIG_DIR;

  const base = loadYaml(path.join(dir, "base.yaml"));

  let merged = base;
  if (envName) {
    merged = deepMerge(base, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
