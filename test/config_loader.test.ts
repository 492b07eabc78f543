import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { CONFIG_DIR as CONFIG_DIR_DEFAULT, deepMerge, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";

const CONFIG_DIR = fileURLToPath(new URL("../config", import.meta.url));

function loadValid(envName?: string, env: NodeJS.ProcessEnv = {}) {
  const res = validateConfig(loadConfig(envName, CONFIG_DIR, env));
  if (!res.valid) throw new Error(res.errors);
  return res.config;
}

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadValid();
    expect(config.schema_version).toBe("1.0.0");
    expect(config.project_name).toBe("stack");
    expect(config.manifest_path).toBe("docker-compose.yml");
    expect(config.polling).toEqual({ max_attempts: 30, interval_seconds: 10, log_tail_lines: 50, healthy_pattern: "\\(healthy\\)" });
    expect(config.services.map((s) => s.name)).toEqual(["graph-db", "postgres", "redis", "api", "worker", "scheduler", "monitoring"]);
    expect(config.required_env).toEqual([]);
    expect(config.backup.retain).toBe(5);
  });

  it("finds the bundled config directory by default", () => {
    expect(CONFIG_DIR_DEFAULT).toBe(CONFIG_DIR);
    expect(loadConfig(undefined, undefined, {}).project_name).toBe("stack");
  });

  it("merges the production overlay over base", () => {
    const config = loadValid("production");
    expect(config.project_name).toBe("stack_prod");
    expect(config.manifest_path).toBe("docker/docker-compose.prod.yml");
    expect(config.required_env).toEqual(["POSTGRES_PASSWORD", "GRAPH_DB_PASSWORD", "REDIS_PASSWORD", "API_SECRET_KEY"]);
    expect(config.backup.retain).toBe(10);
    // base fields still present
    expect(config.polling.max_attempts).toBe(30);
    expect(config.validation.primary_service).toBe("api");
  });

  it("applies environment variable overrides", () => {
    const config = loadValid(undefined, { STACKCTL_BACKUP_DIR: "/tmp/override", STACKCTL_MIN_FREE_DISK_GB: "5" });
    expect(config.backup_dir).toBe("/tmp/override");
    expect(config.min_free_disk_gb).toBe(5);
  });

  it("overrides nested keys with a double underscore", () => {
    const config = loadValid(undefined, { STACKCTL_POLLING__MAX_ATTEMPTS: "5", STACKCTL_POLLING__INTERVAL_SECONDS: "2" });
    expect(config.polling.max_attempts).toBe(5);
    expect(config.polling.interval_seconds).toBe(2);
    expect(config.polling.log_tail_lines).toBe(50);
  });

  it("ignores variables that name no config key", () => {
    const config = loadValid(undefined, { STACKCTL_DEBUG: "1", STACKCTL_POLLING_MAX_ATTEMPTS: "5", STACKCTL_POLLING__NOPE: "x" });
    expect(config.polling.max_attempts).toBe(30);
    expect(Object.keys(config)).not.toContain("debug");
  });

  it("does not replace a section or a list with a scalar", () => {
    const config = loadValid(undefined, { STACKCTL_POLLING: "fast", STACKCTL_REQUIRED_TOOLS: "docker" });
    expect(config.polling.max_attempts).toBe(30);
    expect(config.required_tools).toEqual(["docker"]);
  });

  it("keeps numeric-looking strings as strings for string keys", () => {
    const config = loadValid(undefined, { STACKCTL_DATA_DIR: "2026" });
    expect(config.data_dir).toBe("2026");
  });

  it("ignores an overlay that does not exist", () => {
    expect(loadValid("staging").project_name).toBe("stack");
  });

  it("rejects a YAML file that is not a mapping", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "stackctl-cfg-"));
    try {
      fs.writeFileSync(path.join(dir, "base.yaml"), "- a\n- b\n");
      expect(() => loadConfig(undefined, dir, {})).toThrow("Config file is not a mapping");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    const merged = deepMerge({ a: { b: 1, c: [1, 2] }, d: "x" }, { a: { c: [3] }, e: true });
    expect(merged).toEqual({ a: { b: 1, c: [3] }, d: "x", e: true });
  });
});

describe("config validator", () => {
  it("accepts the bundled config", () => {
    expect(validateConfig(loadConfig(undefined, CONFIG_DIR, {})).valid).toBe(true);
  });

  it("rejects an invalid project name", () => {
    const res = validateConfig({ ...loadConfig(undefined, CONFIG_DIR, {}), project_name: "My Stack" });
    expect(res.valid).toBe(false);
    if (res.valid) return;
    expect(res.errors).toContain("config/project_name must match pattern");
  });

  it("rejects unknown keys", () => {
    const res = validateConfig({ ...loadConfig(undefined, CONFIG_DIR, {}), extra: 1 });
    expect(res.valid).toBe(false);
    if (res.valid) return;
    expect(res.errors).toContain("must NOT have additional properties");
  });

  it("rejects zero max_attempts", () => {
    const base = loadConfig(undefined, CONFIG_DIR, {});
    const res = validateConfig({ ...base, polling: { max_attempts: 0, interval_seconds: 10, log_tail_lines: 50, healthy_pattern: "x" } });
    expect(res.valid).toBe(false);
    if (res.valid) return;
    expect(res.errors).toContain("config/polling/max_attempts must be >= 1");
  });

  it("reports a missing section", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {});
    delete config.backup;
    const res = validateConfig(config);
    expect(res.valid).toBe(false);
    if (res.valid) return;
    expect(res.errors).toContain("must have required property 'backup'");
  });
});
