import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { checkPrerequisites, resolveExecutable, type PrerequisiteDeps, type PrerequisiteOptions } from "../src/core/steps/prerequisites.js";
import { MemoryLogger } from "./helpers/memory-logger.js";

const GIB = 1024 ** 3;

let tmp: string;
let manifest: string;

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "stackctl-prereq-"));
  manifest = path.join(tmp, "docker-compose.yml");
  fs.writeFileSync(manifest, "services: {}\n");
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

function deps(overrides: Partial<PrerequisiteDeps> = {}): PrerequisiteDeps {
  return {
    resolveExecutable: (name) => `/usr/bin/${name}`,
    freeDiskBytes: async () => 100 * GIB,
    env: {},
    ...overrides,
  };
}

function options(overrides: Partial<PrerequisiteOptions> = {}): PrerequisiteOptions {
  return {
    requiredTools: ["docker"],
    manifestPath: manifest,
    requiredEnv: [],
    minFreeDiskGb: 10,
    diskPath: tmp,
    ...overrides,
  };
}

describe("checkPrerequisites", () => {
  it("passes when tools, manifest, env and disk are all present", async () => {
    const logger = new MemoryLogger();
    const res = await checkPrerequisites(options({ requiredEnv: ["DB_PASSWORD"] }), logger, deps({ env: { DB_PASSWORD: "test-secret" } }));
    expect(res).toEqual({ ok: true, value: undefined, warnings: [] });
    expect(logger.messages("success")).toEqual(["Prerequisites check completed"]);
  });

  it("fails on the first missing tool", async () => {
    const res = await checkPrerequisites(
      options({ requiredTools: ["docker", "git"] }),
      new MemoryLogger(),
      deps({ resolveExecutable: (name) => (name === "docker" ? "/usr/bin/docker" : null) }),
    );
    expect(res).toEqual({
      ok: false,
      error: { kind: "PrerequisiteError", reason: "missingTool", subject: "git", message: "Required tool not found in PATH: git" },
    });
  });

  it("fails when the manifest is missing", async () => {
    const missing = path.join(tmp, "nope.yml");
    const res = await checkPrerequisites(options({ manifestPath: missing }), new MemoryLogger(), deps());
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toEqual({
      kind: "PrerequisiteError",
      reason: "missingManifest",
      subject: missing,
      message: `Compose manifest not found: ${missing}`,
    });
  });

  it("fails when a required environment variable is unset or empty", async () => {
    const res = await checkPrerequisites(
      options({ requiredEnv: ["DB_PASSWORD", "API_KEY"] }),
      new MemoryLogger(),
      deps({ env: { DB_PASSWORD: "test-secret", API_KEY: "" } }),
    );
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe("PrerequisiteError");
    expect(res.error.message).toBe("Required environment variable is not set: API_KEY");
  });

  it("warns, but passes, on low disk space", async () => {
    const logger = new MemoryLogger();
    const res = await checkPrerequisites(options(), logger, deps({ freeDiskBytes: async () => 2 * GIB }));
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.warnings).toEqual(["Low disk space: 2.0 GiB available, 10 GiB recommended"]);
    expect(logger.messages("warn")).toEqual(res.warnings);
  });
});

describe("resolveExecutable", () => {
  it("finds an executable on PATH", () => {
    const bin = path.join(tmp, "bin");
    fs.mkdirSync(bin);
    const tool = path.join(bin, "fake-tool");
    fs.writeFileSync(tool, "#!/bin/sh\n");
    fs.chmodSync(tool, 0o755);

    expect(resolveExecutable("fake-tool", { PATH: bin })).toBe(tool);
    expect(resolveExecutable("other-tool", { PATH: bin })).toBeNull();
  });

  it("returns null with an empty PATH", () => {
    expect(resolveExecutable("docker", {})).toBeNull();
  });
});
