import { describe, expect, it } from "vitest";
import { HealthPoller } from "../src/core/steps/health-poll.js";
import { buildRegistry } from "../src/registry/services.js";
import type { Service } from "../src/types/deployment.js";
import { FakeRuntime } from "./helpers/fake-runtime.js";
import { MemoryLogger } from "./helpers/memory-logger.js";

const POLLING = { max_attempts: 30, interval_seconds: 10, log_tail_lines: 50, healthy_pattern: "\\(healthy\\)" };

function setup(health: Record<string, boolean[]>) {
  const runtime = new FakeRuntime({ health });
  const logger = new MemoryLogger();
  const sleeps: number[] = [];
  const poller = new HealthPoller({
    runtime,
    logger,
    healthyPattern: /\(healthy\)/,
    logTailLines: 50,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    clock: () => new Date("2026-02-11T09:30:00.000Z"),
  });
  return { runtime, logger, sleeps, poller };
}

function service(name: string, maxAttempts = 30): Service {
  const [svc] = buildRegistry([{ name, max_attempts: maxAttempts }], POLLING);
  return svc;
}

describe("HealthPoller.pollService", () => {
  it("stops at the first healthy check", async () => {
    const { runtime, sleeps, poller } = setup({ api: [false, false, true] });
    const outcome = await poller.pollService(service("api"));

    expect(outcome.status).toBe("healthy");
    expect(outcome.attempts.map((a) => a.attempt)).toEqual([1, 2, 3]);
    expect(outcome.attempts.map((a) => a.healthy)).toEqual([false, false, true]);
    expect(runtime.probes("api")).toBe(3);
    expect(sleeps).toEqual([10_000, 10_000]);
  });

  it("gives up after exactly maxAttempts checks without a trailing sleep", async () => {
    const { runtime, sleeps, poller } = setup({ api: [false] });
    const outcome = await poller.pollService(service("api", 30));

    expect(outcome.status).toBe("timed_out");
    expect(outcome.attempts).toHaveLength(30);
    expect(outcome.attempts[29].attempt).toBe(30);
    expect(runtime.probes("api")).toBe(30);
    expect(sleeps).toHaveLength(29);
  });

  it("uses the default probe `ps <name>`", async () => {
    const { runtime, poller } = setup({});
    await poller.pollService(service("redis"));
    expect(runtime.calls).toEqual(["probe ps redis"]);
  });

  it("logs progress between attempts", async () => {
    const { logger, poller } = setup({ api: [false, true] });
    await poller.pollService(service("api", 5));
    expect(logger.messages("info")).toEqual(["Attempt 1/5: api not ready yet..."]);
  });
});

describe("HealthPoller.pollAll", () => {
  it("polls services in order and reports the last check of each", async () => {
    const { runtime, poller } = setup({ postgres: [false, true] });
    const services = buildRegistry([{ name: "postgres" }, { name: "api" }], POLLING);
    const res = await poller.pollAll(services);

    expect(res.ok).toBe(true);
    expect(res.results.map((r) => [r.service, r.attempt, r.healthy])).toEqual([
      ["postgres", 2, true],
      ["api", 1, true],
    ]);
    expect(runtime.calls).toEqual(["probe ps postgres", "probe ps postgres", "probe ps api"]);
  });

  it("stops at the first service that times out and dumps its log tail", async () => {
    const { runtime, logger, poller } = setup({ postgres: [false] });
    const services = buildRegistry([{ name: "postgres", max_attempts: 3 }, { name: "api" }], POLLING);
    const res = await poller.pollAll(services);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toEqual({
      kind: "HealthError",
      reason: "Timeout",
      service: "postgres",
      attempts: 3,
      message: "postgres failed to become healthy after 3 attempts",
    });
    expect(runtime.probes("api")).toBe(0);
    expect(runtime.calls[runtime.calls.length - 1]).toBe("logs --tail=50 postgres");

    const dump = logger.entries.find((e) => e.level === "block");
    expect(dump?.message).toBe("Logs for postgres (last 50 lines):");
    expect(dump?.text?.split("\n").filter((l) => l.length > 0)).toHaveLength(50);
  });
});
