import type { ContainerRuntime } from "../../runtime/compose.js";
import type { Logger } from "../../logging/logger.js";
import type { HealthCheckResult, HealthError, Service } from "../../types/deployment.js";

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type PollOutcome =
  | { status: "healthy"; attempts: HealthCheckResult[] }
  | { status: "timed_out"; attempts: HealthCheckResult[] };

export type PollAllResult =
  | { ok: true; results: HealthCheckResult[] }
  | { ok: false; error: HealthError; results: HealthCheckResult[] };

export type HealthPollerOptions = {
  runtime: ContainerRuntime;
  logger: Logger;
  healthyPattern: RegExp;
  logTailLines: number;
  sleep?: Sleeper;
  clock?: () => Date;
};

/**
 * Health Poller: bounded, fixed-interval polling of each service's runtime
 * status. Services are polled one at a time, in registry order.
 */
export class HealthPoller {
  private readonly sleep: Sleeper;
  private readonly clock: () => Date;

  constructor(private readonly opts: HealthPollerOptions) {
    this.sleep = opts.sleep ?? sleep;
    this.clock = opts.clock ?? (() => new Date());
  }

  /** Healthy iff the probe exited 0 and its output matches the healthy pattern. */
  async check(service: Service): Promise<boolean> {
    const res = await this.opts.runtime.probe(service.healthProbe);
    return res.exitCode === 0 && this.opts.healthyPattern.test(res.stdout);
  }

  /**
   * Poll one service until it is healthy or `maxAttempts` checks have failed.
   * Attempts are numbered from 1 with no gaps.
   */
  async pollService(service: Service): Promise<PollOutcome> {
    const attempts: HealthCheckResult[] = [];
    const max = Math.max(1, service.maxAttempts);

    for (let attempt = 1; attempt <= max; attempt++) {
      const healthy = await this.check(service);
      attempts.push({ service: service.name, attempt, healthy, checkedAt: this.clock().toISOString() });

      if (healthy) return { status: "healthy", attempts };
      if (attempt === max) break;

      this.opts.logger.info(`Attempt ${attempt}/${max}: ${service.name} not ready yet...`);
      await this.sleep(service.pollIntervalSeconds * 1000);
    }

    return { status: "timed_out", attempts };
  }

  /**
   * Poll every service in order. The first service that times out has its log
   * tail dumped and ends the sequence; later services are not polled.
   */
  async pollAll(services: readonly Service[]): Promise<PollAllResult> {
    const { logger } = this.opts;
    logger.info("Waiting for services to become healthy...");
    const results: HealthCheckResult[] = [];

    for (const service of services) {
      logger.info(`Checking health of ${service.name}...`);
      const outcome = await this.pollService(service);
      const last = outcome.attempts[outcome.attempts.length - 1];
      results.push(last);

      if (outcome.status === "healthy") {
        logger.success(`${service.name} is healthy`);
        continue;
      }

      const message = `${service.name} failed to become healthy after ${last.attempt} attempts`;
      logger.error(message);
      await this.dumpLogs(service.name);
      return {
        ok: false,
        error: { kind: "HealthError", reason: "Timeout", service: service.name, attempts: last.attempt, message },
        results,
      };
    }

    logger.success("All services are healthy");
    return { ok: true, results };
  }

  async dumpLogs(service: string): Promise<void> {
    await dumpServiceLogs(this.opts.runtime, this.opts.logger, service, this.opts.logTailLines);
  }
}

/** Print the last `lines` log lines of a service. */
export async function dumpServiceLogs(runtime: ContainerRuntime, logger: Logger, service: string, lines: number): Promise<void> {
  const res = await runtime.logs(service, lines);
  const output = [res.stdout, res.stderr].filter((s) => s.length > 0).join("\n");
  logger.block(`Logs for ${service} (last ${lines} lines):`, output);
}
