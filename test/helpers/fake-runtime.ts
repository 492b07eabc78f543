import type { CommandOutcome, ContainerRuntime } from "../../src/runtime/compose.js";

const OK: CommandOutcome = { exitCode: 0, stdout: "", stderr: "" };

export type FakeRuntimeOptions = {
  /** Per-service probe results in call order; the last value repeats. Unlisted services are healthy. */
  health?: Record<string, boolean[]>;
  build?: CommandOutcome;
  up?: CommandOutcome;
  down?: CommandOutcome;
  restart?: CommandOutcome;
  pull?: CommandOutcome;
  prune?: CommandOutcome;
  followExit?: number;
  /** Outcome for `exec <service> <command...>`; defaults to exit 0. */
  exec?: (service: string, command: readonly string[]) => CommandOutcome;
};

/**
 * In-process stand-in for the compose CLI. Records every call as a single
 * space-joined string.
 */
export class FakeRuntime implements ContainerRuntime {
  readonly calls: string[] = [];
  private readonly probeCounts = new Map<string, number>();

  constructor(private readonly opts: FakeRuntimeOptions = {}) {}

  async build(o: { noCache: boolean }): Promise<CommandOutcome> {
    this.calls.push(o.noCache ? "build --no-cache" : "build");
    return this.opts.build ?? OK;
  }

  async up(): Promise<CommandOutcome> {
    this.calls.push("up -d");
    return this.opts.up ?? OK;
  }

  async down(o: { volumes: boolean }): Promise<CommandOutcome> {
    this.calls.push(o.volumes ? "down -v" : "down");
    return this.opts.down ?? OK;
  }

  async restart(): Promise<CommandOutcome> {
    this.calls.push("restart");
    return this.opts.restart ?? OK;
  }

  async pull(): Promise<CommandOutcome> {
    this.calls.push("pull");
    return this.opts.pull ?? OK;
  }

  async ps(service?: string): Promise<CommandOutcome> {
    this.calls.push(service ? `ps ${service}` : "ps");
    return { exitCode: 0, stdout: "NAME   STATUS\napi    Up 2 minutes (healthy)\n", stderr: "" };
  }

  async probe(args: readonly string[]): Promise<CommandOutcome> {
    this.calls.push(`probe ${args.join(" ")}`);
    const service = args[args.length - 1] ?? "";
    const n = this.probeCounts.get(service) ?? 0;
    this.probeCounts.set(service, n + 1);

    const seq = this.opts.health?.[service];
    const healthy = seq === undefined ? true : (seq[Math.min(n, seq.length - 1)] ?? true);
    const state = healthy ? "Up 1 minute (healthy)" : "Up 1 minute (health: starting)";
    return { exitCode: 0, stdout: `${service}   ${state}\n`, stderr: "" };
  }

  async logs(service: string, tail: number): Promise<CommandOutcome> {
    this.calls.push(`logs --tail=${tail} ${service}`);
    const lines = Array.from({ length: tail }, (_, i) => `${service} log line ${i + 1}`);
    return { exitCode: 0, stdout: lines.join("\n") + "\n", stderr: "" };
  }

  async followLogs(service?: string): Promise<number> {
    this.calls.push(service ? `logs -f ${service}` : "logs -f");
    return this.opts.followExit ?? 0;
  }

  async exec(service: string, command: readonly string[]): Promise<CommandOutcome> {
    this.calls.push(`exec ${service} ${command.join(" ")}`);
    return this.opts.exec?.(service, command) ?? OK;
  }

  async prune(): Promise<CommandOutcome> {
    this.calls.push("system prune -f");
    return this.opts.prune ?? OK;
  }

  /** Number of probe calls made for one service. */
  probes(service: string): number {
    return this.probeCounts.get(service) ?? 0;
  }
}
