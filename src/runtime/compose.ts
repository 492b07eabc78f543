import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

export type CommandOutcome = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

/**
 * The container runtime as seen by the orchestrator. Every call resolves with
 * the subprocess outcome; a non-zero exit is data, not an exception.
 */
export interface ContainerRuntime {
  build(opts: { noCache: boolean }): Promise<CommandOutcome>;
  up(): Promise<CommandOutcome>;
  down(opts: { volumes: boolean }): Promise<CommandOutcome>;
  restart(): Promise<CommandOutcome>;
  pull(): Promise<CommandOutcome>;
  ps(service?: string): Promise<CommandOutcome>;
  /** Run raw runtime arguments, used for per-service health probes. */
  probe(args: readonly string[]): Promise<CommandOutcome>;
  logs(service: string, tail: number): Promise<CommandOutcome>;
  /** Stream logs to the terminal until the runtime exits. */
  followLogs(service?: string): Promise<number>;
  exec(service: string, command: readonly string[]): Promise<CommandOutcome>;
  prune(): Promise<CommandOutcome>;
}

export type ExecFn = (file: string, args: string[], opts: { cwd: string; timeoutMs: number }) => Promise<CommandOutcome>;

export type FollowFn = (file: string, args: string[], opts: { cwd: string }) => Promise<number>;

/** execFile wrapper: maps a failed process to its exit code instead of rejecting. */
export const execCommand: ExecFn = async (file, args, opts) => {
  try {
    const { stdout, stderr } = await pExecFile(file, args, {
      cwd: opts.cwd,
      timeout: opts.timeoutMs,
      maxBuffer: 50 * 1024 * 1024,
      shell: false,
    });
    return { exitCode: 0, stdout, stderr };
  } catch (e: unknown) {
    if (isExecFailure(e)) {
      return {
        exitCode: typeof e.code === "number" ? e.code : 1,
        stdout: e.stdout ?? "",
        stderr: e.stderr || e.message,
      };
    }
    throw e;
  }
};

type ExecFailure = Error & { code?: number | string; stdout?: string; stderr?: string };

function isExecFailure(e: unknown): e is ExecFailure {
  return e instanceof Error && ("stdout" in e || "stderr" in e || "code" in e);
}

export const followCommand: FollowFn = (file, args, opts) =>
  new Promise((resolve, reject) => {
    const child = spawn(file, args, { cwd: opts.cwd, stdio: "inherit" });
    child.once("error", reject);
    child.once("close", (code) => resolve(code ?? 1));
  });

export type DockerComposeOptions = {
  /** Binary plus leading arguments, e.g. ["docker", "compose"]. */
  command: readonly string[];
  manifestPath: string;
  projectName: string;
  cwd: string;
  timeoutMs?: number;
  exec?: ExecFn;
  follow?: FollowFn;
};

/**
 * `docker compose -f <manifest> -p <project> ...` adapter.
 */
export class DockerCompose implements ContainerRuntime {
  private readonly file: string;
  private readonly prefix: string[];
  private readonly exec_: ExecFn;
  private readonly follow: FollowFn;
  private readonly timeoutMs: number;

  constructor(private readonly opts: DockerComposeOptions) {
    const [file, ...rest] = opts.command;
    if (!file) throw new Error("runtime.command must name an executable");
    this.file = file;
    this.prefix = [...rest, "-f", opts.manifestPath, "-p", opts.projectName];
    this.exec_ = opts.exec ?? execCommand;
    this.follow = opts.follow ?? followCommand;
    this.timeoutMs = opts.timeoutMs ?? 30 * 60 * 1000;
  }

  build(opts: { noCache: boolean }): Promise<CommandOutcome> {
    return this.run(opts.noCache ? ["build", "--no-cache"] : ["build"]);
  }

  up(): Promise<CommandOutcome> {
    return this.run(["up", "-d"]);
  }

  down(opts: { volumes: boolean }): Promise<CommandOutcome> {
    return this.run(opts.volumes ? ["down", "-v"] : ["down"]);
  }

  restart(): Promise<CommandOutcome> {
    return this.run(["restart"]);
  }

  pull(): Promise<CommandOutcome> {
    return this.run(["pull"]);
  }

  ps(service?: string): Promise<CommandOutcome> {
    return this.run(service ? ["ps", service] : ["ps"]);
  }

  probe(args: readonly string[]): Promise<CommandOutcome> {
    return this.run([...args]);
  }

  logs(service: string, tail: number): Promise<CommandOutcome> {
    return this.run(["logs", `--tail=${tail}`, service]);
  }

  followLogs(service?: string): Promise<number> {
    const args = [...this.prefix, "logs", "-f", ...(service ? [service] : [])];
    return this.follow(this.file, args, { cwd: this.opts.cwd });
  }

  exec(service: string, command: readonly string[]): Promise<CommandOutcome> {
    return this.run(["exec", "-T", service, ...command]);
  }

  /** `docker system prune -f`: not scoped to the compose project. */
  prune(): Promise<CommandOutcome> {
    return this.exec_(this.systemBinary(), ["system", "prune", "-f"], { cwd: this.opts.cwd, timeoutMs: this.timeoutMs });
  }

  private run(args: string[]): Promise<CommandOutcome> {
    return this.exec_(this.file, [...this.prefix, ...args], { cwd: this.opts.cwd, timeoutMs: this.timeoutMs });
  }

  private systemBinary(): string {
    // `docker-compose` standalone ships beside `docker`.
    return this.file === "docker-compose" ? "docker" : this.file;
  }
}
