import { Command, InvalidArgumentError, Option } from "commander";
import { execute, exitCodeFor, type StackCommand } from "./commands/command.js";
import { createContext, loadStackConfig, type ContextOverrides, type GlobalOptions } from "./commands/context.js";
import { EXIT, type ExitCode } from "./commands/exit-codes.js";
import type { OutputFormat } from "./logging/logger.js";

export type Runner = (cmd: StackCommand, globals: GlobalOptions) => Promise<ExitCode>;

/**
 * Load config, wire the context and execute one command. Every outcome ends in
 * an exit code; nothing is thrown past this point.
 */
export function createRunner(overrides: ContextOverrides = {}): Runner {
  return async (cmd, globals) => {
    const loaded = loadStackConfig(globals);
    if (!loaded.ok) {
      process.stderr.write(`[ERROR] ${loaded.error}\n`);
      return EXIT.FAILURE;
    }

    const ctx = createContext(loaded.config, cmd.kind, globals, overrides);
    try {
      const result = await execute(cmd, ctx);
      if (!result.ok) {
        ctx.logger.error(`${cmd.kind} failed: ${result.error.kind}: ${result.error.message}`);
      }
      return exitCodeFor(result);
    } catch (e: unknown) {
      ctx.logger.error(`${cmd.kind} failed: ${e instanceof Error ? e.message : String(e)}`);
      return EXIT.FAILURE;
    }
  };
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

type ProgramOptions = {
  configDir?: string;
  env?: string;
  format: OutputFormat;
};

/**
 * Build the CLI. Each verb resolves to a `StackCommand` and is handed to `run`;
 * the resulting exit code is stored on `process.exitCode` by default.
 */
export function createProgram(run: Runner, onExit: (code: ExitCode) => void = (code) => { process.exitCode = code; }): Command {
  const program = new Command();

  program
    .name("stackctl")
    .description("Deploy, verify and recover a multi-service container stack")
    .version("0.1.0")
    .option("--config-dir <path>", "Path to config directory (default: bundled config/)")
    .option("--env <name>", "Environment overlay, loads <config-dir>/<name>.yaml")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
    .showHelpAfterError();

  const dispatch = async (cmd: StackCommand): Promise<void> => {
    const opts = program.opts<ProgramOptions>();
    onExit(await run(cmd, { configDir: opts.configDir, env: opts.env, format: opts.format }));
  };

  program
    .command("deploy")
    .description("Provision, back up, build, start, verify, initialize and test the stack")
    .action(() => dispatch({ kind: "deploy" }));

  program
    .command("health")
    .description("Run post-deploy health checks against the running stack")
    .action(() => dispatch({ kind: "health" }));

  program
    .command("status")
    .description("Show container states, service URLs and the last deploy run")
    .action(() => dispatch({ kind: "status" }));

  program
    .command("logs")
    .description("Show logs for one service, or follow all services")
    .argument("[service]", "Service name (omit to follow all services)")
    .option("-f, --follow", "Follow the service's logs")
    .option("--tail <lines>", "Lines to show for a single service", parsePositiveInt, 50)
    .action((service: string | undefined, opts: { follow?: boolean; tail: number }) =>
      dispatch({ kind: "logs", service, follow: opts.follow ?? false, tail: opts.tail }),
    );

  program
    .command("restart")
    .description("Restart all services and re-run health checks")
    .action(() => dispatch({ kind: "restart" }));

  program
    .command("stop")
    .description("Stop all services (volumes are kept)")
    .action(() => dispatch({ kind: "stop" }));

  program
    .command("update")
    .description("Pull newer images, rebuild, restart and re-run health checks")
    .action(() => dispatch({ kind: "update" }));

  program
    .command("cleanup")
    .description("Remove containers and volumes and prune unused runtime resources (irreversible)")
    .action(() => dispatch({ kind: "cleanup" }));

  program
    .command("rollback")
    .description("Restore the data directory from the latest backup")
    .option("--archive <path>", "Restore this archive instead of the latest")
    .option("--restart", "Stop the stack before restoring, then start and verify it")
    .action((opts: { archive?: string; restart?: boolean }) =>
      dispatch({ kind: "rollback", archive: opts.archive, restart: opts.restart ?? false }),
    );

  program
    .command("backup")
    .description("Archive the data directory")
    .action(() => dispatch({ kind: "backup" }));

  return program;
}
