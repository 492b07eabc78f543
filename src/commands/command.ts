import type { FatalError, StepResult } from "../types/deployment.js";
import type { StackContext } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { deploy } from "./deploy.js";
import { health } from "./health.js";
import { status } from "./status.js";
import { logs } from "./logs.js";
import { cleanup, restart, stop, update } from "./lifecycle.js";
import { backup, rollback } from "./rollback.js";

/**
 * One CLI invocation, resolved once at the boundary.
 */
export type StackCommand =
  | { kind: "deploy" }
  | { kind: "health" }
  | { kind: "status" }
  | { kind: "logs"; service?: string; follow: boolean; tail: number }
  | { kind: "restart" }
  | { kind: "stop" }
  | { kind: "update" }
  | { kind: "cleanup" }
  | { kind: "rollback"; archive?: string; restart: boolean }
  | { kind: "backup" };

export type CommandResult = { ok: true; warnings: string[] } | { ok: false; error: FatalError };

function settle<T>(res: StepResult<T>): CommandResult {
  return res.ok ? { ok: true, warnings: res.warnings } : { ok: false, error: res.error };
}

function unreachable(cmd: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(cmd)}`);
}

export async function execute(cmd: StackCommand, ctx: StackContext): Promise<CommandResult> {
  switch (cmd.kind) {
    case "deploy":
      return settle(await deploy(ctx));
    case "health":
      return settle(await health(ctx));
    case "status":
      return settle(await status(ctx));
    case "logs":
      return settle(await logs(ctx, { service: cmd.service, follow: cmd.follow, tail: cmd.tail }));
    case "restart":
      return settle(await restart(ctx));
    case "stop":
      return settle(await stop(ctx));
    case "update":
      return settle(await update(ctx));
    case "cleanup":
      return settle(await cleanup(ctx));
    case "rollback":
      return settle(await rollback(ctx, { archive: cmd.archive, restart: cmd.restart }));
    case "backup":
      return settle(await backup(ctx));
    default:
      return unreachable(cmd);
  }
}

/** Warnings never change the exit code; any fatal error is 1. */
export function exitCodeFor(result: CommandResult): ExitCode {
  return result.ok ? EXIT.SUCCESS : EXIT.FAILURE;
}
