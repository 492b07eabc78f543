import { findService } from "../registry/services.js";
import { dumpServiceLogs } from "../core/steps/health-poll.js";
import type { StepResult } from "../types/deployment.js";
import type { StackContext } from "./context.js";

export type LogsOptions = {
  service?: string;
  follow: boolean;
  tail: number;
};

/**
 * With a service: print its log tail, or follow it. Without: follow every service.
 */
export async function logs(ctx: StackContext, opts: LogsOptions): Promise<StepResult> {
  if (opts.service && !findService(ctx.services, opts.service)) {
    ctx.logger.warn(`${opts.service} is not in the service registry; asking the runtime anyway`);
  }

  if (opts.service && !opts.follow) {
    await dumpServiceLogs(ctx.runtime, ctx.logger, opts.service, opts.tail);
    return { ok: true, value: undefined, warnings: [] };
  }

  const code = await ctx.runtime.followLogs(opts.service);
  // 130: interrupted with Ctrl-C, the normal way to stop following.
  if (code !== 0 && code !== 130) {
    return {
      ok: false,
      error: { kind: "RuntimeError", operation: "logs", message: `Log streaming exited with ${code}`, exitCode: code },
    };
  }
  return { ok: true, value: undefined, warnings: [] };
}
