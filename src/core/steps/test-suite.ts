import type { ContainerRuntime } from "../../runtime/compose.js";
import type { Logger } from "../../logging/logger.js";
import type { ExecStepConfig } from "../../types/config.js";
import type { TestOutcome } from "../../types/deployment.js";

/**
 * Run the service test suite inside the running stack. The outcome is for the
 * operator; a failing suite does not stop the deploy.
 */
export async function runTestSuite(cfg: ExecStepConfig, runtime: ContainerRuntime, logger: Logger): Promise<TestOutcome> {
  logger.info("Running tests...");
  const res = await runtime.exec(cfg.service, cfg.command);
  if (res.stdout.length > 0) logger.block("Test output:", res.stdout);
  if (res.stderr.length > 0) logger.block("Test errors:", res.stderr);

  if (res.exitCode === 0) {
    logger.success("Tests passed");
    return { passed: true, exitCode: 0 };
  }
  logger.warn("Some tests failed", { exitCode: res.exitCode });
  return { passed: false, exitCode: res.exitCode };
}
