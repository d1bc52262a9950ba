import type { ProvisionContext } from "../context.js";
import type { Command } from "../types/command.js";
import { DURATION_TIMEOUTS, type DurationCategory } from "../types/risk.js";
import { ProvisionError, type ProvisionErrorCode } from "../shared/errors.js";
import type { ExecResult } from "./executor.js";
import { categorizeFailure } from "./categorize.js";
import { describeCommand } from "./privilege.js";

type ExecContext = Pick<ProvisionContext, "executor">;

/** Execute a Command through the context's executor with the timeout for its duration category. */
export async function execute(ctx: ExecContext, command: Command, duration: DurationCategory): Promise<ExecResult> {
  return ctx.executor.execute(command, DURATION_TIMEOUTS[duration]);
}

/**
 * Execute and turn a non-zero exit into a ProvisionError carrying the
 * command line, exit code, stderr and a categorized remediation.
 */
export async function executeOrThrow(
  ctx: ExecContext,
  command: Command,
  duration: DurationCategory,
  failure: { code: ProvisionErrorCode; message: string },
): Promise<ExecResult> {
  const result = await execute(ctx, command, duration);
  if (result.exitCode !== 0) {
    const category = categorizeFailure(result.stderr);
    throw new ProvisionError(
      failure.code,
      failure.message,
      {
        command: describeCommand(command),
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
        category: category.code,
        transient: category.transient,
      },
      category.remediation,
    );
  }
  return result;
}
