import type { ProvisionContext } from "../context.js";
import type { ServiceResult } from "../types/results.js";
import { execute, executeOrThrow } from "../execution/helpers.js";
import { elevated } from "../execution/privilege.js";
import { ProvisionError, ProvisionErrorCode } from "../shared/errors.js";
import { pathExists } from "../shared/fs.js";

/**
 * Install the unit file from the workspace and (re)start it. Restart rather
 * than start so a re-run picks up a changed unit or application code.
 */
export async function installService(ctx: ProvisionContext): Promise<ServiceResult> {
  const { serviceSource, serviceTarget } = ctx.paths;
  const { name } = ctx.config.service;
  const { commands, host } = ctx;

  if (!(await pathExists(serviceSource))) {
    throw new ProvisionError(
      ProvisionErrorCode.SERVICE_UNIT_MISSING,
      `Service file not found: ${serviceSource}. The repository must provide ${name}.`,
      { serviceSource },
      [`Check that ${ctx.config.repository.url} contains ${name} at its root`],
    );
  }

  ctx.terminal.step("Installing systemd service...");
  const steps = [
    { command: { argv: ["cp", serviceSource, serviceTarget] }, message: `Failed to copy ${name} to ${serviceTarget}` },
    { command: commands.daemonReload(), message: "systemctl daemon-reload failed" },
    { command: commands.serviceControl(name, "enable"), message: `Failed to enable ${name}` },
    { command: commands.serviceControl(name, "restart"), message: `Failed to restart ${name}` },
  ];
  for (const { command, message } of steps) {
    await executeOrThrow(ctx, elevated(command, host), "normal", { code: ProvisionErrorCode.COMMAND_FAILED, message });
  }

  const status = await execute(ctx, commands.serviceIsActive(name), "quick");
  const active = status.exitCode === 0;
  if (!active) {
    ctx.terminal.warn(`${name} is not active (${status.stdout.trim() || "unknown"}). Check the logs: journalctl -u ${name} -f`);
  }
  return { unitPath: serviceTarget, active };
}
