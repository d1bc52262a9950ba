import type { ProvisionContext } from "../context.js";
import type { HardwareBus } from "../types/config.js";
import type { HardwareChange, HardwareResult } from "../types/results.js";
import { execute, executeOrThrow } from "../execution/helpers.js";
import { execBash } from "../execution/executor.js";
import { elevated } from "../execution/privilege.js";
import { DURATION_TIMEOUTS } from "../types/risk.js";
import { ProvisionErrorCode } from "../shared/errors.js";
import { readIfExists } from "../shared/fs.js";

/** raspi-config nonint function names; get_* prints 0 when the bus is enabled. */
const RASPI_CONFIG_FUNCTIONS: Record<HardwareBus, { get: string; set: string }> = {
  i2c: { get: "get_i2c", set: "do_i2c" },
  spi: { get: "get_spi", set: "do_spi" },
};

/**
 * Enable the hardware bus, ensure the boot config tuning line and the owner's
 * bus group membership. Each mutation is recorded; any recorded change means
 * the host needs a reboot before the bus is usable.
 */
export async function configureHardware(ctx: ProvisionContext): Promise<HardwareResult> {
  const changes: HardwareChange[] = [];
  if (!ctx.config.hardware.enabled) {
    ctx.terminal.info("Hardware configuration disabled, skipping.");
    return { rebootRequired: false, changes };
  }

  if (await ensureBusEnabled(ctx)) changes.push("bus_enabled");
  if (await ensureBootConfigLine(ctx)) changes.push("boot_config_line_added");
  if (await ensureGroupMembership(ctx)) changes.push("group_membership_added");

  if (changes.length === 0) ctx.terminal.success("Hardware already configured.");
  return { rebootRequired: changes.length > 0, changes };
}

/** Returns true when the bus had to be enabled. */
export async function ensureBusEnabled(ctx: ProvisionContext): Promise<boolean> {
  const { bus } = ctx.config.hardware;
  const fn = RASPI_CONFIG_FUNCTIONS[bus];

  const available = await execBash(ctx.executor, "command -v raspi-config", DURATION_TIMEOUTS.instant);
  if (available.exitCode !== 0) {
    ctx.terminal.warn(`raspi-config not found; enable ${bus.toUpperCase()} manually if this is a Raspberry Pi.`);
    return false;
  }

  const state = await execute(ctx, elevated({ argv: ["raspi-config", "nonint", fn.get] }, ctx.host), "quick");
  if (state.exitCode === 0 && state.stdout.trim() === "0") return false;

  ctx.terminal.step(`Enabling ${bus.toUpperCase()}...`);
  await executeOrThrow(ctx, elevated({ argv: ["raspi-config", "nonint", fn.set, "0"] }, ctx.host), "normal", {
    code: ProvisionErrorCode.COMMAND_FAILED,
    message: `Failed to enable ${bus.toUpperCase()} with raspi-config`,
  });
  return true;
}

/** Returns true when the tuning line had to be appended. */
export async function ensureBootConfigLine(ctx: ProvisionContext): Promise<boolean> {
  const path = ctx.paths.bootConfig;
  const line = ctx.config.hardware.boot_config_line;

  const content = (await readIfExists(path)) ?? "";
  if (content.includes(line)) return false;

  ctx.terminal.step(`Adding '${line}' to ${path}...`);
  const separator = content.length > 0 && !content.endsWith("\n") ? "\n" : "";
  await executeOrThrow(ctx, elevated({ argv: ["tee", "-a", path], stdin: `${separator}${line}\n` }, ctx.host), "quick", {
    code: ProvisionErrorCode.COMMAND_FAILED,
    message: `Failed to update boot configuration: ${path}`,
  });
  return true;
}

/** Returns true when the owner had to be added to the bus group. */
export async function ensureGroupMembership(ctx: ProvisionContext): Promise<boolean> {
  const { owner } = ctx.host;
  const { group } = ctx.config.hardware;

  const groups = await executeOrThrow(ctx, ctx.commands.userGroups(owner), "instant", {
    code: ProvisionErrorCode.COMMAND_FAILED,
    message: `Failed to read groups for user ${owner}`,
  });
  if (groups.stdout.trim().split(/\s+/).includes(group)) return false;

  ctx.terminal.step(`Adding ${owner} to the ${group} group...`);
  await executeOrThrow(ctx, elevated(ctx.commands.userAddToGroup(owner, group), ctx.host), "quick", {
    code: ProvisionErrorCode.COMMAND_FAILED,
    message: `Failed to add ${owner} to group ${group}`,
  });
  return true;
}
