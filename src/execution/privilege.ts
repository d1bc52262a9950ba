import type { Command } from "../types/command.js";
import type { HostContext } from "../types/distro.js";
import { ProvisionError, ProvisionErrorCode } from "../shared/errors.js";

type Identity = Pick<HostContext, "isRoot" | "elevate" | "currentUser" | "owner">;

// sudo resets the environment, so variables ride along through env(1).
function viaSudo(sudoArgs: string[], command: Command): Command {
  const envArgs = command.env ? ["env", ...Object.entries(command.env).map(([k, v]) => `${k}=${v}`)] : [];
  return { argv: ["sudo", ...sudoArgs, ...envArgs, ...command.argv], stdin: command.stdin };
}

/** Wrap a command that needs root (package manager, /etc, /boot, usermod, systemctl). */
export function elevated(command: Command, host: Identity): Command {
  if (host.isRoot || !host.elevate) return command;
  return viaSudo([], command);
}

/**
 * Wrap a command that must run as the workspace owner so that files it
 * creates (checkout, virtualenv) end up owned by that user. Switching user
 * needs sudo, so a non-root run with elevation disabled cannot do it.
 */
export function asOwner(command: Command, host: Identity): Command {
  if (host.currentUser === host.owner) return command;
  if (!host.isRoot && !host.elevate) {
    throw new ProvisionError(
      ProvisionErrorCode.OWNER_SWITCH_DENIED,
      `Cannot run ${command.argv[0]} as ${host.owner}: privilege.elevate is false and ${host.currentUser} is not ${host.owner}`,
      { currentUser: host.currentUser, owner: host.owner },
      [`Run the provisioner as ${host.owner}`, "Or set privilege.elevate: true in config.yaml"],
    );
  }
  return viaSudo(["-u", host.owner, "-H"], command);
}

/** Render a command for log lines and error context. */
export function describeCommand(command: Command): string {
  return command.argv.map((a) => (/^[\w@%+=:,./-]+$/.test(a) ? a : `'${a.replace(/'/g, "'\\''")}'`)).join(" ");
}
