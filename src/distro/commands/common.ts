import type { Command } from "../../types/command.js";
import type { PackageManager } from "../../types/distro.js";
import type { ExecResult } from "../../execution/executor.js";
import type { DistroCommands, ServiceAction } from "./interface.js";

/** User and systemd commands are identical across families; package commands are not. */
export abstract class CommonCommands implements DistroCommands {
  abstract readonly packageManager: PackageManager;
  abstract packageQuery(pkg: string): Command;
  abstract isPackageInstalled(query: ExecResult): boolean;
  abstract packageRefresh(): Command;
  abstract packageInstall(packages: string[]): Command;

  userGroups(username: string): Command {
    return { argv: ["id", "-nG", username] };
  }

  userPrimaryGroup(username: string): Command {
    return { argv: ["id", "-gn", username] };
  }

  userAddToGroup(username: string, group: string): Command {
    return { argv: ["usermod", "-aG", group, username] };
  }

  daemonReload(): Command {
    return { argv: ["systemctl", "daemon-reload"] };
  }

  serviceControl(unit: string, action: ServiceAction): Command {
    return { argv: ["systemctl", action, unit] };
  }

  serviceIsActive(unit: string): Command {
    return { argv: ["systemctl", "is-active", unit] };
  }
}
