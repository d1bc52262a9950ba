import type { Command } from "../../types/command.js";
import type { PackageManager } from "../../types/distro.js";
import type { ExecResult } from "../../execution/executor.js";

export type ServiceAction = "start" | "stop" | "restart" | "enable" | "disable";

/**
 * Distro-specific command dispatch interface.
 * Steps call these methods to express intent; implementations translate
 * to distro-specific commands. None of them add sudo; see execution/privilege.ts.
 */
export interface DistroCommands {
  readonly packageManager: PackageManager;

  // Package management
  packageQuery(pkg: string): Command;
  isPackageInstalled(query: ExecResult): boolean;
  packageRefresh(): Command;
  packageInstall(packages: string[]): Command;

  // User/group database
  userGroups(username: string): Command;
  userPrimaryGroup(username: string): Command;
  userAddToGroup(username: string, group: string): Command;

  // Service management (systemd on both families)
  daemonReload(): Command;
  serviceControl(unit: string, action: ServiceAction): Command;
  serviceIsActive(unit: string): Command;
}
