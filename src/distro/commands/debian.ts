import type { Command } from "../../types/command.js";
import type { ExecResult } from "../../execution/executor.js";
import { CommonCommands } from "./common.js";

/** Debian/Ubuntu/Raspberry Pi OS command implementations. */
export class DebianCommands extends CommonCommands {
  readonly packageManager = "apt" as const;
  private readonly env = { DEBIAN_FRONTEND: "noninteractive" };

  packageQuery(pkg: string): Command {
    return { argv: ["dpkg-query", "-W", "-f=${Status}", pkg] };
  }

  // dpkg-query also knows removed-but-configured packages ("deinstall ok config-files").
  isPackageInstalled(query: ExecResult): boolean {
    return query.exitCode === 0 && query.stdout.includes("install ok installed");
  }

  packageRefresh(): Command {
    return { argv: ["apt-get", "update"], env: this.env };
  }

  packageInstall(packages: string[]): Command {
    return { argv: ["apt-get", "install", "-y", ...packages], env: this.env };
  }
}
