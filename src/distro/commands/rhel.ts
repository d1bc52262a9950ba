import type { Command } from "../../types/command.js";
import type { ExecResult } from "../../execution/executor.js";
import { CommonCommands } from "./common.js";

/** RHEL/Fedora command implementations. */
export class RHELCommands extends CommonCommands {
  readonly packageManager = "dnf" as const;

  packageQuery(pkg: string): Command {
    return { argv: ["rpm", "-q", pkg] };
  }

  isPackageInstalled(query: ExecResult): boolean {
    return query.exitCode === 0;
  }

  packageRefresh(): Command {
    return { argv: ["dnf", "makecache"] };
  }

  packageInstall(packages: string[]): Command {
    return { argv: ["dnf", "install", "-y", ...packages] };
  }
}
