import type { ProvisionContext } from "../context.js";
import type { DependencyResult } from "../types/results.js";
import { execute, executeOrThrow } from "../execution/helpers.js";
import { elevated } from "../execution/privilege.js";
import { ProvisionErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/**
 * Ensure every configured OS package is installed.
 * The package index is refreshed at most once, just before the first install.
 */
export async function checkDependencies(ctx: ProvisionContext): Promise<DependencyResult> {
  const { commands, host, terminal } = ctx;
  const alreadyInstalled: string[] = [];
  const installed: string[] = [];
  let indexRefreshed = false;

  for (const pkg of ctx.config.packages) {
    const query = await execute(ctx, commands.packageQuery(pkg), "quick");
    if (commands.isPackageInstalled(query)) {
      alreadyInstalled.push(pkg);
      continue;
    }

    if (!indexRefreshed) {
      terminal.step("Refreshing package index...");
      const refresh = await execute(ctx, elevated(commands.packageRefresh(), host), "slow");
      // A stale third-party source fails the refresh but rarely the install; let the install decide.
      if (refresh.exitCode !== 0) {
        logger.warn({ exitCode: refresh.exitCode, stderr: refresh.stderr }, "Package index refresh failed");
        terminal.warn("Package index refresh failed; trying the install anyway.");
      }
      indexRefreshed = true;
    }

    terminal.step(`Installing ${pkg}...`);
    await executeOrThrow(ctx, elevated(commands.packageInstall([pkg]), host), "slow", {
      code: ProvisionErrorCode.PACKAGE_INSTALL_FAILED,
      message: `Failed to install required package: ${pkg}`,
    });
    installed.push(pkg);
  }

  if (installed.length === 0) {
    terminal.success("All required packages are already installed.");
  } else {
    terminal.success(`Installed ${installed.length} package(s): ${installed.join(", ")}`);
  }
  return { alreadyInstalled, installed };
}
