import { join } from "node:path";
import type { ProvisionContext } from "../context.js";
import type { EnvironmentResult } from "../types/results.js";
import { executeOrThrow } from "../execution/helpers.js";
import { asOwner } from "../execution/privilege.js";
import { ProvisionErrorCode } from "../shared/errors.js";
import { pathExists } from "../shared/fs.js";

/** Create the application's virtualenv if missing and install requirements.txt into it. */
export async function buildEnvironment(ctx: ProvisionContext): Promise<EnvironmentResult> {
  const { venvDir, requirementsFile } = ctx.paths;
  const python = join(venvDir, "bin", "python");
  const failure = { code: ProvisionErrorCode.ENVIRONMENT_BUILD_FAILED };

  let created = false;
  if (!(await pathExists(python))) {
    ctx.terminal.step(`Creating Python virtual environment in ${venvDir}...`);
    await executeOrThrow(ctx, asOwner({ argv: ["python3", "-m", "venv", venvDir] }, ctx.host), "normal", {
      ...failure,
      message: `Failed to create virtual environment at ${venvDir}`,
    });
    created = true;
  }

  if (!(await pathExists(requirementsFile))) {
    ctx.terminal.info("No requirements.txt found, skipping pip install.");
    return { created, dependenciesInstalled: false };
  }

  if (ctx.config.environment.upgrade_pip) {
    await executeOrThrow(ctx, asOwner({ argv: [python, "-m", "pip", "install", "--upgrade", "pip"] }, ctx.host), "slow", {
      ...failure,
      message: "Failed to upgrade pip in the virtual environment",
    });
  }

  ctx.terminal.step("Installing Python dependencies from requirements.txt...");
  await executeOrThrow(ctx, asOwner({ argv: [python, "-m", "pip", "install", "-r", requirementsFile] }, ctx.host), "slow", {
    ...failure,
    message: `Failed to install Python dependencies from ${requirementsFile}`,
  });
  return { created, dependenciesInstalled: true };
}
