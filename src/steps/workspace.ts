import { readdir, stat } from "node:fs/promises";
import { join, relative } from "node:path";
import type { ProvisionContext } from "../context.js";
import type { Command } from "../types/command.js";
import type { WorkspaceResult } from "../types/results.js";
import { execute, executeOrThrow } from "../execution/helpers.js";
import { asOwner, elevated } from "../execution/privilege.js";
import { ProvisionError, ProvisionErrorCode } from "../shared/errors.js";
import { pathExists, readIfExists } from "../shared/fs.js";
import { logger } from "../logger.js";

/**
 * Bring the workspace in line with the remote repository.
 *
 * - missing directory: created and handed to the owner
 * - existing checkout: fast-forward pull, local settings.txt kept
 * - empty directory: clone
 * - anything else: refused, contents left untouched
 *
 * Every git command runs as the owner, never as root.
 */
export async function syncWorkspace(ctx: ProvisionContext): Promise<WorkspaceResult> {
  const { workspace } = ctx.paths;
  const created = await ensureWorkspaceDir(ctx);

  if (!(await stat(workspace)).isDirectory()) {
    throw new ProvisionError(
      ProvisionErrorCode.WORKSPACE_NOT_EMPTY,
      `${workspace} exists but is not a directory. Aborting to prevent overwrite.`,
      { workspace },
      [`Remove or rename ${workspace}, or set install_root to another path`],
    );
  }

  if (await pathExists(join(workspace, ".git"))) {
    const settingsProtected = await pullKeepingSettings(ctx);
    return { action: "pulled", created, settingsProtected };
  }

  const entries = await readdir(workspace);
  if (entries.length > 0) {
    throw new ProvisionError(
      ProvisionErrorCode.WORKSPACE_NOT_EMPTY,
      `Directory ${workspace} exists but is not a Git repo. Aborting to prevent overwrite.`,
      { workspace, entries: entries.length },
      [`Move the contents of ${workspace} elsewhere, or set install_root to an empty directory`],
    );
  }

  const { url, branch } = ctx.config.repository;
  ctx.terminal.step(`Cloning repo to ${workspace}...`);
  const argv = ["git", "clone", ...(branch ? ["--branch", branch] : []), url, workspace];
  await executeOrThrow(ctx, asOwner({ argv }, ctx.host), "slow", {
    code: ProvisionErrorCode.SYNC_FAILED,
    message: `Failed to clone ${url}`,
  });
  return { action: "cloned", created, settingsProtected: false };
}

/** Returns true when the directory had to be created. */
export async function ensureWorkspaceDir(ctx: ProvisionContext): Promise<boolean> {
  const { workspace } = ctx.paths;
  if (await pathExists(workspace)) return false;

  const { owner, ownerGroup } = ctx.host;
  ctx.terminal.step(`Creating project directory ${workspace}...`);
  await executeOrThrow(ctx, elevated({ argv: ["mkdir", "-p", workspace] }, ctx.host), "instant", {
    code: ProvisionErrorCode.COMMAND_FAILED,
    message: `Failed to create ${workspace}`,
  });
  await executeOrThrow(ctx, elevated({ argv: ["chown", `${owner}:${ownerGroup}`, workspace] }, ctx.host), "instant", {
    code: ProvisionErrorCode.COMMAND_FAILED,
    message: `Failed to hand ${workspace} to ${owner}`,
  });
  return true;
}

/**
 * Pull with a locally edited settings.txt. git refuses to merge over a
 * modified tracked file, assume-unchanged or not, so the file is reset to
 * HEAD for the pull and the local copy written back afterwards, pull
 * failure included. Returns true when settings.txt is tracked.
 */
async function pullKeepingSettings(ctx: ProvisionContext): Promise<boolean> {
  const file = relative(ctx.paths.workspace, ctx.paths.settingsFile);
  const tracked = (await execute(ctx, git(ctx, ["ls-files", "--error-unmatch", file]), "quick")).exitCode === 0;
  const snapshot = await readIfExists(ctx.paths.settingsFile);

  if (tracked) {
    await gitOrThrow(ctx, ["update-index", "--no-assume-unchanged", file], `Failed to release ${file} for the update`);
    await gitOrThrow(ctx, ["checkout", "--", file], `Failed to reset ${file} for the update`);
  }

  ctx.terminal.step("Updating existing Git repo...");
  try {
    await executeOrThrow(ctx, git(ctx, ["pull", "--ff-only"]), "slow", {
      code: ProvisionErrorCode.SYNC_FAILED,
      message: `Failed to pull latest changes into ${ctx.paths.workspace}`,
    });
  } finally {
    await restoreSettings(ctx, snapshot);
    if (tracked) {
      await gitOrThrow(ctx, ["update-index", "--assume-unchanged", file], `Failed to protect ${file} from being overwritten`);
    }
  }
  return tracked;
}

async function restoreSettings(ctx: ProvisionContext, snapshot: string | null): Promise<void> {
  if (snapshot === null) return;
  const current = await readIfExists(ctx.paths.settingsFile);
  if (current === snapshot) return;

  logger.info({ settingsFile: ctx.paths.settingsFile }, "Writing local settings file back after pull");
  await executeOrThrow(ctx, asOwner({ argv: ["tee", ctx.paths.settingsFile], stdin: snapshot }, ctx.host), "instant", {
    code: ProvisionErrorCode.SYNC_FAILED,
    message: `Failed to restore ${ctx.paths.settingsFile} after pull`,
  });
  ctx.terminal.info("Kept local settings.txt over the repository version.");
}

async function gitOrThrow(ctx: ProvisionContext, args: string[], message: string): Promise<void> {
  await executeOrThrow(ctx, git(ctx, args), "quick", { code: ProvisionErrorCode.SYNC_FAILED, message });
}

function git(ctx: ProvisionContext, args: string[]): Command {
  return asOwner({ argv: ["git", "-C", ctx.paths.workspace, ...args] }, ctx.host);
}
