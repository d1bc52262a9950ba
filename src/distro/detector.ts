import { readFile } from "node:fs/promises";
import type { DistroFamily, HostContext, PackageManager } from "../types/distro.js";
import type { ProvisionerConfig } from "../types/config.js";
import { DURATION_TIMEOUTS } from "../types/risk.js";
import { execBash, type Executor } from "../execution/executor.js";
import { ProvisionError, ProvisionErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";
import { createDistroCommands } from "./commands/factory.js";

const PACKAGE_MANAGER_BINARY: Record<PackageManager, string> = { apt: "apt-get", dnf: "dnf" };
const FAMILY_BY_MANAGER: Record<PackageManager, DistroFamily> = { apt: "debian", dnf: "rhel" };

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Resolve distro family from os-release fields; null when neither family matches. */
export function resolveFamily(osRelease: Record<string, string>): DistroFamily | null {
  const idLike = (osRelease.ID_LIKE ?? "").toLowerCase();
  const id = (osRelease.ID ?? "").toLowerCase();
  if (["debian", "ubuntu", "raspbian"].includes(id) || idLike.includes("debian") || idLike.includes("ubuntu")) return "debian";
  if (["fedora", "rhel", "centos", "rocky", "almalinux"].includes(id) || idLike.includes("rhel") || idLike.includes("fedora")) return "rhel";
  return null;
}

async function commandExists(executor: Executor, cmd: string): Promise<boolean> {
  const result = await execBash(executor, `command -v ${cmd}`, DURATION_TIMEOUTS.instant);
  return result.exitCode === 0;
}

/**
 * Pick the package manager: the one matching the os-release family when present,
 * otherwise whichever is installed. Neither installed is an environment error.
 */
async function resolvePackageManager(executor: Executor, family: DistroFamily | null): Promise<PackageManager> {
  const order: PackageManager[] = family === "rhel" ? ["dnf", "apt"] : ["apt", "dnf"];
  for (const manager of order) {
    if (await commandExists(executor, PACKAGE_MANAGER_BINARY[manager])) return manager;
  }
  throw new ProvisionError(
    ProvisionErrorCode.NO_PACKAGE_MANAGER,
    "No supported package manager found (apt-get or dnf). Install the required packages manually.",
    { family },
    ["Install the packages listed in config.yaml by hand", "Then set packages: [] and re-run"],
  );
}

export interface DetectHostOptions {
  readonly config: ProvisionerConfig;
  readonly env?: NodeJS.ProcessEnv;
  readonly osReleasePath?: string;
  /** Identity of the provisioner process; defaults to os.userInfo(). */
  readonly identity: { username: string; uid: number };
}

/** Resolve owner: explicit config, then the user behind sudo, then ourselves. */
export function resolveOwner(config: ProvisionerConfig, env: NodeJS.ProcessEnv, currentUser: string): string {
  if (config.owner.user) return config.owner.user;
  const sudoUser = env.SUDO_USER;
  if (sudoUser && sudoUser !== "root") return sudoUser;
  return currentUser;
}

/** Detect the host facts the pipeline needs. */
export async function detectHost(executor: Executor, options: DetectHostOptions): Promise<HostContext> {
  const env = options.env ?? process.env;
  logger.info("Starting host detection");

  let osRelease: Record<string, string> = {};
  try {
    osRelease = parseOsRelease(await readFile(options.osReleasePath ?? "/etc/os-release", "utf-8"));
  } catch (err) {
    logger.warn({ error: err }, "Could not read os-release, using probe-based detection");
  }

  const packageManager = await resolvePackageManager(executor, resolveFamily(osRelease));
  const family = FAMILY_BY_MANAGER[packageManager];
  const currentUser = options.identity.username;
  const owner = resolveOwner(options.config, env, currentUser);

  const groupResult = await executor.execute(createDistroCommands(family).userPrimaryGroup(owner), DURATION_TIMEOUTS.instant);
  const ownerGroup = groupResult.exitCode === 0 && groupResult.stdout.trim() ? groupResult.stdout.trim() : owner;

  const host: HostContext = {
    family,
    distroName: osRelease.PRETTY_NAME ?? osRelease.NAME ?? osRelease.ID ?? "Unknown",
    packageManager,
    currentUser,
    owner,
    ownerGroup,
    isRoot: options.identity.uid === 0,
    elevate: options.config.privilege.elevate,
  };

  logger.info({ host }, "Host detection complete");
  return host;
}
