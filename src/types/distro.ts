/** Distribution family, resolved from /etc/os-release and the available package manager. */
export type DistroFamily = "debian" | "rhel";

/** Package manager resolved from distro family. */
export type PackageManager = "apt" | "dnf";

/**
 * Facts about the target host gathered once before the pipeline starts.
 * Every step reads identity and privilege from here instead of the environment.
 */
export interface HostContext {
  readonly family: DistroFamily;
  readonly distroName: string;
  readonly packageManager: PackageManager;
  /** User the provisioner process runs as. */
  readonly currentUser: string;
  /** User that owns the workspace and runs repository and environment commands. */
  readonly owner: string;
  readonly ownerGroup: string;
  readonly isRoot: boolean;
  /** Prefix privileged commands with sudo when not already root. */
  readonly elevate: boolean;
}
