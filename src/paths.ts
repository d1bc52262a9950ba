import { existsSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import type { ProvisionerConfig } from "./types/config.js";

/** Every filesystem location the pipeline touches, resolved once from config. */
export interface ProvisionPaths {
  readonly workspace: string;
  readonly settingsFile: string;
  readonly requirementsFile: string;
  readonly serviceSource: string;
  readonly serviceTarget: string;
  readonly venvDir: string;
  readonly bootConfig: string;
}

// Bookworm moved the firmware partition; older images still mount it at /boot.
const BOOT_CONFIG_CANDIDATES = ["/boot/firmware/config.txt", "/boot/config.txt"];

export function resolvePaths(config: ProvisionerConfig, exists: (path: string) => boolean = existsSync): ProvisionPaths {
  const workspace = config.install_root;
  const venv = config.environment.venv_dir;
  return {
    workspace,
    settingsFile: join(workspace, "settings.txt"),
    requirementsFile: join(workspace, "requirements.txt"),
    serviceSource: join(workspace, config.service.name),
    serviceTarget: join(config.service.unit_dir, config.service.name),
    venvDir: isAbsolute(venv) ? venv : join(workspace, venv),
    bootConfig: config.hardware.boot_config_path
      ?? BOOT_CONFIG_CANDIDATES.find((p) => exists(p))
      ?? BOOT_CONFIG_CANDIDATES[BOOT_CONFIG_CANDIDATES.length - 1],
  };
}
