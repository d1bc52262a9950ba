// Config loader: reads /etc/doorbell-provisioner/config.yaml and deep-merges it over defaults.
// deepMerge lets operators override only the keys they specify; unset keys inherit defaults.
// The merged result is validated by ProvisionerConfigSchema (src/types/config.ts); add new
// fields there and in DEFAULT_CONFIG.
import { readFileSync, existsSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { ProvisionerConfigSchema, type ProvisionerConfig } from "../types/config.js";
import { ProvisionError, ProvisionErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG_PATH = "/etc/doorbell-provisioner/config.yaml";

/** Full default configuration. */
export const DEFAULT_CONFIG: ProvisionerConfig = {
  install_root: "/var/silentdoorbell",
  repository: {
    url: "https://github.com/larsjarred9/silent-sound-doorbell-script.git",
    branch: null,
  },
  owner: { user: null },
  privilege: { elevate: true },
  packages: ["git", "python3", "python3-venv", "python3-pip", "python3-dev", "i2c-tools", "build-essential"],
  hardware: {
    enabled: true,
    bus: "i2c",
    group: "i2c",
    boot_config_line: "dtparam=i2c_arm_baudrate=10000",
    boot_config_path: null,
  },
  environment: { venv_dir: ".venv", upgrade_pip: true },
  service: { name: "device.service", unit_dir: "/etc/systemd/system" },
};

export interface ConfigResult {
  config: ProvisionerConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    // An explicitly named file that is missing is an operator mistake, not a first run.
    if (explicitPath) {
      throw new ProvisionError(ProvisionErrorCode.CONFIG_INVALID, `Config file not found: ${configPath}`, { configPath });
    }
    logger.info({ configPath }, "No config file found, using defaults");
    return { config: ProvisionerConfigSchema.parse(DEFAULT_CONFIG), configPath, fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ProvisionError(ProvisionErrorCode.CONFIG_INVALID, `Failed to parse config file: ${configPath}`, {
      configPath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  // An empty file parses to null and means "all defaults".
  const overrides = parsed ?? {};
  if (!isRecord(overrides)) {
    throw new ProvisionError(ProvisionErrorCode.CONFIG_INVALID, `Config file must contain a YAML mapping: ${configPath}`, { configPath });
  }

  const merged = deepMerge(DEFAULT_CONFIG, overrides);
  const result = ProvisionerConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ProvisionError(
      ProvisionErrorCode.CONFIG_INVALID,
      `Invalid config in ${configPath}: ${issues.join("; ")}`,
      { configPath, issues },
      ["Fix the listed keys in the config file, or delete it to use defaults"],
    );
  }
  logger.info({ configPath }, "Configuration loaded");
  return { config: result.data, configPath, fromFile: true };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
