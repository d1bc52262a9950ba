import { isAbsolute } from "node:path";
import { z } from "zod";

/** Hardware buses raspi-config can toggle non-interactively. */
export const HARDWARE_BUSES = ["i2c", "spi"] as const;
export type HardwareBus = (typeof HARDWARE_BUSES)[number];

const absolutePath = z.string().min(1).refine((p) => isAbsolute(p), { message: "must be an absolute path" });

/** Provisioner configuration, as read from config.yaml and merged over defaults. */
export const ProvisionerConfigSchema = z.object({
  install_root: absolutePath,
  repository: z.object({
    url: z.string().min(1),
    branch: z.string().min(1).nullable(),
  }),
  owner: z.object({
    user: z.string().regex(/^[a-z_][a-z0-9_-]*\$?$/i, "must be a valid user name").nullable(),
  }),
  privilege: z.object({
    elevate: z.boolean(),
  }),
  packages: z.array(z.string().regex(/^[a-z0-9][a-z0-9+._-]*$/i, "must be a package name")),
  hardware: z.object({
    enabled: z.boolean(),
    bus: z.enum(HARDWARE_BUSES),
    group: z.string().min(1),
    boot_config_line: z.string().min(1).refine((l) => !l.includes("\n"), { message: "must be a single line" }),
    boot_config_path: absolutePath.nullable(),
  }),
  environment: z.object({
    venv_dir: z.string().min(1),
    upgrade_pip: z.boolean(),
  }),
  service: z.object({
    name: z.string().regex(/^[\w@.-]+\.service$/, "must be a systemd unit name ending in .service"),
    unit_dir: absolutePath,
  }),
});

export type ProvisionerConfig = z.infer<typeof ProvisionerConfigSchema>;
