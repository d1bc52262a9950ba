/** Pipeline stages in the order the provisioner reaches them. */
export type ProvisionStage =
  | "start"
  | "dependencies_verified"
  | "hardware_configured"
  | "workspace_synchronized"
  | "environment_ready"
  | "service_installed"
  | "reporting"
  | "done"
  | "aborted";

export interface DependencyResult {
  readonly alreadyInstalled: string[];
  readonly installed: string[];
}

/** A persistent hardware change; any of them means the host must reboot. */
export type HardwareChange = "bus_enabled" | "boot_config_line_added" | "group_membership_added";

export interface HardwareResult {
  readonly rebootRequired: boolean;
  readonly changes: HardwareChange[];
}

export interface WorkspaceResult {
  readonly action: "cloned" | "pulled";
  readonly created: boolean;
  /** True when settings.txt is tracked and was re-marked assume-unchanged after the pull. */
  readonly settingsProtected: boolean;
}

export interface EnvironmentResult {
  readonly created: boolean;
  readonly dependenciesInstalled: boolean;
}

export interface ServiceResult {
  readonly unitPath: string;
  readonly active: boolean;
}

export interface ProvisionSummary {
  readonly workspace: string;
  readonly settingsFile: string;
  readonly serviceFile: string;
  readonly logCommand: string;
  readonly rebootRequired: boolean;
  readonly hardwareChanges: HardwareChange[];
}

export interface ProvisionOutcome {
  readonly stage: ProvisionStage;
  readonly dependencies: DependencyResult;
  readonly hardware: HardwareResult;
  readonly workspace: WorkspaceResult;
  readonly environment: EnvironmentResult;
  readonly service: ServiceResult;
  readonly summary: ProvisionSummary;
}
