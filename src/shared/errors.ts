export enum ProvisionErrorCode {
  NO_PACKAGE_MANAGER = "NO_PACKAGE_MANAGER",
  CONFIG_INVALID = "CONFIG_INVALID",
  WORKSPACE_NOT_EMPTY = "WORKSPACE_NOT_EMPTY",
  SERVICE_UNIT_MISSING = "SERVICE_UNIT_MISSING",
  OWNER_SWITCH_DENIED = "OWNER_SWITCH_DENIED",
  PACKAGE_INSTALL_FAILED = "PACKAGE_INSTALL_FAILED",
  SYNC_FAILED = "SYNC_FAILED",
  ENVIRONMENT_BUILD_FAILED = "ENVIRONMENT_BUILD_FAILED",
  COMMAND_FAILED = "COMMAND_FAILED",
}

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;
  readonly context?: Record<string, unknown>;
  readonly remediation: string[];

  constructor(code: ProvisionErrorCode, message: string, context?: Record<string, unknown>, remediation: string[] = []) {
    super(message);
    this.name = "ProvisionError";
    this.code = code;
    this.context = context;
    this.remediation = remediation;
  }
}
