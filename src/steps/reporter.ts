import type { ProvisionContext } from "../context.js";
import type { HardwareChange, HardwareResult, ProvisionSummary } from "../types/results.js";
import type { Terminal } from "../terminal.js";
import { ProvisionError } from "../shared/errors.js";
import { logger } from "../logger.js";

const CHANGE_LABELS: Record<HardwareChange, string> = {
  bus_enabled: "hardware bus enabled",
  boot_config_line_added: "boot configuration updated",
  group_membership_added: "user added to bus group",
};

export function buildSummary(ctx: ProvisionContext, hardware: HardwareResult): ProvisionSummary {
  return {
    workspace: ctx.paths.workspace,
    settingsFile: ctx.paths.settingsFile,
    serviceFile: ctx.paths.serviceTarget,
    logCommand: `journalctl -u ${ctx.config.service.name} -f`,
    rebootRequired: hardware.rebootRequired,
    hardwareChanges: hardware.changes,
  };
}

/** The four-line block printed at the end of every successful run. */
export function formatSummary(summary: ProvisionSummary): string[] {
  return [
    `📂 Project directory: ${summary.workspace}`,
    `📄 settings.txt: ${summary.settingsFile}`,
    `🛠 Service file: ${summary.serviceFile}`,
    `📜 Logs: ${summary.logCommand}`,
  ];
}

// The summary block is always the last thing printed, reboot warning or not.
export function report(terminal: Terminal, summary: ProvisionSummary): void {
  terminal.success("Installation complete!");
  if (summary.rebootRequired) {
    const changes = summary.hardwareChanges.map((c) => CHANGE_LABELS[c]).join(", ");
    terminal.warn(`REBOOT REQUIRED: ${changes}. Run 'sudo reboot' before relying on the service.`);
  }
  for (const line of formatSummary(summary)) terminal.line(line);
}

/** Print a fatal error the way an operator needs to see it; structured details go to the log. */
export function reportFailure(terminal: Terminal, err: unknown): void {
  if (err instanceof ProvisionError) {
    logger.error({ code: err.code, context: err.context }, err.message);
    terminal.error(err.message);
    const stderr = err.context?.stderr;
    if (typeof stderr === "string" && stderr) {
      for (const line of stderr.split("\n").slice(-5)) terminal.line(`   ${line}`);
    }
    for (const hint of err.remediation) terminal.line(`   → ${hint}`);
    return;
  }
  logger.error({ error: err }, "Unexpected failure");
  terminal.error(err instanceof Error ? err.message : String(err));
}
