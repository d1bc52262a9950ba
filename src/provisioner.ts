import type { ProvisionContext } from "./context.js";
import type { ProvisionOutcome, ProvisionStage } from "./types/results.js";
import { checkDependencies } from "./steps/dependencies.js";
import { configureHardware } from "./steps/hardware.js";
import { syncWorkspace } from "./steps/workspace.js";
import { buildEnvironment } from "./steps/environment.js";
import { installService } from "./steps/service.js";
import { buildSummary, report } from "./steps/reporter.js";
import { logger } from "./logger.js";

/**
 * Runs the provisioning pipeline top to bottom. Each step's postcondition is
 * the next one's precondition, so the first failure stops the run; nothing
 * already applied is rolled back, every step being safe to repeat.
 */
export class Provisioner {
  private current: ProvisionStage = "start";

  constructor(private readonly ctx: ProvisionContext) {}

  get stage(): ProvisionStage {
    return this.current;
  }

  async run(): Promise<ProvisionOutcome> {
    const { ctx } = this;
    logger.info({ host: ctx.host, workspace: ctx.paths.workspace }, "Provisioning started");
    try {
      const dependencies = await checkDependencies(ctx);
      this.advance("dependencies_verified");

      const hardware = await configureHardware(ctx);
      this.advance("hardware_configured");

      const workspace = await syncWorkspace(ctx);
      this.advance("workspace_synchronized");

      const environment = await buildEnvironment(ctx);
      this.advance("environment_ready");

      const service = await installService(ctx);
      this.advance("service_installed");

      this.advance("reporting");
      const summary = buildSummary(ctx, hardware);
      report(ctx.terminal, summary);
      this.advance("done");

      return { stage: this.current, dependencies, hardware, workspace, environment, service, summary };
    } catch (err) {
      logger.error({ stage: this.current }, "Provisioning aborted");
      this.current = "aborted";
      throw err;
    }
  }

  private advance(stage: ProvisionStage): void {
    logger.info({ from: this.current, to: stage }, "Stage reached");
    this.current = stage;
  }
}
