#!/usr/bin/env node

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { createContext } from "./context.js";
import { LocalExecutor } from "./execution/executor.js";
import { Provisioner } from "./provisioner.js";
import { reportFailure } from "./steps/reporter.js";
import { Terminal } from "./terminal.js";

async function main(): Promise<number> {
  const terminal = new Terminal();
  terminal.step("Installing Silent Sound Doorbell...");

  try {
    // ── Phase 1: Load config ──────────────────────────────────────
    const { config, configPath, fromFile } = loadConfig(process.env.DOORBELL_PROVISIONER_CONFIG);
    logger.info({ configPath, fromFile }, "Configuration resolved");

    // ── Phase 2: Detect host, build context ───────────────────────
    const ctx = await createContext({ config, executor: new LocalExecutor(), terminal });

    // ── Phase 3: Run the pipeline ─────────────────────────────────
    await new Provisioner(ctx).run();
    return 0;
  } catch (err) {
    reportFailure(terminal, err);
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ error: err }, "Fatal error");
    process.exitCode = 1;
  },
);
