import { userInfo } from "node:os";
import type { ProvisionerConfig } from "./types/config.js";
import type { HostContext } from "./types/distro.js";
import type { DistroCommands } from "./distro/commands/interface.js";
import type { Executor } from "./execution/executor.js";
import type { Terminal } from "./terminal.js";
import { detectHost } from "./distro/detector.js";
import { createDistroCommands } from "./distro/commands/factory.js";
import { resolvePaths, type ProvisionPaths } from "./paths.js";

/**
 * Shared provisioning context: config, host facts and the command layer.
 * Created once at startup, passed to every step.
 */
export interface ProvisionContext {
  readonly config: ProvisionerConfig;
  readonly host: HostContext;
  readonly commands: DistroCommands;
  readonly executor: Executor;
  readonly terminal: Terminal;
  readonly paths: ProvisionPaths;
}

export interface CreateContextOptions {
  readonly config: ProvisionerConfig;
  readonly executor: Executor;
  readonly terminal: Terminal;
  readonly env?: NodeJS.ProcessEnv;
  readonly osReleasePath?: string;
  readonly identity?: { username: string; uid: number };
}

export async function createContext(options: CreateContextOptions): Promise<ProvisionContext> {
  const identity = options.identity ?? { username: userInfo().username, uid: process.getuid?.() ?? -1 };
  const host = await detectHost(options.executor, {
    config: options.config,
    env: options.env,
    osReleasePath: options.osReleasePath,
    identity,
  });
  return {
    config: options.config,
    host,
    commands: createDistroCommands(host.family),
    executor: options.executor,
    terminal: options.terminal,
    paths: resolvePaths(options.config),
  };
}
