// Command execution layer. Every external command the provisioner runs passes through here.
// Steps depend on the Executor interface only; tests substitute an in-process fake.
import execa from "execa";
import type { Command } from "../types/command.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

/** Local executor backed by execa. Never rejects on a non-zero exit; callers inspect exitCode. */
export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;

    const result = await execa(cmd, args, {
      timeout: timeoutMs,
      reject: false,
      env: command.env,
      input: command.stdin,
    });

    const durationMs = Math.round(performance.now() - start);
    // Spawn failures (ENOENT) and timeouts leave exitCode unset.
    const spawned = typeof result.exitCode === "number";
    const exitCode = spawned ? result.exitCode : result.failed ? 127 : 0;
    logger.debug({ argv: command.argv, exitCode, durationMs, timedOut: result.timedOut }, "Command finished");

    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr || (spawned ? "" : `${result.timedOut ? "Timed out" : "Failed to start"}: ${command.argv.join(" ")}`),
      exitCode,
      durationMs,
    };
  }
}

/**
 * Execute a raw bash command string. Used for shell builtins such as
 * `command -v`, where there is no binary to execFile.
 */
export async function execBash(executor: Executor, cmd: string, timeoutMs: number): Promise<ExecResult> {
  return executor.execute({ argv: ["bash", "-c", cmd] }, timeoutMs);
}
