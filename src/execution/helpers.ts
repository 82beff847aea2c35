import type { RunContext } from "../context.js";
import type { Command, InstallStep } from "../types/command.js";
import type { ExecResult, Executor } from "./executor.js";
import { categorizeFailure } from "../shared/categorize.js";
import { InstallFailure } from "../shared/errors.js";

type Scope = Pick<RunContext, "executor" | "logger" | "reporter" | "config" | "profile">;

export interface RunOptions {
  /** Echo output live to the console (and the log) while the command runs. */
  stream?: boolean;
  timeoutMs?: number;
}

/** Timeout for probes that only read state. */
export const PROBE_TIMEOUT_MS = 15_000;

/** Execute a Command through the context's executor, logging argv and outcome. */
export async function run(ctx: Scope, command: Command, options: RunOptions = {}): Promise<ExecResult> {
  const timeoutMs = options.timeoutMs ?? ctx.config.commands.timeout_seconds * 1000;
  ctx.logger.debug({ argv: command.argv, cwd: command.cwd }, "Executing command");
  const result = await ctx.executor.execute(command, {
    timeoutMs,
    onOutput: options.stream ? (chunk, stream) => ctx.reporter.output(chunk, stream) : undefined,
  });
  ctx.logger.info({ argv: command.argv, exitCode: result.exitCode, durationMs: result.durationMs }, "Command finished");
  if (result.exitCode !== 0 && result.stderr.trim()) {
    ctx.logger.debug({ argv: command.argv, stderr: result.stderr.trim() }, "Command stderr");
  }
  return result;
}

/** Run and raise an InstallFailure for the component when the exit status is non-zero. */
export async function runOrThrow(ctx: Scope, component: string, command: Command, options: RunOptions = { stream: true }): Promise<ExecResult> {
  const result = await run(ctx, command, options);
  if (result.exitCode !== 0) {
    const category = categorizeFailure(result.stderr, ctx.profile);
    throw new InstallFailure(component, `Command exited with ${result.exitCode}: ${command.argv.join(" ")}`, {
      remediation: category.remediation,
      context: { code: category.code, exitCode: result.exitCode, stderr: result.stderr.trim() },
    });
  }
  return result;
}

/**
 * Run a step sequence. Optional steps that fail become warnings; any other failure
 * stops the sequence with an InstallFailure.
 */
export async function runSteps(ctx: Scope, component: string, steps: readonly InstallStep[]): Promise<void> {
  for (const step of steps) {
    ctx.reporter.info(step.description);
    if (step.optional) {
      const result = await run(ctx, step.command, { stream: true });
      if (result.exitCode !== 0) ctx.reporter.warn(`${step.description} failed (exit ${result.exitCode}) — continuing`);
      continue;
    }
    await runOrThrow(ctx, component, step.command);
  }
}

/** Whether a program is on PATH. */
export async function commandExists(executor: Executor, name: string): Promise<boolean> {
  const result = await executor.execute({ argv: ["bash", "-c", 'command -v "$1"', "_", name] }, { timeoutMs: PROBE_TIMEOUT_MS });
  return result.exitCode === 0;
}

/** First non-empty stdout line of a successful command, or null. */
export async function captureLine(executor: Executor, argv: string[]): Promise<string | null> {
  const result = await executor.execute({ argv }, { timeoutMs: PROBE_TIMEOUT_MS });
  if (result.exitCode !== 0) return null;
  const line = result.stdout.split("\n").map((l) => l.trim()).find((l) => l.length > 0);
  return line ?? null;
}

/** Whether a probe command exits 0. */
export async function succeeds(executor: Executor, command: Command): Promise<boolean> {
  const result = await executor.execute(command, { timeoutMs: PROBE_TIMEOUT_MS });
  return result.exitCode === 0;
}
