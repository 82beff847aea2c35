// Command execution layer — every external program passes through this module.
// Provides the Executor interface; LocalExecutor is the production implementation and
// tests substitute an in-process fake. Commands never go through a shell unless argv[0]
// is "bash", which keeps argument values out of shell parsing.
import { spawn } from "node:child_process";
import type { Command } from "../types/command.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface ExecOptions {
  timeoutMs: number;
  /** Receives output chunks as they arrive; captured output is returned either way. */
  onOutput?: (chunk: string, stream: "stdout" | "stderr") => void;
}

export interface Executor {
  execute(command: Command, options: ExecOptions): Promise<ExecResult>;
}

// 10MB per stream: large package-manager runs stay well below this.
const MAX_CAPTURE = 10 * 1024 * 1024;

/** Exit code reported when the program could not be started. */
export const EXIT_NOT_FOUND = 127;

export class LocalExecutor implements Executor {
  async execute(command: Command, options: ExecOptions): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      return { stdout: "", stderr: "empty command", exitCode: EXIT_NOT_FOUND, durationMs: 0 };
    }

    return new Promise<ExecResult>((resolve) => {
      let stdout = "";
      let stderr = "";
      let settled = false;
      const finish = (exitCode: number): void => {
        if (settled) return;
        settled = true;
        resolve({ stdout, stderr, exitCode, durationMs: Math.round(performance.now() - start) });
      };

      const child = spawn(cmd, args, {
        cwd: command.cwd,
        env: command.env ? { ...process.env, ...command.env } : process.env,
        stdio: command.interactive ? "inherit" : ["pipe", "pipe", "pipe"],
        timeout: options.timeoutMs,
      });

      child.stdout?.setEncoding("utf-8");
      child.stderr?.setEncoding("utf-8");
      child.stdout?.on("data", (chunk: string) => {
        if (stdout.length < MAX_CAPTURE) stdout += chunk;
        options.onOutput?.(chunk, "stdout");
      });
      child.stderr?.on("data", (chunk: string) => {
        if (stderr.length < MAX_CAPTURE) stderr += chunk;
        options.onOutput?.(chunk, "stderr");
      });

      child.on("error", (err: NodeJS.ErrnoException) => {
        stderr += err.code === "ENOENT" ? `${cmd}: command not found` : err.message;
        finish(err.code === "ENOENT" ? EXIT_NOT_FOUND : 1);
      });
      child.on("close", (code, signal) => {
        if (signal) stderr += `${stderr ? "\n" : ""}terminated by ${signal}`;
        finish(code ?? 1);
      });

      if (child.stdin) {
        // EPIPE: the program exited without reading stdin.
        child.stdin.on("error", (err: NodeJS.ErrnoException) => {
          if (err.code !== "EPIPE") stderr += `${stderr ? "\n" : ""}stdin: ${err.message}`;
        });
        if (command.stdin !== undefined) child.stdin.write(command.stdin);
        child.stdin.end();
      }
    });
  }
}

