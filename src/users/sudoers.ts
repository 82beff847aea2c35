import { join } from "node:path";
import type { RunContext } from "../context.js";
import { run, succeeds } from "../execution/helpers.js";
import { ConfigurationRollback } from "../shared/errors.js";

export function sudoersFragmentPath(sudoersDir: string, username: string): string {
  return join(sudoersDir, `90-${username}-nopasswd`);
}

export function passwordlessRule(username: string): string {
  return `${username} ALL=(ALL) NOPASSWD:ALL\n`;
}

/**
 * Write, validate and, on failure, remove the per-user NOPASSWD fragment.
 * A fragment that visudo rejects never stays on disk: sudo refuses to run at all
 * while a broken file sits in sudoers.d.
 */
export async function enablePasswordlessSudo(ctx: RunContext, username: string): Promise<string> {
  const path = sudoersFragmentPath(ctx.config.paths.sudoers_dir, username);
  ctx.reporter.step(`Setting up passwordless sudo for '${username}'...`);

  const written = await run(ctx, ctx.system.writeFile(path, passwordlessRule(username)));
  const chmodded = written.exitCode === 0 ? await run(ctx, ctx.system.chmod("0440", path)) : written;
  const validated = chmodded.exitCode === 0 ? await run(ctx, ctx.system.visudoCheck(path)) : chmodded;

  if (validated.exitCode !== 0) {
    await run(ctx, ctx.system.remove(path));
    throw new ConfigurationRollback(path, "Error in sudoers configuration. The fragment was removed.", {
      exitCode: validated.exitCode,
      stderr: validated.stderr.trim(),
    });
  }

  ctx.reporter.success(`Passwordless sudo configured for '${username}'`);
  ctx.reporter.warn(`Security Note: User '${username}' can now run sudo without password`);
  return path;
}

export async function hasPasswordlessSudo(ctx: RunContext, username: string): Promise<boolean> {
  return succeeds(ctx.executor, ctx.system.fileExists(sudoersFragmentPath(ctx.config.paths.sudoers_dir, username)));
}
