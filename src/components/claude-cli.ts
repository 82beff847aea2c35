import { join } from "node:path";
import { processUser, targetUser, type InstallContext } from "../context.js";
import type { InstallResult } from "../types/result.js";
import { captureLine, commandExists, run, succeeds } from "../execution/helpers.js";
import { InstallFailure } from "../shared/errors.js";
import { resolveHome } from "../users/info.js";
import type { Installer } from "./types.js";

const BINARIES = ["claude", "claude-code"] as const;

/** Path of the CLI: on PATH, or in the target user's ~/.local/bin where the installer puts it. */
async function locate(ctx: InstallContext): Promise<string | null> {
  for (const name of BINARIES) {
    if (await commandExists(ctx.executor, name)) return name;
  }
  const local = join(await resolveHome(ctx, targetUser(ctx)), ".local", "bin", "claude");
  return (await succeeds(ctx.executor, ctx.system.fileExists(local))) ? local : null;
}

export const claudeCli: Installer = {
  id: "claude-cli",
  label: "Claude CLI",
  description: "Anthropic's command-line coding assistant",
  recommended: true,

  async isInstalled(ctx) {
    return (await locate(ctx)) !== null;
  },

  async install(ctx: InstallContext): Promise<InstallResult> {
    const url = ctx.config.claude.install_url;
    const manualHint = `Install manually: curl -fsSL ${url} | bash`;

    const existing = await locate(ctx);
    if (existing) {
      ctx.reporter.info("Claude CLI is already installed");
      return { component: "claude-cli", status: "already_present", version: await captureLine(ctx.executor, [existing, "--version"]) };
    }

    ctx.reporter.step("Installing Claude CLI...");
    const script = ctx.system.asUser(targetUser(ctx), processUser(ctx), ["bash", "-c", 'curl -fsSL "$1" | bash', "_", url]);
    const result = await run(ctx, script, { stream: true });
    if (result.exitCode !== 0) {
      throw new InstallFailure("claude-cli", `Claude CLI installer exited with ${result.exitCode}`, {
        remediation: [manualHint],
        context: { url, exitCode: result.exitCode },
      });
    }

    const installed = await locate(ctx);
    if (installed === null) {
      throw new InstallFailure("claude-cli", "Claude CLI installation could not be verified", {
        remediation: [manualHint, "Make sure ~/.local/bin is on PATH, then open a new shell"],
      });
    }

    ctx.reporter.success("Claude CLI installed");
    ctx.reporter.info("Run 'claude' to authenticate and get started");
    return { component: "claude-cli", status: "installed", version: await captureLine(ctx.executor, [installed, "--version"]) };
  },
};
