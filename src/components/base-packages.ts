import type { InstallContext } from "../context.js";
import type { InstallResult } from "../types/result.js";
import { commandExists, run, runOrThrow } from "../execution/helpers.js";
import type { Installer } from "./types.js";

export const basePackages: Installer = {
  id: "base",
  label: "Base packages",
  description: "System update plus curl, git, Node.js, npm, jq and friends",
  recommended: true,

  async isInstalled(ctx) {
    for (const tool of ["curl", "git", "node", "npm", "jq"]) {
      if (!(await commandExists(ctx.executor, tool))) return false;
    }
    return true;
  },

  async install(ctx: InstallContext): Promise<InstallResult> {
    const { commands, reporter } = ctx;

    reporter.step("Updating package index...");
    await runOrThrow(ctx, "base", commands.refreshIndex());
    reporter.step("Upgrading installed packages...");
    await runOrThrow(ctx, "base", commands.upgrade());

    const packages = commands.basePackages();
    reporter.step(`Installing base packages: ${packages.join(" ")}`);
    await runOrThrow(ctx, "base", commands.install(packages));

    const autoremove = commands.autoremove();
    if (autoremove) {
      const removed = await run(ctx, autoremove, { stream: true });
      if (removed.exitCode !== 0) reporter.warn("Removing unused packages failed");
    }
    const cleaned = await run(ctx, commands.clean(), { stream: true });
    if (cleaned.exitCode !== 0) reporter.warn("Cleaning the package cache failed");

    reporter.success("Base packages installed");
    return { component: "base", status: "installed", message: `${packages.length} packages` };
  },
};
