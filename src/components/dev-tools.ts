import type { InstallContext } from "../context.js";
import type { InstallResult } from "../types/result.js";
import { commandExists, run } from "../execution/helpers.js";
import { InstallFailure } from "../shared/errors.js";
import type { Installer } from "./types.js";

const PROBED_TOOLS = ["make", "htop", "tmux", "vim", "tree"] as const;

async function allPresent(ctx: InstallContext): Promise<boolean> {
  for (const tool of PROBED_TOOLS) {
    if (!(await commandExists(ctx.executor, tool))) return false;
  }
  return true;
}

export const devTools: Installer = {
  id: "dev-tools",
  label: "Development tools",
  description: "Compilers, python3-pip, htop, tmux, vim, tree",
  recommended: true,

  isInstalled: allPresent,

  // One package per call: a package missing from this distro's repositories must
  // not take the others down with it.
  async install(ctx: InstallContext): Promise<InstallResult> {
    if (await allPresent(ctx)) {
      ctx.reporter.info("Development tools are already installed");
      return { component: "dev-tools", status: "already_present" };
    }

    const packages = ctx.commands.devToolPackages();
    ctx.reporter.step("Installing development tools...");

    const installed: string[] = [];
    const failed: string[] = [];
    for (const pkg of packages) {
      const result = await run(ctx, ctx.commands.install([pkg]), { stream: true });
      if (result.exitCode === 0) {
        installed.push(pkg);
      } else {
        failed.push(pkg);
        ctx.reporter.warn(`Could not install ${pkg}`);
      }
    }

    if (installed.length === 0) {
      throw new InstallFailure("dev-tools", "None of the development tools could be installed", {
        remediation: [`Try installing them manually: ${packages.join(" ")}`],
        context: { failed },
      });
    }

    ctx.reporter.success("Development tools installed");
    const message = failed.length > 0
      ? `${installed.length}/${packages.length} installed; missing: ${failed.join(", ")}`
      : `${installed.length}/${packages.length} installed`;
    return { component: "dev-tools", status: "installed", message };
  },
};
