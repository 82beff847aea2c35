import { join } from "node:path";
import { processUser, targetUser, type InstallContext } from "../context.js";
import type { ToolRepository } from "../config/schema.js";
import type { InstallResult } from "../types/result.js";
import { commandExists, run, succeeds } from "../execution/helpers.js";
import { InstallFailure } from "../shared/errors.js";
import { confirm } from "../ui/confirm.js";
import { resolveHome } from "../users/info.js";
import type { Installer } from "./types.js";

/** Configured tools directory, else ~/ai-tools of the target user. */
export async function resolveToolsDir(ctx: InstallContext): Promise<string> {
  return ctx.config.paths.tools_dir ?? join(await resolveHome(ctx, targetUser(ctx)), "ai-tools");
}

/** Commands run as the target user so clones and node_modules belong to them. */
function asTarget(ctx: InstallContext, argv: string[], cwd?: string) {
  return ctx.system.asUser(targetUser(ctx), processUser(ctx), argv, cwd);
}

async function pipCommand(ctx: InstallContext): Promise<string | null> {
  if (await commandExists(ctx.executor, "pip3")) return "pip3";
  if (await commandExists(ctx.executor, "pip")) return "pip";
  return null;
}

/** "present" for an existing checkout (pulled), "cloned" for a new one, null when it could not be fetched. */
type RepositoryState = "cloned" | "present";

/** Clone or update one repository and install its dependencies. */
async function installRepository(ctx: InstallContext, repo: ToolRepository, toolsDir: string): Promise<RepositoryState | null> {
  const dest = join(toolsDir, repo.name);
  const { reporter } = ctx;

  let state: RepositoryState;
  if (await succeeds(ctx.executor, asTarget(ctx, ["test", "-d", join(dest, ".git")]))) {
    state = "present";
    reporter.info(`${repo.name} already exists, updating...`);
    const pulled = await run(ctx, asTarget(ctx, ["git", "pull"], dest), { stream: true });
    if (pulled.exitCode !== 0) reporter.warn(`Could not update ${repo.name}; keeping the existing checkout`);
  } else {
    reporter.info(`Cloning ${repo.name}...`);
    const cloned = await run(ctx, asTarget(ctx, ["git", "clone", repo.url, dest]), { stream: true });
    if (cloned.exitCode !== 0) {
      reporter.warn(`Failed to clone ${repo.name} from ${repo.url}`);
      return null;
    }
    state = "cloned";
  }

  if (await succeeds(ctx.executor, asTarget(ctx, ["test", "-f", join(dest, "package.json")]))) {
    reporter.info(`Installing npm dependencies for ${repo.name}...`);
    const npm = await run(ctx, asTarget(ctx, ["npm", "install"], dest), { stream: true });
    if (npm.exitCode !== 0) reporter.warn(`npm install failed for ${repo.name}`);
  }

  if (await succeeds(ctx.executor, asTarget(ctx, ["test", "-f", join(dest, "requirements.txt")]))) {
    const pip = await pipCommand(ctx);
    if (pip === null) {
      reporter.warn(`${repo.name} has a requirements.txt but neither pip3 nor pip is installed`);
    } else {
      reporter.info(`Installing Python dependencies for ${repo.name}...`);
      const deps = await run(ctx, asTarget(ctx, [pip, "install", "-r", "requirements.txt"], dest), { stream: true });
      if (deps.exitCode !== 0) reporter.warn(`${pip} install failed for ${repo.name}`);
    }
  }

  reporter.success(`${repo.name} ready in ${dest}`);
  return state;
}

export const aiTools: Installer = {
  id: "ai-tools",
  label: "AI tool repositories",
  description: "Clone the configured AI tooling repositories",
  recommended: false,

  async isInstalled(ctx) {
    const dir = await resolveToolsDir(ctx);
    for (const repo of ctx.config.ai_tools.repositories) {
      if (!(await succeeds(ctx.executor, asTarget(ctx, ["test", "-d", join(dir, repo.name)])))) return false;
    }
    return true;
  },

  async install(ctx: InstallContext): Promise<InstallResult> {
    const repositories = ctx.config.ai_tools.repositories;
    if (repositories.length === 0) {
      return { component: "ai-tools", status: "skipped", message: "no repositories configured" };
    }

    const selected: ToolRepository[] = [];
    for (const repo of repositories) {
      if (await confirm(ctx, `Install ${repo.name} (${repo.description})?`, { defaultYes: true })) selected.push(repo);
    }
    if (selected.length === 0) {
      return { component: "ai-tools", status: "skipped", message: "no repositories selected" };
    }

    const toolsDir = await resolveToolsDir(ctx);
    ctx.reporter.step(`Installing AI tools into ${toolsDir}...`);
    await run(ctx, asTarget(ctx, ["mkdir", "-p", toolsDir]));

    const ready: string[] = [];
    let cloned = 0;
    for (const repo of selected) {
      const state = await installRepository(ctx, repo, toolsDir);
      if (state === null) continue;
      ready.push(repo.name);
      if (state === "cloned") cloned++;
    }
    if (ready.length === 0) {
      throw new InstallFailure("ai-tools", "No AI tool repository could be fetched", {
        remediation: ["Check that git can reach the repository hosts", "Clone them manually into " + toolsDir],
      });
    }
    return {
      component: "ai-tools",
      status: cloned > 0 ? "installed" : "already_present",
      message: `${ready.join(", ")} in ${toolsDir}`,
    };
  },
};
