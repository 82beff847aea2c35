import type { InstallContext } from "../context.js";
import type { InstallResult } from "../types/result.js";
import { captureLine, commandExists, run, runSteps } from "../execution/helpers.js";
import { confirm } from "../ui/confirm.js";
import { ensureDockerGroupMember } from "../users/provisioner.js";
import { installComposeStandalone } from "./compose.js";
import type { Installer } from "./types.js";

async function ensureService(ctx: InstallContext): Promise<void> {
  for (const action of ["start", "enable"] as const) {
    const result = await run(ctx, ctx.system.service(action, "docker"));
    if (result.exitCode !== 0) ctx.reporter.warn(`systemctl ${action} docker failed (exit ${result.exitCode})`);
  }
}

/** The invoking account (unless it is root) and the install user join the docker group. */
async function grantGroupAccess(ctx: InstallContext): Promise<string[]> {
  const members = new Set([ctx.invokingUser, ctx.installUser ?? ctx.invokingUser]);
  members.delete("root");

  const granted: string[] = [];
  for (const user of members) {
    if (await ensureDockerGroupMember(ctx, user)) granted.push(user);
  }
  return granted;
}

export const docker: Installer = {
  id: "docker",
  label: "Docker",
  description: "Docker Engine, Buildx and Compose",
  recommended: true,

  isInstalled(ctx) {
    return commandExists(ctx.executor, "docker");
  },

  async install(ctx: InstallContext): Promise<InstallResult> {
    const present = await commandExists(ctx.executor, "docker");
    if (present) {
      ctx.reporter.warn("Docker is already installed");
      const reinstall = await confirm(ctx, "Do you want to reinstall Docker?");
      if (!reinstall) {
        await ensureService(ctx);
        await grantGroupAccess(ctx);
        return {
          component: "docker",
          status: "already_present",
          version: await captureLine(ctx.executor, ["docker", "--version"]),
        };
      }
    }

    ctx.reporter.step(`Installing Docker for ${ctx.profile.name}...`);
    await runSteps(ctx, "docker", ctx.commands.dockerSetup(ctx.profile));
    await ensureService(ctx);
    const granted = await grantGroupAccess(ctx);
    const composeTag = await installComposeStandalone(ctx);

    ctx.reporter.success("Docker installed");
    const notes = [granted.length > 0 ? `docker group: ${granted.join(", ")}` : null, composeTag ? `compose ${composeTag}` : null];
    return {
      component: "docker",
      status: "installed",
      message: notes.filter((n): n is string => n !== null).join("; ") || undefined,
      version: await captureLine(ctx.executor, ["docker", "--version"]),
    };
  },
};
