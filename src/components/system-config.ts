import type { InstallContext } from "../context.js";
import type { InstallResult } from "../types/result.js";
import { captureLine, commandExists, run, runOrThrow } from "../execution/helpers.js";
import { ValidationError } from "../shared/errors.js";
import { validateTimezone } from "../shared/validation.js";
import { confirm } from "../ui/confirm.js";
import type { Installer } from "./types.js";

async function listTimezones(ctx: InstallContext): Promise<string[]> {
  const result = await run(ctx, { argv: ["timedatectl", "list-timezones"] });
  if (result.exitCode !== 0) return [];
  return result.stdout.split("\n").map((l) => l.trim()).filter(Boolean);
}

function currentTimezone(ctx: InstallContext): Promise<string | null> {
  return captureLine(ctx.executor, ["timedatectl", "show", "-p", "Timezone", "--value"]);
}

async function applyTimezone(ctx: InstallContext, timezone: string): Promise<string> {
  await runOrThrow(ctx, "system-config", ctx.system.setTimezone(timezone), { stream: false });
  ctx.reporter.success(`Timezone set to ${timezone}`);
  return `timezone ${timezone}`;
}

/**
 * Applies system.timezone when configured, otherwise asks. Returns a description of
 * what changed, or null when the timezone was kept.
 */
async function configureTimezone(ctx: InstallContext): Promise<string | null> {
  if (!(await commandExists(ctx.executor, "timedatectl"))) {
    if (ctx.profile.package_manager !== "apt") {
      ctx.reporter.info("timedatectl is not available; timezone left unchanged");
      return null;
    }
    if (!(await confirm(ctx, "Configure the timezone with dpkg-reconfigure tzdata?"))) return null;
    await runOrThrow(ctx, "system-config", ctx.system.reconfigure("tzdata"));
    return "timezone reconfigured";
  }

  const current = await currentTimezone(ctx);
  const known = await listTimezones(ctx);
  const wanted = ctx.config.system.timezone;
  if (wanted !== null) {
    if (current === wanted) {
      ctx.reporter.info(`Timezone already set to ${wanted}`);
      return null;
    }
    try {
      return await applyTimezone(ctx, validateTimezone(wanted, known));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      ctx.reporter.error(`Configured timezone rejected: ${err.message}`, ["Fix system.timezone in the configuration file"]);
    }
  }

  for (;;) {
    const input = await ctx.prompter.text(`Timezone (empty keeps ${current ?? "the current one"})`, { placeholder: "Europe/Berlin" });
    if (input.trim() === "") {
      ctx.reporter.info("Keeping the current timezone");
      return null;
    }
    try {
      return await applyTimezone(ctx, validateTimezone(input, known));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      ctx.reporter.error(err.message, ["List valid names with 'timedatectl list-timezones'"]);
    }
  }
}

async function configureLocale(ctx: InstallContext): Promise<string | null> {
  if (ctx.profile.package_manager !== "apt") {
    ctx.reporter.info("Configure locales with 'localectl set-locale' on this system");
    return null;
  }
  if (!(await confirm(ctx, "Configure system locales with dpkg-reconfigure locales?"))) return null;
  await runOrThrow(ctx, "system-config", ctx.system.reconfigure("locales"));
  return "locales reconfigured";
}

export const systemConfig: Installer = {
  id: "system-config",
  label: "System configuration",
  description: "Timezone and locale",
  recommended: false,

  // Locales are not probed; without a configured timezone the component is always offered.
  async isInstalled(ctx) {
    const wanted = ctx.config.system.timezone;
    if (wanted === null) return false;
    return (await currentTimezone(ctx)) === wanted;
  },

  async install(ctx: InstallContext): Promise<InstallResult> {
    ctx.reporter.step("Configuring system settings...");
    const changes = [await configureTimezone(ctx), await configureLocale(ctx)].filter((c): c is string => c !== null);
    if (changes.length === 0) {
      return { component: "system-config", status: "skipped", message: "no changes" };
    }
    return { component: "system-config", status: "installed", message: changes.join(", ") };
  },
};
