import type { InstallContext, RunContext } from "../context.js";
import type { InstallerRegistry } from "../components/registry.js";
import type { InstallResult } from "../types/result.js";
import { checkPrerequisites } from "../prerequisites/checker.js";
import { confirm } from "../ui/confirm.js";
import { provisionUser, type ProvisionOutcome } from "../users/provisioner.js";
import { selectComponents } from "./menu.js";
import { postInstallNotes, printNotes } from "./notes.js";
import { runInstallers } from "./runner.js";
import { printSummary } from "./summary.js";

export interface SetupReport {
  user: ProvisionOutcome | null;
  results: InstallResult[];
}

/**
 * One interactive run: prerequisites, user management, component selection,
 * installation, summary. PrerequisiteError and InterruptedError propagate.
 */
export async function runSetup(ctx: RunContext, registry: InstallerRegistry): Promise<SetupReport> {
  const prerequisites = await checkPrerequisites(ctx);

  const user = await provisionUser(ctx);
  const installCtx: InstallContext = { ...ctx, installUser: user?.switchTarget ? user.username : null };

  ctx.reporter.section("Component Selection");
  const selected = await selectComponents(installCtx, registry);
  let results: InstallResult[] = [];

  if (selected.length === 0) {
    ctx.reporter.warn("No components selected");
  } else {
    const installers = registry.ordered(selected);
    ctx.reporter.heading("The following will be installed");
    for (const installer of installers) ctx.reporter.line(`  - ${installer.label}`);

    if (await confirm(ctx, "Proceed with installation?", { defaultYes: true })) {
      results = await runInstallers(installCtx, installers);
    } else {
      ctx.reporter.info("Installation cancelled");
      results = installers.map((i): InstallResult => ({ component: i.id, status: "skipped" }));
    }
  }

  await printSummary(installCtx, registry, { prerequisites, results, user });
  printNotes(ctx.reporter, postInstallNotes({
    results,
    user,
    invokingUser: ctx.invokingUser,
    sudoersDir: ctx.config.paths.sudoers_dir,
  }));
  ctx.logger.info({ results, user: user?.username ?? null }, "Setup finished");
  return { user, results };
}
