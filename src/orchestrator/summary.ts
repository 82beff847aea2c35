import { join } from "node:path";
import { targetUser, type InstallContext } from "../context.js";
import type { InstallerRegistry } from "../components/registry.js";
import type { Executor } from "../execution/executor.js";
import type { InstallResult, InstallStatus } from "../types/result.js";
import type { PrerequisiteResult } from "../prerequisites/checker.js";
import type { ProvisionOutcome } from "../users/provisioner.js";
import { captureLine, succeeds } from "../execution/helpers.js";
import { describeUser, resolveHome } from "../users/info.js";
import { resolveToolsDir } from "../components/ai-tools.js";

export interface ToolVersion {
  label: string;
  version: string | null;
}

const VERSION_PROBES: ReadonlyArray<{ label: string; argv: string[] }> = [
  { label: "Git", argv: ["git", "--version"] },
  { label: "Node.js", argv: ["node", "--version"] },
  { label: "npm", argv: ["npm", "--version"] },
  { label: "Docker", argv: ["docker", "--version"] },
  { label: "Docker Compose", argv: ["docker", "compose", "version"] },
  { label: "Claude CLI", argv: ["claude", "--version"] },
  { label: "jq", argv: ["jq", "--version"] },
];

const STATUS_TEXT: Record<InstallStatus, { icon: string; text: string }> = {
  installed: { icon: "✓", text: "installed" },
  already_present: { icon: "✓", text: "already present" },
  failed: { icon: "✗", text: "failed" },
  skipped: { icon: "-", text: "skipped" },
};

/** Re-probe tool versions live; nothing is cached from earlier stages. */
export async function probeVersions(executor: Executor): Promise<ToolVersion[]> {
  const versions: ToolVersion[] = [];
  for (const probe of VERSION_PROBES) {
    versions.push({ label: probe.label, version: await captureLine(executor, probe.argv) });
  }
  return versions;
}

const PREREQUISITE_ICON: Record<PrerequisiteResult["status"], string> = { pass: "✓", warn: "!", fail: "✗" };

export function formatPrerequisiteLine(result: PrerequisiteResult): string {
  return `${PREREQUISITE_ICON[result.status]} ${result.name}${result.message ? `: ${result.message}` : ""}`;
}

export function formatVersionLine(tool: ToolVersion): string {
  return tool.version ? `✓ ${tool.label}: ${tool.version}` : `✗ ${tool.label}: not installed`;
}

export function formatResultLine(label: string, result: InstallResult): string {
  const { icon, text } = STATUS_TEXT[result.status];
  return `${icon} ${label}: ${text}${result.message ? ` (${result.message})` : ""}`;
}

export interface SummaryInput {
  prerequisites: readonly PrerequisiteResult[];
  results: readonly InstallResult[];
  user: ProvisionOutcome | null;
}

export async function printSummary(ctx: InstallContext, registry: InstallerRegistry, input: SummaryInput): Promise<void> {
  const { reporter } = ctx;
  reporter.section("Installation Summary");

  const user = targetUser(ctx);
  const home = await resolveHome(ctx, user);
  reporter.heading("System information");
  reporter.line(`  OS: ${ctx.profile.name}`);
  reporter.line(`  Architecture: ${ctx.profile.arch}`);
  reporter.line(`  User: ${user}`);
  reporter.line(`  Home: ${home}`);

  if (input.prerequisites.length > 0) {
    reporter.heading("Prerequisites");
    for (const check of input.prerequisites) reporter.line(`  ${formatPrerequisiteLine(check)}`);
  }

  reporter.heading("Installed tools");
  for (const tool of await probeVersions(ctx.executor)) reporter.line(`  ${formatVersionLine(tool)}`);

  const dirs = [join(home, "projects"), await resolveToolsDir(ctx)];
  const present: string[] = [];
  for (const dir of dirs) {
    if (await succeeds(ctx.executor, ctx.system.dirExists(dir))) present.push(dir);
  }
  if (present.length > 0) {
    reporter.heading("Project directories");
    for (const dir of present) reporter.line(`  ${dir}`);
  }

  if (input.user && input.user.status === "configured") {
    const info = await describeUser(ctx, input.user.username);
    reporter.heading(`User '${info.username}'`);
    reporter.line(`  Home: ${info.home}`);
    reporter.line(`  Shell: ${info.shell}`);
    reporter.line(`  Groups: ${info.groups.join(", ") || "none"}`);
    reporter.line(`  Passwordless sudo: ${info.passwordlessSudo ? "yes" : "no"}`);
  }

  if (input.results.length > 0) {
    reporter.heading("Components");
    for (const result of input.results) {
      reporter.line(`  ${formatResultLine(registry.get(result.component)?.label ?? result.component, result)}`);
    }
  }

  if (ctx.logFile) {
    reporter.line("");
    reporter.line(`Log file: ${ctx.logFile}`);
  }
}
