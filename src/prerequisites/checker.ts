/**
 * Prerequisite checks run before anything touches the system.
 *
 * Sudo and connectivity are hard requirements; missing baseline tools (curl, git)
 * are installed on the spot through the detected package manager.
 */

import type { RunContext } from "../context.js";
import { commandExists, run, succeeds } from "../execution/helpers.js";
import { probeConnectivity } from "../net/connectivity.js";
import { PrerequisiteError } from "../shared/errors.js";

export interface PrerequisiteResult {
  name: string;
  status: "pass" | "warn" | "fail";
  message?: string;
}

export const BASELINE_TOOLS = ["curl", "git"] as const;

/**
 * Check all prerequisites and return structured results.
 * Throws PrerequisiteError on the first fatal failure.
 */
export async function checkPrerequisites(ctx: RunContext): Promise<PrerequisiteResult[]> {
  ctx.reporter.step("Checking prerequisites...");
  const results: PrerequisiteResult[] = [];

  results.push(await checkSudo(ctx));
  results.push(await checkConnectivity(ctx));
  results.push(await ensureBaselineTools(ctx));

  ctx.reporter.success("Prerequisites check passed");
  return results;
}

async function checkSudo(ctx: RunContext): Promise<PrerequisiteResult> {
  if (ctx.profile.is_root) {
    ctx.reporter.warn("Running as root. Some operations will be adjusted accordingly.");
    return { name: "Privileges", status: "warn", message: "running as root" };
  }

  if (await succeeds(ctx.executor, { argv: ["sudo", "-n", "true"] })) {
    return { name: "Privileges", status: "pass", message: "sudo available" };
  }

  if (ctx.interactive) {
    ctx.reporter.info("sudo needs your password to continue");
    const result = await run(ctx, { argv: ["sudo", "-v"], interactive: true });
    if (result.exitCode === 0) return { name: "Privileges", status: "pass", message: "sudo credentials cached" };
  }

  throw new PrerequisiteError("This setup requires sudo privileges. Please run with sudo or as root.", { user: ctx.invokingUser });
}

async function checkConnectivity(ctx: RunContext): Promise<PrerequisiteResult> {
  const { probe_urls, probe_timeout_seconds } = ctx.config.network;
  const report = await probeConnectivity(ctx.http, probe_urls, probe_timeout_seconds * 1000, ctx.logger);
  if (report.reachable === null) {
    throw new PrerequisiteError("No internet connection detected. Please check your network.", { probed: report.failed });
  }
  if (report.failed.length > 0) {
    ctx.logger.warn({ failed: report.failed, reachable: report.reachable }, "Some connectivity probes failed");
  }
  return { name: "Network", status: "pass", message: `reached ${report.reachable}` };
}

async function ensureBaselineTools(ctx: RunContext): Promise<PrerequisiteResult> {
  const missing: string[] = [];
  for (const tool of BASELINE_TOOLS) {
    if (!(await commandExists(ctx.executor, tool))) missing.push(tool);
  }
  if (missing.length === 0) return { name: "Baseline tools", status: "pass", message: BASELINE_TOOLS.join(", ") };

  ctx.reporter.info(`Installing missing baseline tools: ${missing.join(", ")}`);
  await run(ctx, ctx.commands.refreshIndex(), { stream: true });
  await run(ctx, ctx.commands.install(missing), { stream: true });

  const stillMissing: string[] = [];
  for (const tool of missing) {
    if (!(await commandExists(ctx.executor, tool))) stillMissing.push(tool);
  }
  if (stillMissing.length > 0) {
    throw new PrerequisiteError(`Could not install required tools: ${stillMissing.join(", ")}`, { missing: stillMissing });
  }
  return { name: "Baseline tools", status: "pass", message: `installed ${missing.join(", ")}` };
}
