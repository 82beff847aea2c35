import type { InstallContext } from "../context.js";
import type { Installer } from "../components/types.js";
import type { InstallResult } from "../types/result.js";
import { ConfigurationRollback, InstallFailure, InterruptedError, errorMessage } from "../shared/errors.js";

/**
 * Run installers one after another. A failing component is recorded and the
 * next one still runs; only an interruption ends the loop.
 */
export async function runInstallers(ctx: InstallContext, installers: readonly Installer[]): Promise<InstallResult[]> {
  const results: InstallResult[] = [];
  for (const installer of installers) {
    ctx.reporter.section(installer.label);
    try {
      const result = await installer.install(ctx);
      ctx.logger.info({ component: installer.id, status: result.status, version: result.version }, "Component finished");
      results.push(result);
    } catch (err) {
      if (err instanceof InterruptedError) throw err;
      results.push(recordFailure(ctx, installer, err));
    }
  }
  return results;
}

function recordFailure(ctx: InstallContext, installer: Installer, err: unknown): InstallResult {
  if (err instanceof InstallFailure) {
    ctx.reporter.error(`${installer.label} failed: ${err.message}`, err.remediation);
    ctx.logger.error({ component: installer.id, code: err.code, context: err.context }, err.message);
  } else if (err instanceof ConfigurationRollback) {
    ctx.reporter.error(`${installer.label} failed: ${err.message}`, [`Rolled back ${err.path}`]);
    ctx.logger.error({ component: installer.id, code: err.code, context: err.context }, err.message);
  } else {
    ctx.reporter.error(`${installer.label} failed unexpectedly: ${errorMessage(err)}`);
    ctx.logger.error({ component: installer.id, err }, "Unexpected installer error");
  }
  return { component: installer.id, status: "failed", message: errorMessage(err) };
}
