import { join } from "node:path";
import { userInfo } from "node:os";
import type { Logger } from "pino";
import { createDefaultRegistry } from "./components/index.js";
import { loadConfig } from "./config/loader.js";
import type { RunContext } from "./context.js";
import { LocalExecutor } from "./execution/executor.js";
import { DEFAULT_LOG_DIR, logFileName, openRunLog } from "./logger.js";
import { FetchHttpClient } from "./net/http.js";
import { runSetup } from "./orchestrator/setup.js";
import { createPackageCommands } from "./platform/commands/factory.js";
import { SystemCommands } from "./platform/commands/system.js";
import { detectPlatform } from "./platform/detector.js";
import { InterruptedError, PrerequisiteError, errorMessage } from "./shared/errors.js";
import { ClackPrompter } from "./ui/prompter.js";
import { Reporter } from "./ui/reporter.js";
import { VERSION } from "./version.js";

const SIGNAL_EXIT: Record<"SIGINT" | "SIGTERM", number> = { SIGINT: 130, SIGTERM: 143 };

/** Map a terminal error to the process exit code, reporting it on the way. */
export function exitCodeFor(err: unknown, reporter: Reporter, logger: Logger): number {
  if (err instanceof InterruptedError) {
    reporter.warn("Setup interrupted");
    logger.warn({ signal: err.signal }, err.message);
    return err.signal === "SIGTERM" ? SIGNAL_EXIT.SIGTERM : SIGNAL_EXIT.SIGINT;
  }
  if (err instanceof PrerequisiteError) {
    reporter.error(err.message);
    logger.error({ code: err.code, context: err.context }, err.message);
    return 1;
  }
  reporter.error(`Setup failed: ${errorMessage(err)}`, ["Check the log file for details"]);
  logger.fatal({ err }, "Fatal setup error");
  return 1;
}

// A signal aborts the current step; nothing is rolled back.
function installSignalHandlers(reporter: Reporter, logger: Logger): void {
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      process.exit(exitCodeFor(new InterruptedError(`Received ${signal}`, signal), reporter, logger));
    });
  }
}

/** The interactive run behind the bare `devhost-setup` command. Resolves to the exit code. */
export async function runInteractive(): Promise<number> {
  // ── Phase 1: Log file and console ─────────────────────────────
  const runLog = openRunLog(join(process.env.DEVHOST_SETUP_LOG_DIR ?? DEFAULT_LOG_DIR, logFileName(new Date())));
  const { logger, logFile } = runLog;
  const reporter = new Reporter(logger);
  reporter.banner(VERSION, logFile);
  if (runLog.error !== null) reporter.warn(`Could not open the log file (${runLog.error}); continuing without one`);
  installSignalHandlers(reporter, logger);

  const executor = new LocalExecutor();
  try {
    // ── Phase 2: Load config ──────────────────────────────────────
    const { config, configPath, firstRun } = loadConfig(logger, process.env.DEVHOST_SETUP_CONFIG);
    logger.info({ configPath, firstRun }, "Configuration loaded");
    if (firstRun) reporter.info(`Default configuration written to ${configPath}`);

    // ── Phase 3: Detect platform ──────────────────────────────────
    const profile = await detectPlatform({ executor, logger, reporter, override: config.distro.package_manager });

    // ── Phase 4: Build the run context ────────────────────────────
    const useSudo = !profile.is_root;
    const ctx: RunContext = {
      profile,
      config,
      commands: createPackageCommands(profile),
      system: new SystemCommands(useSudo),
      executor,
      http: new FetchHttpClient(`devhost-setup/${VERSION}`),
      logger,
      reporter,
      prompter: new ClackPrompter(),
      invokingUser: process.env.SUDO_USER ?? process.env.USER ?? userInfo().username,
      interactive: process.stdin.isTTY === true,
      logFile,
    };

    // ── Phase 5: Run ──────────────────────────────────────────────
    await runSetup(ctx, createDefaultRegistry(logger));
    reporter.success("Setup completed");
    return 0;
  } catch (err) {
    return exitCodeFor(err, reporter, logger);
  }
}
