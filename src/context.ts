import type { Logger } from "pino";
import type { SetupConfig } from "./config/schema.js";
import type { PackageCommands } from "./platform/commands/interface.js";
import type { SystemCommands } from "./platform/commands/system.js";
import type { Executor } from "./execution/executor.js";
import type { HttpClient } from "./net/http.js";
import type { Prompter } from "./ui/prompter.js";
import type { Reporter } from "./ui/reporter.js";
import type { SystemProfile } from "./types/profile.js";

/**
 * Shared run context — the glue between all stages.
 * Created once after platform detection and passed to every stage; nothing on it
 * changes during a run.
 */
export interface RunContext {
  readonly profile: SystemProfile;
  readonly config: SetupConfig;
  readonly commands: PackageCommands;
  readonly system: SystemCommands;
  readonly executor: Executor;
  readonly http: HttpClient;
  readonly logger: Logger;
  readonly reporter: Reporter;
  readonly prompter: Prompter;
  /** Account that started the run (SUDO_USER when run through sudo). */
  readonly invokingUser: string;
  /** Whether a terminal is attached for password prompts. */
  readonly interactive: boolean;
  readonly logFile: string | null;
}

/**
 * Context handed to installers. The install user comes out of the user provisioner
 * and is fixed before the first installer runs.
 */
export interface InstallContext extends RunContext {
  readonly installUser: string | null;
}

/** Account the process itself runs as. */
export function processUser(ctx: RunContext): string {
  return ctx.profile.is_root ? "root" : ctx.invokingUser;
}

/** Account that receives per-user installs: the switched-to user, else the invoking one. */
export function targetUser(ctx: InstallContext): string {
  return ctx.installUser ?? ctx.invokingUser;
}
