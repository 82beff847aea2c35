import type { RunContext } from "../context.js";
import { commandExists, run, runOrThrow, succeeds } from "../execution/helpers.js";
import { ConfigurationRollback, InstallFailure, ValidationError } from "../shared/errors.js";
import { parseUserSpec, validatePassword, validateUsername, type UserSpec } from "../shared/validation.js";
import { confirm } from "../ui/confirm.js";
import { resolveHome } from "./info.js";
import { writeShellProfile } from "./shell-profile.js";
import { enablePasswordlessSudo } from "./sudoers.js";

const COMPONENT = "user";

export type PasswordlessState = "enabled" | "declined" | "rolled_back";

export interface ProvisionOutcome {
  username: string;
  /** Account created in this run (false when an existing one was reconfigured). */
  created: boolean;
  status: "configured" | "failed";
  groups: string[];
  passwordlessSudo: PasswordlessState;
  profileWritten: boolean;
  /** Operator chose this account as the install target for the remaining components. */
  switchTarget: boolean;
  error?: string;
}

/**
 * Interactive user management. Returns null when the operator declines.
 *
 * All questions are answered before the first account-mutating command runs;
 * a failure after that point is reported and recorded in the outcome.
 */
export async function provisionUser(ctx: RunContext): Promise<ProvisionOutcome | null> {
  ctx.reporter.section("User Management");
  const wanted = await confirm(ctx, "Would you like to create or configure a user?", {
    help: "A new account gets a password, group memberships and a prepared shell profile. An existing account is reconfigured without touching its password.",
  });
  if (!wanted) {
    ctx.logger.info("User management declined");
    return null;
  }

  const username = await promptUsername(ctx);
  const exists = await succeeds(ctx.executor, ctx.system.userExists(username));
  let password: string | null = null;

  if (exists) {
    ctx.reporter.warn(`User '${username}' already exists`);
    const reconfigure = await confirm(ctx, "Do you want to reconfigure this user?", { defaultYes: true });
    if (!reconfigure) {
      ctx.reporter.info(`Leaving user '${username}' unchanged`);
      return null;
    }
  } else {
    password = await promptPassword(ctx);
  }

  const spec = parseUserSpec({
    username,
    password,
    grant_sudo: await confirm(ctx, `Grant sudo privileges to '${username}'?`, { defaultYes: true }),
    passwordless_sudo: false,
    docker_group: false,
  });
  const withSudo: UserSpec = {
    ...spec,
    passwordless_sudo: spec.grant_sudo
      ? await confirm(ctx, `Enable passwordless sudo for '${username}'?`, {
          help: "Writes a NOPASSWD rule to the sudoers directory. Convenient on throwaway machines; any process of this user can then become root.",
        })
      : false,
    docker_group: await askDockerGroup(ctx, username),
  };

  return materialize(ctx, withSudo, !exists);
}

async function promptUsername(ctx: RunContext): Promise<string> {
  for (;;) {
    const input = await ctx.prompter.text("Enter username", { placeholder: "dev" });
    try {
      return validateUsername(input);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      ctx.reporter.error(err.message);
    }
  }
}

async function promptPassword(ctx: RunContext): Promise<string> {
  for (;;) {
    const password = await ctx.prompter.password("Enter password");
    const confirmation = await ctx.prompter.password("Confirm password");
    try {
      return validatePassword(password, confirmation);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      ctx.reporter.error(err.message);
    }
  }
}

async function askDockerGroup(ctx: RunContext, username: string): Promise<boolean> {
  if (await commandExists(ctx.executor, "docker")) {
    ctx.reporter.info(`Docker is installed; '${username}' will be added to the docker group`);
    return true;
  }
  return confirm(ctx, `Add '${username}' to the docker group (for use after Docker is installed)?`, { defaultYes: true });
}

async function materialize(ctx: RunContext, spec: UserSpec, create: boolean): Promise<ProvisionOutcome> {
  const outcome: ProvisionOutcome = {
    username: spec.username,
    created: false,
    status: "configured",
    groups: [],
    passwordlessSudo: spec.passwordless_sudo ? "enabled" : "declined",
    profileWritten: false,
    switchTarget: false,
  };

  try {
    if (create) {
      ctx.reporter.step(`Creating user '${spec.username}'...`);
      await runOrThrow(ctx, COMPONENT, ctx.commands.userCreate(spec.username));
      outcome.created = true;
      if (spec.password !== null) {
        await runOrThrow(ctx, COMPONENT, ctx.system.setPassword(spec.username, spec.password), { stream: false });
      }
      ctx.reporter.success(`User '${spec.username}' created`);
    }

    outcome.groups = await grantGroups(ctx, spec);

    if (spec.passwordless_sudo) {
      try {
        await enablePasswordlessSudo(ctx, spec.username);
      } catch (err) {
        if (!(err instanceof ConfigurationRollback)) throw err;
        ctx.reporter.error(err.message, ["Check the rule with 'sudo visudo -c' and add it manually if needed"]);
        outcome.passwordlessSudo = "rolled_back";
      }
    }

    await writeShellProfile(ctx, spec.username, await resolveHome(ctx, spec.username));
    outcome.profileWritten = true;
  } catch (err) {
    if (!(err instanceof InstallFailure)) throw err;
    ctx.reporter.error(`User setup failed: ${err.message}`, err.remediation);
    ctx.logger.error({ component: COMPONENT, username: spec.username, context: err.context }, "User provisioning failed");
    return { ...outcome, status: "failed", error: err.message };
  }

  outcome.switchTarget = await confirm(ctx, `Use '${spec.username}' as the target user for the remaining installation?`, {
    help: "Group memberships and the AI tools directory then go to this user instead of the account running the setup.",
  });
  ctx.logger.info({ component: COMPONENT, outcome }, "User provisioning complete");
  return outcome;
}

async function grantGroups(ctx: RunContext, spec: UserSpec): Promise<string[]> {
  const groups: string[] = [];
  if (spec.grant_sudo) groups.push(ctx.commands.sudoGroup);
  if (spec.docker_group) {
    if (!(await succeeds(ctx.executor, ctx.system.groupExists("docker")))) {
      await runOrThrow(ctx, COMPONENT, ctx.system.groupAdd("docker"), { stream: false });
    }
    groups.push("docker");
  }
  if (groups.length === 0) return groups;

  ctx.reporter.step(`Adding '${spec.username}' to groups: ${groups.join(", ")}`);
  await runOrThrow(ctx, COMPONENT, ctx.system.addToGroups(spec.username, groups), { stream: false });
  return groups;
}

/** Add an account to the docker group, creating the group when needed. Non-fatal. */
export async function ensureDockerGroupMember(ctx: RunContext, username: string): Promise<boolean> {
  if (!(await succeeds(ctx.executor, ctx.system.groupExists("docker")))) {
    await run(ctx, ctx.system.groupAdd("docker"));
  }
  const result = await run(ctx, ctx.system.addToGroups(username, ["docker"]));
  if (result.exitCode !== 0) {
    ctx.reporter.warn(`Could not add '${username}' to the docker group`);
    return false;
  }
  ctx.reporter.info(`Added '${username}' to the docker group`);
  return true;
}
