import type { RunContext } from "../context.js";
import { captureLine } from "../execution/helpers.js";
import { hasPasswordlessSudo } from "./sudoers.js";

export interface UserInfo {
  username: string;
  home: string;
  shell: string;
  groups: string[];
  passwordlessSudo: boolean;
}

interface PasswdEntry {
  home: string;
  shell: string;
}

/** Parse one `getent passwd` line (name:x:uid:gid:gecos:home:shell). */
export function parsePasswdLine(line: string): PasswdEntry | null {
  const fields = line.trim().split(":");
  if (fields.length < 7) return null;
  return { home: fields[5] ?? "", shell: fields[6] ?? "" };
}

/** Home directory of an account; /home/<name> when the passwd entry is unavailable. */
export async function resolveHome(ctx: RunContext, username: string): Promise<string> {
  const line = await captureLine(ctx.executor, ctx.system.passwdEntry(username).argv);
  const entry = line ? parsePasswdLine(line) : null;
  return entry?.home || `/home/${username}`;
}

export async function describeUser(ctx: RunContext, username: string): Promise<UserInfo> {
  const line = await captureLine(ctx.executor, ctx.system.passwdEntry(username).argv);
  const entry = line ? parsePasswdLine(line) : null;
  const groupLine = await captureLine(ctx.executor, ctx.system.userGroups(username).argv);
  return {
    username,
    home: entry?.home || `/home/${username}`,
    shell: entry?.shell || "unknown",
    groups: (groupLine ?? "").split(/\s+/).filter(Boolean).sort(),
    passwordlessSudo: await hasPasswordlessSudo(ctx, username),
  };
}
