import type { InstallResult } from "../types/result.js";
import type { ProvisionOutcome } from "../users/provisioner.js";
import type { Reporter } from "../ui/reporter.js";
import { sudoersFragmentPath } from "../users/sudoers.js";

export interface NotesInput {
  results: readonly InstallResult[];
  user: ProvisionOutcome | null;
  invokingUser: string;
  sudoersDir: string;
}

function succeeded(results: readonly InstallResult[], component: InstallResult["component"]): boolean {
  return results.some((r) => r.component === component && (r.status === "installed" || r.status === "already_present"));
}

/** What the operator still has to do by hand after the run. */
export function postInstallNotes(input: NotesInput): string[] {
  const notes: string[] = [];
  const user = input.user?.status === "configured" ? input.user : null;

  if (succeeded(input.results, "docker")) {
    notes.push("Log out and back in (or run 'newgrp docker') to use Docker without sudo");
  }
  if (user?.profileWritten) {
    notes.push("Reload the shell profile: source ~/.bashrc");
  }
  if (succeeded(input.results, "claude-cli")) {
    notes.push("Authenticate the Claude CLI: run 'claude' and follow the login prompt");
  }
  if (user && user.username !== input.invokingUser) {
    notes.push(`Switch to the new user: su - ${user.username}`);
  }
  if (user?.passwordlessSudo === "enabled") {
    notes.push(`'${user.username}' can run sudo without a password; delete ${sudoersFragmentPath(input.sudoersDir, user.username)} to revoke it`);
  }
  return notes;
}

export function printNotes(reporter: Reporter, notes: readonly string[]): void {
  if (notes.length === 0) return;
  reporter.heading("Next steps");
  notes.forEach((note, i) => reporter.line(`  ${i + 1}. ${note}`));
}
