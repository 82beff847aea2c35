import { join } from "node:path";
import type { RunContext } from "../context.js";
import type { PackageManager } from "../types/profile.js";
import { run, runOrThrow, succeeds } from "../execution/helpers.js";
import { InstallFailure } from "../shared/errors.js";

export const BLOCK_START = "# >>> devhost-setup managed block >>>";
export const BLOCK_END = "# <<< devhost-setup managed block <<<";

const SYSTEM_ALIASES: Record<PackageManager, { update: string; install: string; search: string }> = {
  apt: { update: "sudo apt update && sudo apt upgrade", install: "sudo apt install", search: "apt search" },
  dnf: { update: "sudo dnf upgrade", install: "sudo dnf install", search: "dnf search" },
  yum: { update: "sudo yum update", install: "sudo yum install", search: "yum search" },
  pacman: { update: "sudo pacman -Syu", install: "sudo pacman -S", search: "pacman -Ss" },
  zypper: { update: "sudo zypper refresh && sudo zypper update", install: "sudo zypper install", search: "zypper search" },
};

/** Body of the managed block: PATH, aliases and the welcome line. */
export function renderProfileBody(manager: PackageManager): string {
  const sys = SYSTEM_ALIASES[manager];
  return `export PATH="$HOME/bin:$HOME/.local/bin:/usr/local/bin:$PATH"

# Useful aliases
alias ll='ls -alF'
alias la='ls -A'
alias l='ls -CF'
alias ..='cd ..'
alias ...='cd ../..'
alias grep='grep --color=auto'
alias h='history'
alias c='clear'

# Docker aliases
alias dps='docker ps'
alias dpa='docker ps -a'
alias di='docker images'
alias dc='docker compose'
alias dcu='docker compose up -d'
alias dcd='docker compose down'
alias dcl='docker compose logs -f'

# Git aliases
alias gs='git status'
alias ga='git add'
alias gc='git commit'
alias gp='git push'
alias gl='git pull'
alias gb='git branch'
alias gco='git checkout'

# System aliases
alias update='${sys.update}'
alias install='${sys.install}'
alias search='${sys.search}'

# Claude CLI alias (if installed)
if command -v claude >/dev/null 2>&1; then
    alias cc='claude'
fi

case $- in
    *i*) echo "Development environment ready! Type 'claude --help' to get started with AI assistance." ;;
esac`;
}

/**
 * Insert the managed block, replacing an earlier copy in place. A start marker
 * without its end marker claims everything after it.
 */
export function upsertManagedBlock(existing: string, body: string): string {
  const block = `${BLOCK_START}\n${body}\n${BLOCK_END}`;
  const start = existing.indexOf(BLOCK_START);
  if (start !== -1) {
    const end = existing.indexOf(BLOCK_END, start);
    const tail = end === -1 ? "\n" : existing.slice(end + BLOCK_END.length);
    return existing.slice(0, start) + block + (tail.startsWith("\n") ? tail : `\n${tail}`);
  }
  if (existing.length === 0) return `${block}\n`;
  const separator = existing.endsWith("\n") ? "\n" : "\n\n";
  return `${existing}${separator}${block}\n`;
}

export function countManagedBlocks(content: string): number {
  return content.split(BLOCK_START).length - 1;
}

/**
 * Prepare the user's home (standard directories, ~/.bashrc from /etc/skel) and
 * write the managed block into ~/.bashrc.
 */
export async function writeShellProfile(ctx: RunContext, username: string, home: string): Promise<void> {
  const component = "user";
  ctx.reporter.step(`Setting up environment for user '${username}'...`);

  const dirs = [".ssh", ".config", "bin", "projects"].map((d) => join(home, d));
  await runOrThrow(ctx, component, ctx.system.mkdir(dirs), { stream: false });

  const bashrc = join(home, ".bashrc");
  let present = await succeeds(ctx.executor, ctx.system.fileExists(bashrc));
  if (!present) {
    const copied = await run(ctx, ctx.system.copy("/etc/skel/.bashrc", bashrc));
    present = copied.exitCode === 0;
    if (!present) ctx.logger.info({ bashrc }, "No /etc/skel/.bashrc — starting from an empty profile");
  }

  let existing = "";
  if (present) {
    // A profile that exists but cannot be read is left alone.
    const current = await run(ctx, ctx.system.readFile(bashrc));
    if (current.exitCode !== 0) {
      throw new InstallFailure(component, `Could not read ${bashrc}; the profile was left unchanged`, {
        remediation: [`Add the devhost-setup block to ${bashrc} by hand or re-run the setup`],
        context: { exitCode: current.exitCode, stderr: current.stderr.trim() },
      });
    }
    existing = current.stdout;
  }
  const updated = upsertManagedBlock(existing, renderProfileBody(ctx.profile.package_manager));
  if (updated !== existing) {
    await runOrThrow(ctx, component, ctx.system.writeFile(bashrc, updated), { stream: false });
  }

  await runOrThrow(ctx, component, ctx.system.chown(`${username}:`, [...dirs, bashrc]), { stream: false });
  await run(ctx, ctx.system.chmod("700", join(home, ".ssh")));
  ctx.reporter.success(`Environment setup completed for '${username}'`);
}
