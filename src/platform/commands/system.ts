import type { Command } from "../../types/command.js";
import { elevate } from "./privilege.js";

/**
 * Distro-independent system commands: accounts, groups, files and services.
 * Mutating commands are elevated with sudo unless the run is already root.
 */
export class SystemCommands {
  constructor(private readonly useSudo: boolean) {}

  private priv(argv: string[], extra: Omit<Command, "argv"> = {}): Command {
    return { argv: elevate(argv, this.useSudo), ...extra };
  }

  // Accounts and groups

  userExists(username: string): Command { return { argv: ["id", "-u", username] }; }
  passwdEntry(username: string): Command { return { argv: ["getent", "passwd", username] }; }
  userGroups(username: string): Command { return { argv: ["id", "-nG", username] }; }
  groupExists(group: string): Command { return { argv: ["getent", "group", group] }; }
  groupAdd(group: string): Command { return this.priv(["groupadd", group]); }

  /** `usermod -aG` is additive: existing memberships are kept. */
  addToGroups(username: string, groups: string[]): Command {
    return this.priv(["usermod", "-aG", groups.join(","), username]);
  }

  setPassword(username: string, password: string): Command {
    return this.priv(["chpasswd"], { stdin: `${username}:${password}\n` });
  }

  // Files

  writeFile(path: string, content: string): Command { return this.priv(["tee", path], { stdin: content }); }
  readFile(path: string): Command { return this.priv(["cat", path]); }
  fileExists(path: string): Command { return this.priv(["test", "-f", path]); }
  dirExists(path: string): Command { return this.priv(["test", "-d", path]); }
  remove(path: string): Command { return this.priv(["rm", "-f", path]); }
  chmod(mode: string, path: string): Command { return this.priv(["chmod", mode, path]); }
  chown(owner: string, paths: string[]): Command { return this.priv(["chown", owner, ...paths]); }
  mkdir(paths: string[]): Command { return this.priv(["mkdir", "-p", ...paths]); }
  copy(source: string, destination: string): Command { return this.priv(["cp", source, destination]); }
  download(url: string, destination: string): Command { return this.priv(["curl", "-fsSL", url, "-o", destination]); }

  visudoCheck(path: string): Command { return this.priv(["visudo", "-c", "-f", path]); }

  setTimezone(timezone: string): Command { return this.priv(["timedatectl", "set-timezone", timezone]); }

  /** Debian's interactive package reconfiguration (tzdata, locales). */
  reconfigure(pkg: string): Command { return this.priv(["dpkg-reconfigure", pkg], { interactive: true }); }

  service(action: "start" | "stop" | "enable" | "restart", unit: string): Command {
    return this.priv(["systemctl", action, unit]);
  }

  /**
   * Run argv as another account. Null or the current account runs it unchanged.
   */
  asUser(user: string | null, currentUser: string, argv: string[], cwd?: string): Command {
    if (user === null || user === currentUser) return { argv, cwd };
    return { argv: ["sudo", "-u", user, "-H", ...argv], cwd };
  }
}
