import type { Command, InstallStep } from "../../types/command.js";
import type { PackageCommands } from "./interface.js";
import { elevate } from "./privilege.js";

/** Arch/Manjaro command implementations. */
export class PacmanCommands implements PackageCommands {
  readonly manager = "pacman" as const;
  readonly sudoGroup = "wheel";

  constructor(private readonly useSudo: boolean) {}

  private cmd(argv: string[]): Command {
    return { argv: elevate(argv, this.useSudo) };
  }

  refreshIndex(): Command { return this.cmd(["pacman", "-Sy", "--noconfirm"]); }
  upgrade(): Command { return this.cmd(["pacman", "-Syu", "--noconfirm"]); }
  install(packages: string[]): Command { return this.cmd(["pacman", "-S", "--noconfirm", "--needed", ...packages]); }
  autoremove(): null { return null; }
  clean(): Command { return this.cmd(["pacman", "-Sc", "--noconfirm"]); }

  basePackages(): string[] {
    return ["sudo", "curl", "git", "unzip", "nodejs", "npm", "jq", "wget", "gnupg"];
  }

  devToolPackages(): string[] {
    return ["base-devel", "python-pip", "htop", "tmux", "vim", "tree"];
  }

  userCreate(username: string): Command {
    return this.cmd(["useradd", "-m", "-s", "/bin/bash", username]);
  }

  dockerSetup(): InstallStep[] {
    return [{ description: "Installing Docker", command: this.install(["docker", "docker-compose"]) }];
  }
}
