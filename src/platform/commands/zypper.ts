import type { Command, InstallStep } from "../../types/command.js";
import type { PackageCommands } from "./interface.js";
import { elevate } from "./privilege.js";

/** openSUSE/SLES command implementations. */
export class ZypperCommands implements PackageCommands {
  readonly manager = "zypper" as const;
  readonly sudoGroup = "wheel";

  constructor(private readonly useSudo: boolean) {}

  private cmd(argv: string[]): Command {
    return { argv: elevate(["zypper", "--non-interactive", ...argv], this.useSudo) };
  }

  refreshIndex(): Command { return this.cmd(["refresh"]); }
  upgrade(): Command { return this.cmd(["update"]); }
  install(packages: string[]): Command { return this.cmd(["install", ...packages]); }
  autoremove(): null { return null; }
  clean(): Command { return this.cmd(["clean", "--all"]); }

  basePackages(): string[] {
    return ["sudo", "curl", "git", "unzip", "nodejs", "npm", "jq", "wget", "gpg2"];
  }

  devToolPackages(): string[] {
    return ["gcc", "gcc-c++", "make", "python3-pip", "htop", "tmux", "vim", "tree"];
  }

  userCreate(username: string): Command {
    return { argv: elevate(["useradd", "-m", "-s", "/bin/bash", username], this.useSudo) };
  }

  dockerSetup(): InstallStep[] {
    return [{ description: "Installing Docker", command: this.install(["docker", "docker-compose"]) }];
  }
}
