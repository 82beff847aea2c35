import type { Command, InstallStep } from "../../types/command.js";
import type { SystemProfile } from "../../types/profile.js";
import type { PackageCommands } from "./interface.js";
import { elevate } from "./privilege.js";

/** Fedora/RHEL/CentOS command implementations, for dnf or the older yum. */
export class RHELCommands implements PackageCommands {
  readonly sudoGroup = "wheel";

  constructor(readonly manager: "dnf" | "yum", private readonly useSudo: boolean) {}

  private cmd(argv: string[]): Command {
    return { argv: elevate(argv, this.useSudo) };
  }

  refreshIndex(): Command { return this.cmd([this.manager, "makecache", "-y"]); }
  upgrade(): Command { return this.cmd([this.manager, this.manager === "dnf" ? "upgrade" : "update", "-y"]); }
  install(packages: string[]): Command { return this.cmd([this.manager, "install", "-y", ...packages]); }
  autoremove(): Command { return this.cmd([this.manager, "autoremove", "-y"]); }
  clean(): Command { return this.cmd([this.manager, "clean", "all"]); }

  basePackages(): string[] {
    return ["sudo", "curl", "git", "unzip", "nodejs", "npm", "jq", "wget", "gnupg2"];
  }

  devToolPackages(): string[] {
    return ["gcc", "gcc-c++", "make", "python3-pip", "htop", "tmux", "vim-enhanced", "tree"];
  }

  userCreate(username: string): Command {
    return this.cmd(["useradd", "-m", "-s", "/bin/bash", username]);
  }

  dockerSetup(profile: SystemProfile): InstallStep[] {
    const repoFile = `https://download.docker.com/linux/${profile.distro === "fedora" ? "fedora" : "centos"}/docker-ce.repo`;
    const addRepo = this.manager === "dnf"
      ? ["dnf", "config-manager", "--add-repo", repoFile]
      : ["yum-config-manager", "--add-repo", repoFile];
    return [
      { description: "Installing repository tooling",
        command: this.install([this.manager === "dnf" ? "dnf-plugins-core" : "yum-utils"]) },
      { description: "Adding the Docker repository", command: this.cmd(addRepo) },
      { description: "Installing Docker Engine",
        command: this.install(["docker-ce", "docker-ce-cli", "containerd.io", "docker-buildx-plugin", "docker-compose-plugin"]) },
    ];
  }
}
