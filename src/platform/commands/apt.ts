import type { Command, InstallStep } from "../../types/command.js";
import type { SystemProfile } from "../../types/profile.js";
import type { PackageCommands } from "./interface.js";
import { elevate } from "./privilege.js";

const KEYRING = "/etc/apt/keyrings/docker.gpg";
const DOCKER_LIST = "/etc/apt/sources.list.d/docker.list";

/** Debian architecture name for a `uname -m` value. */
export function debianArch(machine: string): string {
  switch (machine) {
    case "x86_64": return "amd64";
    case "aarch64": return "arm64";
    case "armv7l": return "armhf";
    case "i686":
    case "i386": return "i386";
    default: return machine;
  }
}

/** Docker publishes repositories for ubuntu, debian and raspbian only. */
export function dockerRepoDistro(profile: SystemProfile): string {
  if (["ubuntu", "debian", "raspbian"].includes(profile.distro)) return profile.distro;
  return profile.id_like.includes("ubuntu") ? "ubuntu" : "debian";
}

/** Debian/Ubuntu command implementations. */
export class AptCommands implements PackageCommands {
  readonly manager = "apt" as const;
  readonly sudoGroup = "sudo";
  private readonly env = { DEBIAN_FRONTEND: "noninteractive" };

  constructor(private readonly useSudo: boolean) {}

  private cmd(argv: string[]): Command {
    return { argv: elevate(argv, this.useSudo, this.env), env: this.env };
  }

  refreshIndex(): Command { return this.cmd(["apt", "update", "-y"]); }
  upgrade(): Command { return this.cmd(["apt", "upgrade", "-y"]); }
  install(packages: string[]): Command { return this.cmd(["apt", "install", "-y", ...packages]); }
  autoremove(): Command { return this.cmd(["apt", "autoremove", "-y"]); }
  clean(): Command { return this.cmd(["apt", "autoclean"]); }

  basePackages(): string[] {
    return ["sudo", "curl", "git", "unzip", "nodejs", "npm", "jq", "wget", "gnupg2", "software-properties-common", "apt-transport-https", "ca-certificates", "lsb-release"];
  }

  devToolPackages(): string[] {
    return ["build-essential", "python3-pip", "htop", "tmux", "vim", "tree"];
  }

  userCreate(username: string): Command {
    return { argv: elevate(["adduser", "--disabled-password", "--gecos", "", username], this.useSudo) };
  }

  dockerSetup(profile: SystemProfile): InstallStep[] {
    const repo = `https://download.docker.com/linux/${dockerRepoDistro(profile)}`;
    // Without VERSION_CODENAME in os-release, lsb_release answers at run time.
    const codename = profile.codename ?? "$(lsb_release -cs)";
    const line = `deb [arch=${debianArch(profile.arch)} signed-by=${KEYRING}] ${repo} ${codename} stable`;
    return [
      { description: "Removing legacy Docker packages", optional: true,
        command: this.cmd(["apt", "remove", "-y", "docker", "docker-engine", "docker.io", "containerd", "runc"]) },
      { description: "Creating the apt keyring directory",
        command: { argv: elevate(["install", "-m", "0755", "-d", "/etc/apt/keyrings"], this.useSudo) } },
      { description: "Adding Docker's official GPG key",
        command: { argv: elevate(["bash", "-c", `curl -fsSL ${repo}/gpg | gpg --dearmor --yes -o ${KEYRING}`], this.useSudo) } },
      { description: "Making the key readable",
        command: { argv: elevate(["chmod", "a+r", KEYRING], this.useSudo) } },
      { description: "Adding the Docker repository",
        command: { argv: elevate(["bash", "-c", `echo "${line}" > ${DOCKER_LIST}`], this.useSudo) } },
      { description: "Updating package lists", command: this.refreshIndex() },
      { description: "Installing Docker Engine",
        command: this.install(["docker-ce", "docker-ce-cli", "containerd.io", "docker-buildx-plugin", "docker-compose-plugin"]) },
    ];
  }
}
