import type { Command, InstallStep } from "../../types/command.js";
import type { PackageManager, SystemProfile } from "../../types/profile.js";

/**
 * Distro-specific command dispatch.
 * Installers call these methods to express intent; implementations translate them
 * into the package manager's own commands.
 */
export interface PackageCommands {
  readonly manager: PackageManager;
  /** Group granting sudo rights: `sudo` on Debian-likes, `wheel` elsewhere. */
  readonly sudoGroup: string;

  refreshIndex(): Command;
  upgrade(): Command;
  install(packages: string[]): Command;
  /** Null where the manager has no orphan removal. */
  autoremove(): Command | null;
  clean(): Command;

  basePackages(): string[];
  devToolPackages(): string[];

  userCreate(username: string): Command;

  /** Vendor repository setup followed by the engine and compose plugin install. */
  dockerSetup(profile: SystemProfile): InstallStep[];
}
