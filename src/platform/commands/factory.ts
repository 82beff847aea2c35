// Factory for distro-specific command adapters.
// Called once after detectPlatform(); the returned PackageCommands lives on the RunContext
// and is used by every installer. Adding a manager requires a new Commands class,
// a case here, and a row in the detector's family table.
import type { SystemProfile } from "../../types/profile.js";
import type { PackageCommands } from "./interface.js";
import { AptCommands } from "./apt.js";
import { RHELCommands } from "./rhel.js";
import { PacmanCommands } from "./pacman.js";
import { ZypperCommands } from "./zypper.js";

export function createPackageCommands(profile: SystemProfile): PackageCommands {
  const useSudo = !profile.is_root;
  switch (profile.package_manager) {
    case "apt": return new AptCommands(useSudo);
    case "dnf":
    case "yum": return new RHELCommands(profile.package_manager, useSudo);
    case "pacman": return new PacmanCommands(useSudo);
    case "zypper": return new ZypperCommands(useSudo);
  }
}
