/** Package manager resolved from the distribution. */
export type PackageManager = "apt" | "dnf" | "yum" | "pacman" | "zypper";

export const PACKAGE_MANAGERS = ["apt", "dnf", "yum", "pacman", "zypper"] as const satisfies readonly PackageManager[];

/** Distribution family the package manager was resolved from. */
export type DistroFamily = "debian" | "rhel" | "arch" | "suse" | "unknown";

/**
 * Immutable description of the machine being provisioned.
 * Computed once by the platform detector and consumed by every later stage.
 */
export interface SystemProfile {
  /** Lower-cased distribution id (`ubuntu`, `fedora`, `arch`, ...). */
  readonly distro: string;
  readonly name: string;
  readonly version: string;
  readonly codename: string | null;
  readonly id_like: readonly string[];
  readonly family: DistroFamily;
  readonly package_manager: PackageManager;
  readonly is_root: boolean;
  /** Machine hardware name as reported by `uname -m`. */
  readonly arch: string;
}
