import { readFile } from "node:fs/promises";
import { machine } from "node:os";
import type { Logger } from "pino";
import type { DistroFamily, PackageManager, SystemProfile } from "../types/profile.js";
import type { Executor } from "../execution/executor.js";
import type { Reporter } from "../ui/reporter.js";
import { captureLine, commandExists } from "../execution/helpers.js";
import { PrerequisiteError } from "../shared/errors.js";

export const OS_RELEASE_PATH = "/etc/os-release";

interface FamilyRow {
  readonly family: Exclude<DistroFamily, "unknown">;
  readonly manager: PackageManager;
  readonly ids: readonly string[];
}

/** Distribution ids (and ID_LIKE tokens) per family. Checked by ID first, then ID_LIKE. */
const FAMILY_TABLE: readonly FamilyRow[] = [
  { family: "debian", manager: "apt", ids: ["debian", "ubuntu", "linuxmint", "pop", "raspbian", "kali", "elementary", "zorin"] },
  { family: "rhel", manager: "dnf", ids: ["fedora", "rhel", "centos", "rocky", "almalinux", "ol", "amzn"] },
  { family: "arch", manager: "pacman", ids: ["arch", "manjaro", "endeavouros", "garuda"] },
  { family: "suse", manager: "zypper", ids: ["opensuse", "opensuse-leap", "opensuse-tumbleweed", "sles", "suse"] },
];

export interface Resolution {
  readonly family: DistroFamily;
  readonly manager: PackageManager;
  readonly known: boolean;
}

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.trim().match(/^([A-Z0-9_]+)=(.*)$/);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Map a distribution id to its package manager. Unknown ids fall back to apt. */
export function resolvePackageManager(id: string, idLike: readonly string[]): Resolution {
  const byId = FAMILY_TABLE.find((row) => row.ids.includes(id));
  if (byId) return { family: byId.family, manager: byId.manager, known: true };
  const byLike = FAMILY_TABLE.find((row) => idLike.some((like) => row.ids.includes(like)));
  if (byLike) return { family: byLike.family, manager: byLike.manager, known: true };
  return { family: "unknown", manager: "apt", known: false };
}

export interface DetectorDeps {
  executor: Executor;
  logger: Logger;
  reporter?: Reporter;
  osReleasePath?: string;
  /** Config override for the resolved manager. */
  override?: PackageManager;
  isRoot?: boolean;
  arch?: string;
}

async function readOsRelease(path: string, logger: Logger): Promise<Record<string, string>> {
  try {
    return parseOsRelease(await readFile(path, "utf-8"));
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    logger.warn({ path }, "No os-release file — falling back to lsb_release/uname");
    return {};
  }
}

/**
 * Detect the distribution and resolve its package manager.
 * Runs once per process; the returned profile is frozen.
 */
export async function detectPlatform(deps: DetectorDeps): Promise<SystemProfile> {
  const { executor, logger, reporter } = deps;
  reporter?.step("Detecting Linux distribution...");

  const osRelease = await readOsRelease(deps.osReleasePath ?? OS_RELEASE_PATH, logger);
  let id = (osRelease.ID ?? "").toLowerCase();
  if (!id) id = (await captureLine(executor, ["lsb_release", "-si"]))?.toLowerCase() ?? "";
  if (!id) id = (await captureLine(executor, ["uname", "-s"]))?.toLowerCase() ?? "unknown";

  const idLike = (osRelease.ID_LIKE ?? "").toLowerCase().split(/\s+/).filter(Boolean);
  const resolution = resolvePackageManager(id, idLike);
  if (!resolution.known) {
    logger.warn({ id, idLike }, "Unknown distribution — defaulting to apt");
    reporter?.warn(`Unknown distribution: ${id}. Assuming apt...`);
  }

  let manager = deps.override ?? resolution.manager;
  if (deps.override) logger.info({ override: deps.override }, "Package manager overridden by config");
  if (manager === "dnf" && !(await commandExists(executor, "dnf")) && (await commandExists(executor, "yum"))) {
    manager = "yum";
  }
  if (!(await commandExists(executor, manager))) {
    throw new PrerequisiteError(`Package manager '${manager}' was resolved for '${id}' but is not installed`, { id, manager });
  }

  const ubuntuBased = id === "ubuntu" || idLike.includes("ubuntu");
  const profile: SystemProfile = Object.freeze({
    distro: id,
    name: osRelease.PRETTY_NAME ?? osRelease.NAME ?? id,
    version: osRelease.VERSION_ID ?? "unknown",
    codename: (ubuntuBased ? osRelease.UBUNTU_CODENAME : undefined) ?? osRelease.VERSION_CODENAME ?? null,
    id_like: Object.freeze(idLike),
    family: resolution.family,
    package_manager: manager,
    is_root: deps.isRoot ?? process.getuid?.() === 0,
    arch: deps.arch ?? machine(),
  });

  logger.info({ profile }, "Platform detection complete");
  reporter?.success(`Detected: ${id} with ${manager}`);
  return profile;
}
