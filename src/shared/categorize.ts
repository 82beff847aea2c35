// Failure categorization for external commands. The pattern table is matched in order
// against lower-cased stderr; the first hit decides the code and the remediation hints
// printed next to the error. Add new patterns above the network entry.
import type { SystemProfile } from "../types/profile.js";

export type FailureCode =
  | "PERMISSION_DENIED"
  | "PACKAGE_NOT_FOUND"
  | "RESOURCE_LOCKED"
  | "DEPENDENCY_CONFLICT"
  | "RESOURCE_EXHAUSTED"
  | "NETWORK_ERROR"
  | "COMMAND_NOT_FOUND"
  | "COMMAND_FAILED";

export interface FailureCategory {
  readonly code: FailureCode;
  readonly remediation: string[];
}

interface FailurePattern {
  test: (stderr: string) => boolean;
  code: FailureCode;
  remediation: (profile: SystemProfile) => string[];
}

const FAILURE_PATTERNS: FailurePattern[] = [
  { test: (s) => s.includes("permission denied") || s.includes("operation not permitted") || s.includes("a password is required") || s.includes("are you root?"),
    code: "PERMISSION_DENIED",
    remediation: (p) => [
      p.is_root ? "Check that the target path is writable" : "Re-run as root or from an account with sudo rights",
      "Run 'sudo -v' to refresh cached sudo credentials",
    ] },
  { test: (s) => s.includes("unable to locate package") || s.includes("no match for argument") || s.includes("target not found") || s.includes("no provider of"),
    code: "PACKAGE_NOT_FOUND",
    remediation: (p) => [`Check that the package exists in the ${p.package_manager} repositories of ${p.name}`] },
  { test: (s) => s.includes("could not get lock") || s.includes("dpkg frontend lock") || s.includes("rpm.lock") || s.includes("unable to lock database") || s.includes("system management is locked"),
    code: "RESOURCE_LOCKED",
    remediation: () => ["Another package manager process is running", "Wait for it to finish, then re-run the setup"] },
  { test: (s) => s.includes("unmet dependencies") || s.includes("dependency problems") || s.includes("depsolve error") || s.includes("conflicting packages"),
    code: "DEPENDENCY_CONFLICT",
    remediation: () => ["Review the dependency conflict in the log file", "Resolve held or conflicting packages manually"] },
  { test: (s) => s.includes("no space left on device") || s.includes("cannot allocate memory"),
    code: "RESOURCE_EXHAUSTED",
    remediation: () => ["Free disk space (package caches, old logs) and re-run"] },
  { test: (s) => s.includes("command not found") || s.includes("enoent"),
    code: "COMMAND_NOT_FOUND",
    remediation: () => ["Install the missing program or select the base packages component"] },
  { test: (s) => s.includes("could not resolve") || s.includes("failed to fetch") || s.includes("connection timed out") || s.includes("network is unreachable") || s.includes("temporary failure in name resolution"),
    code: "NETWORK_ERROR",
    remediation: () => ["Check network connectivity and DNS resolution", "Retry once the network is reachable"] },
];

export function categorizeFailure(stderr: string, profile: SystemProfile): FailureCategory {
  const lowered = stderr.toLowerCase();
  for (const p of FAILURE_PATTERNS) {
    if (p.test(lowered)) {
      return { code: p.code, remediation: p.remediation(profile) };
    }
  }
  return { code: "COMMAND_FAILED", remediation: ["Review the command output in the log file for the specific error"] };
}
