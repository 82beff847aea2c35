/** Identifiers of the installable components, in execution priority order. */
export const COMPONENT_ORDER = ["base", "docker", "claude-cli", "dev-tools", "system-config", "ai-tools"] as const;

export type ComponentId = (typeof COMPONENT_ORDER)[number];

export type InstallStatus = "installed" | "already_present" | "failed" | "skipped";

export interface InstallResult {
  readonly component: ComponentId;
  readonly status: InstallStatus;
  readonly message?: string;
  readonly version?: string | null;
}
