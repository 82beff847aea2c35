import type { InstallContext } from "../context.js";
import type { ComponentId, InstallResult } from "../types/result.js";

/**
 * One selectable component. install() reports success or "already present" as a
 * result and raises InstallFailure for anything that went wrong.
 */
export interface Installer {
  readonly id: ComponentId;
  readonly label: string;
  readonly description: string;
  /** Pre-selected in the component menu. */
  readonly recommended: boolean;
  isInstalled(ctx: InstallContext): Promise<boolean>;
  install(ctx: InstallContext): Promise<InstallResult>;
}
