import type { Logger } from "pino";
import { COMPONENT_ORDER, type ComponentId } from "../types/result.js";
import type { Installer } from "./types.js";

/**
 * Installer registry — the orchestrator reads the menu and the run order from here.
 * Order is always COMPONENT_ORDER, never registration or selection order.
 */
export class InstallerRegistry {
  private readonly installers = new Map<ComponentId, Installer>();

  constructor(private readonly logger: Logger) {}

  register(installer: Installer): void {
    if (this.installers.has(installer.id)) {
      this.logger.warn({ component: installer.id }, "Duplicate installer registration — overwriting");
    }
    this.installers.set(installer.id, installer);
  }

  get(id: ComponentId): Installer | undefined {
    return this.installers.get(id);
  }

  /** All installers in priority order. */
  all(): Installer[] {
    return this.ordered(COMPONENT_ORDER);
  }

  /** Selected installers in priority order; unknown ids are dropped. */
  ordered(selection: readonly ComponentId[]): Installer[] {
    const picked = new Set(selection);
    return COMPONENT_ORDER.filter((id) => picked.has(id))
      .map((id) => this.installers.get(id))
      .filter((installer): installer is Installer => installer !== undefined);
  }

  get size(): number {
    return this.installers.size;
  }
}
