import type { Logger } from "pino";
import { aiTools } from "./ai-tools.js";
import { basePackages } from "./base-packages.js";
import { claudeCli } from "./claude-cli.js";
import { devTools } from "./dev-tools.js";
import { docker } from "./docker.js";
import { InstallerRegistry } from "./registry.js";
import { systemConfig } from "./system-config.js";

export function createDefaultRegistry(logger: Logger): InstallerRegistry {
  const registry = new InstallerRegistry(logger);
  for (const installer of [basePackages, docker, claudeCli, devTools, systemConfig, aiTools]) {
    registry.register(installer);
  }
  return registry;
}
