// Config loader — reads ~/.config/devhost-setup/config.yaml and deep-merges it over defaults.
// On first run (no config file) the commented default YAML is written and firstRun is true.
// The merged document is validated with the zod schema in ./schema.ts; an invalid file
// is logged and the defaults are used instead.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import type { Logger } from "pino";
import { configSchema, type SetupConfig } from "./schema.js";

const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "devhost-setup", "config.yaml");

export const DEFAULT_CONFIG: SetupConfig = {
  network: {
    probe_urls: ["https://github.com", "https://deb.debian.org", "https://www.google.com"],
    probe_timeout_seconds: 5,
  },
  paths: {
    sudoers_dir: "/etc/sudoers.d",
    tools_dir: null,
    bin_dir: "/usr/local/bin",
  },
  commands: { timeout_seconds: 1800 },
  claude: { install_url: "https://claude.ai/install.sh" },
  docker: {
    compose_release_api: "https://api.github.com/repos/docker/compose/releases/latest",
    compose_download_base: "https://github.com/docker/compose/releases/download",
  },
  ai_tools: {
    repositories: [
      { name: "claude-flow", url: "https://github.com/ruvnet/claude-flow.git", description: "AI workflow automation" },
      { name: "Claude-Autopilot", url: "https://github.com/benbasha/Claude-Autopilot.git", description: "automated Claude interactions" },
    ],
  },
  system: { timezone: null },
  distro: {},
};

/** Default config YAML written on first run. */
export const DEFAULT_CONFIG_YAML = `# devhost-setup — Configuration
# Generated automatically on first run. All values shown are defaults.

network:
  # At least two hosts; the check passes when any of them answers.
  probe_urls:
    - https://github.com
    - https://deb.debian.org
    - https://www.google.com
  probe_timeout_seconds: 5

paths:
  sudoers_dir: /etc/sudoers.d
  # null = ~/ai-tools of the install user
  tools_dir: null
  bin_dir: /usr/local/bin

commands:
  timeout_seconds: 1800

claude:
  install_url: https://claude.ai/install.sh

docker:
  compose_release_api: https://api.github.com/repos/docker/compose/releases/latest
  compose_download_base: https://github.com/docker/compose/releases/download

ai_tools:
  repositories:
    - name: claude-flow
      url: https://github.com/ruvnet/claude-flow.git
      description: AI workflow automation
    - name: Claude-Autopilot
      url: https://github.com/benbasha/Claude-Autopilot.git
      description: automated Claude interactions

system:
  # Timezone applied by the system configuration component; null = ask
  timezone: null

# Package manager override (auto-detected if omitted)
distro: {}
#   package_manager: apt
`;

export interface ConfigResult {
  config: SetupConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(logger: Logger, explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found — generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = parseYaml(raw);
    const merged = deepMerge(DEFAULT_CONFIG, isRecord(parsed) ? parsed : {});
    const result = configSchema.safeParse(merged);
    if (!result.success) {
      logger.error({ configPath, issues: result.error.issues }, "Invalid config — using defaults");
      return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: false };
    }
    return { config: result.data, configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse config — using defaults");
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). Arrays are replaced, not merged. */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
