import { join } from "node:path";
import type { InstallContext } from "../context.js";
import { run } from "../execution/helpers.js";
import { resolveLatestTag } from "../net/releases.js";

/** Release asset name of the standalone Compose binary for a `uname -m` value. */
export function composeAssetName(machine: string): string {
  const arch = machine === "armv7l" ? "armv7" : machine === "armv6l" ? "armv6" : machine;
  return `docker-compose-linux-${arch}`;
}

/** `docker-compose` compatible entry point that prefers the plugin form. */
export function renderComposeWrapper(binDir: string): string {
  return `#!/bin/sh
# Prefer the Compose plugin; fall back to the standalone binary.
if docker compose version >/dev/null 2>&1; then
    exec docker compose "$@"
fi
exec ${join(binDir, "docker-compose")} "$@"
`;
}

/**
 * Download the latest standalone Compose binary and install the wrapper next to it.
 * Every failure is a warning: the plugin installed with Docker keeps working.
 * Returns the installed tag, or null.
 */
export async function installComposeStandalone(ctx: InstallContext): Promise<string | null> {
  const { config, reporter, system } = ctx;
  reporter.step("Installing Docker Compose standalone...");

  const tag = await resolveLatestTag(ctx.http, config.docker.compose_release_api, config.network.probe_timeout_seconds * 1000, ctx.logger);
  if (tag === null) {
    reporter.warn("Could not determine the latest Docker Compose release; 'docker compose' remains available");
    return null;
  }

  const binary = join(config.paths.bin_dir, "docker-compose");
  const url = `${config.docker.compose_download_base}/${tag}/${composeAssetName(ctx.profile.arch)}`;
  const downloaded = await run(ctx, system.download(url, binary), { stream: true });
  if (downloaded.exitCode !== 0) {
    reporter.warn(`Downloading Docker Compose ${tag} failed; 'docker compose' remains available`);
    return null;
  }
  await run(ctx, system.chmod("755", binary));

  const wrapper = join(config.paths.bin_dir, "docker-compose-wrapper");
  const written = await run(ctx, system.writeFile(wrapper, renderComposeWrapper(config.paths.bin_dir)));
  if (written.exitCode === 0) await run(ctx, system.chmod("755", wrapper));
  else reporter.warn(`Could not write ${wrapper}`);

  reporter.success(`Docker Compose ${tag} installed`);
  return tag;
}
