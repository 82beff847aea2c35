import type { InstallContext } from "../context.js";
import type { InstallerRegistry } from "../components/registry.js";
import type { ComponentId } from "../types/result.js";
import type { SelectOption } from "../ui/prompter.js";

/** Multi-select over all components, recommended ones pre-selected. Returns ids in run order. */
export async function selectComponents(ctx: InstallContext, registry: InstallerRegistry): Promise<ComponentId[]> {
  const options: SelectOption<ComponentId>[] = [];
  for (const installer of registry.all()) {
    const installed = await installer.isInstalled(ctx);
    options.push({
      value: installer.id,
      label: installer.label,
      hint: installed ? `${installer.description} (installed)` : installer.description,
    });
  }
  const initial = registry.all().filter((i) => i.recommended).map((i) => i.id);
  const picked = await ctx.prompter.multiselect("Select components to install", options, initial);
  return registry.ordered(picked).map((i) => i.id);
}
