import { z } from "zod";
import { PACKAGE_MANAGERS } from "../types/profile.js";

const repositorySchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9._-]+$/, "Repository name must be a plain directory name"),
  url: z.string().url(),
  description: z.string(),
});

/** Shape of config.yaml after merging over the defaults. */
export const configSchema = z.object({
  network: z.object({
    probe_urls: z.array(z.string().url()).min(2, "Configure at least two connectivity probe URLs"),
    probe_timeout_seconds: z.number().positive(),
  }),
  paths: z.object({
    sudoers_dir: z.string().min(1),
    tools_dir: z.string().min(1).nullable(),
    bin_dir: z.string().min(1),
  }),
  commands: z.object({
    timeout_seconds: z.number().int().positive(),
  }),
  claude: z.object({
    install_url: z.string().url(),
  }),
  docker: z.object({
    compose_release_api: z.string().url(),
    compose_download_base: z.string().url(),
  }),
  ai_tools: z.object({
    repositories: z.array(repositorySchema),
  }),
  system: z.object({
    timezone: z.string().min(1).nullable(),
  }),
  distro: z.object({
    package_manager: z.enum(PACKAGE_MANAGERS).optional(),
  }),
});

export type SetupConfig = z.infer<typeof configSchema>;
export type ToolRepository = z.infer<typeof repositorySchema>;
