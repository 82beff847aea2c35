import { z } from "zod";
import type { Logger } from "pino";
import type { HttpClient } from "./http.js";
import { errorMessage } from "../shared/errors.js";

const releaseSchema = z.object({ tag_name: z.string().min(1) });

/**
 * Resolve the tag of the latest release from a GitHub-style release API.
 * Null when the API is unreachable or answers without a usable tag.
 */
export async function resolveLatestTag(http: HttpClient, apiUrl: string, timeoutMs: number, logger: Logger): Promise<string | null> {
  try {
    const parsed = releaseSchema.safeParse(await http.getJson(apiUrl, timeoutMs));
    if (!parsed.success) {
      logger.warn({ apiUrl, issues: parsed.error.issues }, "Release API answered without tag_name");
      return null;
    }
    return parsed.data.tag_name;
  } catch (err) {
    logger.warn({ apiUrl, error: errorMessage(err) }, "Release API lookup failed");
    return null;
  }
}
