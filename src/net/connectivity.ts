import type { Logger } from "pino";
import type { HttpClient } from "./http.js";
import { errorMessage } from "../shared/errors.js";

export interface ConnectivityReport {
  /** First URL that answered, or null when none did. */
  readonly reachable: string | null;
  readonly failed: readonly string[];
}

/**
 * Probe the URLs in order and stop at the first HTTP answer of any status.
 * Several hosts keep one unreachable site from failing the whole check.
 */
export async function probeConnectivity(http: HttpClient, urls: readonly string[], timeoutMs: number, logger: Logger): Promise<ConnectivityReport> {
  const failed: string[] = [];
  for (const url of urls) {
    try {
      const status = await http.head(url, timeoutMs);
      logger.debug({ url, status }, "Connectivity probe answered");
      return { reachable: url, failed };
    } catch (err) {
      logger.debug({ url, error: errorMessage(err) }, "Connectivity probe failed");
      failed.push(url);
    }
  }
  return { reachable: null, failed };
}
