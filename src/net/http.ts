/** Minimal HTTP surface used for connectivity probes and release lookups. */
export interface HttpClient {
  /** Resolves with the status code of any HTTP answer; rejects on network failure or timeout. */
  head(url: string, timeoutMs: number): Promise<number>;
  getJson(url: string, timeoutMs: number): Promise<unknown>;
}

export class FetchHttpClient implements HttpClient {
  constructor(private readonly userAgent: string) {}

  async head(url: string, timeoutMs: number): Promise<number> {
    const res = await fetch(url, {
      method: "HEAD",
      redirect: "manual",
      headers: { "User-Agent": this.userAgent },
      signal: AbortSignal.timeout(timeoutMs),
    });
    return res.status;
  }

  async getJson(url: string, timeoutMs: number): Promise<unknown> {
    const res = await fetch(url, {
      headers: { Accept: "application/vnd.github+json", "User-Agent": this.userAgent },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!res.ok) throw new Error(`HTTP ${res.status} from ${url}`);
    return res.json();
  }
}
