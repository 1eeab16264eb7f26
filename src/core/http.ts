import { FetchError } from "./errors.js";
import { VERSION } from "../version.js";

const USER_AGENT = `ipmentions/${VERSION}`;
const DEFAULT_MIN_DELAY_MS = 1000;
const REQUEST_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 3;

export interface HttpClientOptions {
  /** Minimum gap between two requests, in ms */
  minDelayMs?: number;
  timeoutMs?: number;
  maxRetries?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Rate-limited HTTP client with timeout and exponential backoff.
 * Retries network errors, 429 and 5xx; any other non-2xx status fails at once.
 */
export class HttpClient {
  private lastRequestAt = 0;
  private readonly minDelayMs: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: HttpClientOptions = {}) {
    this.minDelayMs = options.minDelayMs ?? DEFAULT_MIN_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async getText(url: string, params: Record<string, string> = {}): Promise<string> {
    const response = await this.request(withParams(url, params));
    return response.text();
  }

  async getJson(url: string, params: Record<string, string> = {}): Promise<unknown> {
    const response = await this.request(withParams(url, params));
    try {
      return await response.json();
    } catch (err) {
      throw new FetchError(`Invalid JSON from ${url}`, { cause: err });
    }
  }

  private async rateLimit(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestAt;
    if (elapsed < this.minDelayMs) {
      await this.sleep(this.minDelayMs - elapsed);
    }
    this.lastRequestAt = Date.now();
  }

  private async request(url: string): Promise<Response> {
    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      await this.rateLimit();

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: { "User-Agent": USER_AGENT, Accept: "*/*" },
          redirect: "follow",
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        if (attempt < this.maxRetries) {
          const backoffMs = Math.pow(2, attempt + 1) * 1000;
          console.warn(
            `  Fetch error on ${url}: ${err instanceof Error ? err.message : String(err)}, ` +
              `backing off ${backoffMs}ms (attempt ${attempt + 1}/${this.maxRetries})`
          );
          await this.sleep(backoffMs);
          continue;
        }
        throw new FetchError(`Failed to fetch ${url}`, { cause: err });
      }

      if (response.ok) return response;

      const retryable = response.status === 429 || response.status >= 500;
      if (retryable && attempt < this.maxRetries) {
        const backoffMs = Math.pow(2, attempt + 1) * 1000;
        console.warn(
          `  HTTP ${response.status} on ${url}, backing off ${backoffMs}ms ` +
            `(attempt ${attempt + 1}/${this.maxRetries})`
        );
        await this.sleep(backoffMs);
        continue;
      }

      throw new FetchError(`HTTP ${response.status} ${response.statusText} from ${url}`, {
        status: response.status,
      });
    }

    throw new FetchError(`Failed to fetch ${url}`);
  }
}

function withParams(url: string, params: Record<string, string>): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}
