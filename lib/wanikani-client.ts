// lib/wanikani-client.ts
import { RequestError, VocabError } from "./errors";
import { PagedFetcher, type PageSource, type RecordSchema } from "./paged-fetcher";
import { PageEnvelopeSchema, type PageEnvelope } from "./wanikani-schema";

export const WANIKANI_API_URL = "https://api.wanikani.com/v2";
const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface WaniKaniClientOptions {
  /** Personal API token, sent as a bearer credential */
  token: string;
  /** Defaults to WANIKANI_API_URL env, then the public v2 endpoint */
  baseUrl?: string;
  /** Per-request timeout; defaults to WANIKANI_TIMEOUT_MS env or 30s */
  timeoutMs?: number;
  /** Injected for tests */
  fetch?: FetchLike;
}

/**
 * Pick the credential from an explicit value or WANIKANI_API_TOKEN.
 * Throws a configuration error before any request can be made without one.
 */
export function resolveApiToken(explicit?: string | null): string {
  const token = explicit?.trim() || process.env.WANIKANI_API_TOKEN?.trim() || "";
  if (!token) {
    throw new VocabError("configuration");
  }
  return token;
}

function timeoutFromEnv(): number {
  const raw = Number(process.env.WANIKANI_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS) || DEFAULT_TIMEOUT_MS;
  return Math.min(120_000, Math.max(1_000, raw));
}

/**
 * One client per process; every call site that talks to WaniKani receives it explicitly.
 * Headers are rebuilt per request so no mutable state is shared between calls.
 */
export class WaniKaniClient implements PageSource {
  readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: WaniKaniClientOptions) {
    const token = options.token.trim();
    if (!token) {
      throw new VocabError("configuration");
    }
    this.token = token;
    this.baseUrl = (options.baseUrl ?? process.env.WANIKANI_API_URL ?? WANIKANI_API_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? timeoutFromEnv();
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  url(path: string): string {
    return `${this.baseUrl}/${path.replace(/^\/+/, "")}`;
  }

  paginate<T>(url: string, schema: RecordSchema<T>): PagedFetcher<T> {
    return new PagedFetcher(this, url, schema);
  }

  /**
   * GET one page. 5xx, timeouts and connection failures mean the endpoint is down;
   * other non-2xx statuses are request errors. Aborts from `signal` propagate as-is.
   */
  async getPage(url: string, signal?: AbortSignal): Promise<PageEnvelope> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let status: number;
    let statusText: string;
    let body: string;
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: "application/json",
        },
        signal: combined,
      });
      status = response.status;
      statusText = response.statusText;
      body = await response.text();
    } catch (err) {
      if (signal?.aborted) throw err;
      const reason = timeout.aborted ? "timeout" : "network";
      console.warn("[wanikani] endpoint-down", { url, reason });
      throw new VocabError("endpoint-down", `${reason}: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (status >= 500) {
      console.warn("[wanikani] endpoint-down", { url, status });
      throw new VocabError("endpoint-down", body || `HTTP ${status}`);
    }
    if (status < 200 || status >= 300) {
      console.error("[wanikani] request-error", { url, status });
      throw new RequestError(status, url, body || statusText);
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new Error(`WaniKani returned non-JSON body for ${url}`);
    }
    const parsed = PageEnvelopeSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`WaniKani returned an unexpected page envelope for ${url}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
