export type VocabErrorKind = "endpoint-down" | "no-activity" | "no-vocabulary" | "configuration";

const MESSAGES: Record<VocabErrorKind, string> = {
  "endpoint-down": "WaniKani endpoint is down",
  "no-activity": "No recent reviews found",
  "no-vocabulary": "No vocabulary among those reviews",
  configuration: "API token required via --api-token or WANIKANI_API_TOKEN env var",
};

export class VocabError extends Error {
  readonly kind: VocabErrorKind;
  readonly detail?: string;

  constructor(kind: VocabErrorKind, detail?: string, message = MESSAGES[kind]) {
    super(message);
    this.name = "VocabError";
    this.kind = kind;
    this.detail = detail;
  }
}

/**
 * A non-retryable HTTP failure (4xx): bad request, bad credential, unknown resource.
 */
export class RequestError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, detail?: string) {
    super(`HTTP ${status}${detail ? `: ${detail}` : ""}`);
    this.name = "RequestError";
    this.status = status;
    this.url = url;
  }
}

export function isVocabError(err: unknown, kind?: VocabErrorKind): err is VocabError {
  return err instanceof VocabError && (kind === undefined || err.kind === kind);
}

export function describeVocabError(kind: VocabErrorKind): string {
  return MESSAGES[kind];
}
