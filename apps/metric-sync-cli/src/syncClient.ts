import { MetricSyncError, type SyncDocument } from "@metric-sync/core";
import { DEFAULT_BASE_URL, DEFAULT_MAX_RETRIES } from "./config.js";

export const METRICS_SYNC_PATH = "/api/v1/metrics/sync";
export const AUTH_HEADER = "X-Eppo-Token";
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

export type SyncResponse = Record<string, unknown>;

export class RemoteSyncError extends MetricSyncError {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly responseText: string | null,
    public readonly retryable: boolean,
  ) {
    super("REMOTE_SYNC", message, { status, responseText });
    this.name = "RemoteSyncError";
  }
}

export type MetricSyncClientOptions = {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  maxRetries?: number;
  /** Base delay for exponential backoff between attempts. */
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Pick<Console, "warn">;
};

export class MetricSyncClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Pick<Console, "warn">;

  constructor(options: MetricSyncClientOptions) {
    if (!options.apiKey) {
      throw new RemoteSyncError("Metric sync client requires an API key", null, null, false);
    }
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch.bind(globalThis);
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.logger = options.logger ?? console;
  }

  get endpoint(): string {
    return `${this.baseUrl}${METRICS_SYNC_PATH}`;
  }

  /**
   * Submits the document in one request. Network failures and transient statuses are
   * retried with exponential backoff; everything else surfaces immediately.
   */
  async syncDocument(document: SyncDocument): Promise<SyncResponse> {
    const body = JSON.stringify(document);
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await this.post(body);
      } catch (error) {
        if (!(error instanceof RemoteSyncError) || !error.retryable || attempt >= this.maxRetries) {
          throw error;
        }
        const delay = this.retryDelayMs * 2 ** attempt;
        this.logger.warn(
          `[metric-sync.cli] sync attempt ${attempt + 1} failed (${error.message}); retrying in ${delay}ms`,
        );
        await this.sleep(delay);
      }
    }
  }

  private async post(body: string): Promise<SyncResponse> {
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          [AUTH_HEADER]: this.apiKey,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body,
      });
      // the body can still fail to stream after the headers arrive
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RemoteSyncError(`Network error contacting ${this.endpoint}: ${reason}`, null, null, true);
    }

    if (!response.ok) {
      throw new RemoteSyncError(
        `Metric sync request to ${this.endpoint} failed with HTTP ${response.status}`,
        response.status,
        text,
        RETRYABLE_STATUSES.has(response.status),
      );
    }
    if (response.status === 204 || text.trim() === "") {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new RemoteSyncError(
        `Metric sync endpoint returned a non-JSON body (HTTP ${response.status})`,
        response.status,
        text,
        false,
      );
    }
    return isRecord(parsed) ? parsed : { result: parsed };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
