import type { RetryPolicy } from "@/sync/config/env";
import { errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import type { Batch, DispatchResult, WebhookReceipt } from "@/sync/types";
import { webhookReceiptSchema, type WebhookCredentials } from "@/sync/types/api";
import { backoffDelay, sleep as defaultSleep, type Sleep } from "./retry";

const log = createChildLogger("webhook-client");

export interface WebhookSettings extends WebhookCredentials {
  requestTimeoutMs: number;
}

export interface WebhookClientOptions {
  fetch?: typeof fetch;
  sleep?: Sleep;
  random?: () => number;
}

/** Anything that can deliver a batch and report how it went. */
export interface BatchDispatcher {
  send(batch: Batch, signal?: AbortSignal): Promise<DispatchResult>;
}

type AttemptResult = Omit<DispatchResult, "attemptCount">;

/**
 * Delivers batches to `POST {baseUrl}/webhook`. 5xx responses and transport
 * failures are retried with exponential backoff; any 4xx is returned as fatal
 * on the first attempt.
 */
export class WebhookClient implements BatchDispatcher {
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(
    private readonly settings: WebhookSettings,
    private readonly retry: RetryPolicy,
    options: WebhookClientOptions = {},
  ) {
    this.url = `${settings.baseUrl.replace(/\/+$/, "")}/webhook`;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async send(batch: Batch, signal?: AbortSignal): Promise<DispatchResult> {
    const maxAttempts = this.retry.maxAttempts;
    let last: AttemptResult | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await this.attempt(batch);

      if (result.outcome === "success") {
        log.info(`Batch ${batch.sequence} delivered`, {
          records: batch.records.length,
          attempt,
          inserted: result.receipt?.inserted,
          updated: result.receipt?.updated,
        });
        return { ...result, attemptCount: attempt };
      }

      if (result.outcome === "fatal") {
        log.error(`Batch ${batch.sequence} rejected`, { status: result.status, error: result.errorDetail });
        return { ...result, attemptCount: attempt };
      }

      last = result;
      if (attempt === maxAttempts) break;

      const waitMs = backoffDelay(attempt, this.retry, this.random);
      log.warn(`Attempt ${attempt}/${maxAttempts} for batch ${batch.sequence} failed, retrying`, {
        status: result.status,
        error: result.errorDetail,
        waitMs,
      });
      try {
        await this.sleep(waitMs, signal);
      } catch {
        log.warn(`Retry wait for batch ${batch.sequence} cancelled`, { attempt });
        return { ...result, errorDetail: `${result.errorDetail ?? "request failed"}; retry cancelled`, attemptCount: attempt };
      }
    }

    log.error(`Batch ${batch.sequence} failed after ${maxAttempts} attempts`, { error: last?.errorDetail });
    return {
      outcome: "retryable",
      attemptCount: maxAttempts,
      errorDetail: last?.errorDetail ?? null,
      status: last?.status ?? null,
      receipt: null,
    };
  }

  private async attempt(batch: Batch): Promise<AttemptResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: {
          "X-Api-Key": this.settings.apiKey,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify({ data: batch.records }),
        signal: AbortSignal.timeout(this.settings.requestTimeoutMs),
      });
    } catch (error) {
      return { outcome: "retryable", status: null, errorDetail: this.describeTransportError(error), receipt: null };
    }

    if (response.ok) {
      return { outcome: "success", status: response.status, errorDetail: null, receipt: await this.readReceipt(response) };
    }

    const detail = `HTTP ${response.status} ${response.statusText}: ${await bodySnippet(response)}`.trim();
    if (response.status >= 500) {
      return { outcome: "retryable", status: response.status, errorDetail: detail, receipt: null };
    }
    if (response.status === 401 || response.status === 403) {
      log.error("Webhook authentication failed: check WEBHOOK_API_KEY matches the server");
    }
    return { outcome: "fatal", status: response.status, errorDetail: detail, receipt: null };
  }

  private describeTransportError(error: unknown): string {
    if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
      return `Request timed out after ${this.settings.requestTimeoutMs}ms`;
    }
    // undici wraps socket errors: TypeError("fetch failed", { cause: { code: "ECONNRESET" } })
    const cause = error instanceof Error ? error.cause : undefined;
    if (typeof cause === "object" && cause !== null && "code" in cause && typeof cause.code === "string") {
      return `${errorMessage(error)} (${cause.code})`;
    }
    return errorMessage(error);
  }

  private async readReceipt(response: Response): Promise<WebhookReceipt | null> {
    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.startsWith("application/json")) {
      log.warn("Expected JSON response from webhook", {
        contentType: contentType || "unknown",
        body: await bodySnippet(response),
      });
      return null;
    }
    try {
      const parsed = webhookReceiptSchema.safeParse(await response.json());
      if (parsed.success) return parsed.data;
      log.warn("Webhook response did not match the receipt shape", { issues: parsed.error.issues.length });
      return null;
    } catch (error) {
      log.warn("Webhook response was not valid JSON", { error: errorMessage(error) });
      return null;
    }
  }
}

async function bodySnippet(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 200);
  } catch (error) {
    return `(body unreadable: ${errorMessage(error)})`;
  }
}
