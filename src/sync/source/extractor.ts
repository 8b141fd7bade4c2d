import { ExtractionError } from "@/sync/errors";
import { toIsoTimestamp } from "@/sync/ledger/watermark";
import { createChildLogger } from "@/sync/logger";
import type { SourceRecord, SyncMode, Watermark } from "@/sync/types";
import type { JobsSource, PageRequest } from "./types";

const log = createChildLogger("extractor");

const CONNECTION_ERROR_CODES = new Set([
  "PROTOCOL_CONNECTION_LOST",
  "PROTOCOL_SEQUENCE_TIMEOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EHOSTUNREACH",
]);

export type ExtractStart =
  | { mode: "full"; afterJobId: number | null }
  | { mode: "incremental"; after: Watermark | null };

export interface ExtractOptions {
  start: ExtractStart;
  pageSize: number;
  fromDate: string;
  /** Reconnects allowed over the whole extraction. */
  reconnectAttempts: number;
  /** Cap on change positions; defaults to the moment extraction starts. */
  asOf?: Date;
  signal?: AbortSignal;
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isConnectionError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && CONNECTION_ERROR_CODES.has(code);
}

/**
 * Stream source rows page by page, never holding more than one page.
 * A lost connection re-issues the current page from the last yielded position;
 * the sequence itself never rewinds.
 */
export async function* extractRecords(
  source: JobsSource,
  options: ExtractOptions,
): AsyncGenerator<SourceRecord> {
  let cursor: ExtractStart = options.start;
  const asOf = (options.asOf ?? new Date()).toISOString();
  let reconnectsLeft = options.reconnectAttempts;
  let pages = 0;

  while (!options.signal?.aborted) {
    const request = pageRequest(cursor, options, asOf);
    let rows: SourceRecord[];
    try {
      rows = await source.readPage(request);
    } catch (error) {
      if (isConnectionError(error) && reconnectsLeft > 0) {
        reconnectsLeft -= 1;
        log.warn("Source connection lost, reconnecting", {
          code: errorCode(error),
          reconnectsLeft,
        });
        try {
          await source.reconnect();
        } catch (reconnectError) {
          log.warn("Reconnect failed", { error: reconnectError instanceof Error ? reconnectError.message : String(reconnectError) });
        }
        continue;
      }
      throw new ExtractionError(
        `Source query failed: ${error instanceof Error ? error.message : String(error)}`,
        { code: errorCode(error), context: { page: pages + 1, resumeFrom: describeCursor(cursor) } },
      );
    }

    pages += 1;
    log.debug("Source page read", { page: pages, rows: rows.length });

    for (const row of rows) {
      yield row;
      cursor = advance(cursor.mode, row);
    }

    if (rows.length < options.pageSize) return;
  }

  log.info("Extraction stopped by cancellation", { pages });
}

function pageRequest(cursor: ExtractStart, options: ExtractOptions, asOf: string): PageRequest {
  const base = { limit: options.pageSize, fromDate: options.fromDate, asOf };
  return cursor.mode === "full"
    ? { ...base, mode: "full", afterJobId: cursor.afterJobId }
    : { ...base, mode: "incremental", after: cursor.after };
}

function advance(mode: SyncMode, row: SourceRecord): ExtractStart {
  if (mode === "full") return { mode, afterJobId: row.job_id };
  try {
    return { mode, after: { changedAt: toIsoTimestamp(row.changed_at), jobId: row.job_id } };
  } catch {
    throw new ExtractionError(`Job ${row.job_id} has no usable change timestamp; cannot page past it`, {
      context: { jobId: row.job_id, changedAt: String(row.changed_at) },
    });
  }
}

function describeCursor(cursor: ExtractStart): string {
  if (cursor.mode === "full") return `job_id > ${cursor.afterJobId ?? "(start)"}`;
  return cursor.after ? `${cursor.after.changedAt}#${cursor.after.jobId}` : "(start)";
}
