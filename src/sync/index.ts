import { randomUUID } from "crypto";
import type { SyncConfig } from "@/sync/config/env";
import { DispatchError, MappingError, SyncEngineError, describeError, errorMessage } from "@/sync/errors";
import { openStateDatabase } from "@/sync/ledger/db";
import { StateStore } from "@/sync/ledger/repository";
import { compareWatermarks, formatWatermark, maxWatermark } from "@/sync/ledger/watermark";
import { createChildLogger } from "@/sync/logger";
import { batchRecords } from "@/sync/pipeline/batcher";
import { BoundedQueue } from "@/sync/pipeline/queue";
import { extractRecords, type ExtractStart } from "@/sync/source/extractor";
import { MysqlJobsSource } from "@/sync/source/mysql";
import type { JobsSource } from "@/sync/source/types";
import { WebhookClient, type BatchDispatcher } from "@/sync/webhook/client";
import { stageRecord } from "@/sync/webhook/mappers";
import type {
  Batch,
  DispatchResult,
  FailedBatch,
  RunFailure,
  RunStage,
  RunStatus,
  SkippedRecord,
  SourceRecord,
  StagedRecord,
  SyncMode,
  SyncRunSummary,
  SyncState,
  Watermark,
} from "@/sync/types";

const log = createChildLogger("sync-engine");

/** Skipped-record details kept in the summary; the count is always exact. */
const MAX_REPORTED_SKIPS = 100;

/** Upper bound between lock renewals while a run is waiting on the webhook. */
const MAX_LOCK_RENEW_INTERVAL_MS = 60_000;

export interface SyncDependencies {
  source: JobsSource;
  dispatcher: BatchDispatcher;
  store: StateStore;
}

export type EngineSettings = Pick<
  SyncConfig,
  | "batchSize"
  | "maxBatchBytes"
  | "fetchPageSize"
  | "reconnectAttempts"
  | "fromDate"
  | "onBatchFailure"
  | "queueCapacity"
  | "runTimeoutMs"
  | "lockStaleAfterMs"
>;

export interface SyncOptions {
  mode: SyncMode;
  dryRun?: boolean;
  /** Full mode only: ignore an interrupted full scan and start from the first job. */
  restartFullScan?: boolean;
  signal?: AbortSignal;
  runId?: string;
}

export interface SyncEngine {
  deps: SyncDependencies;
  close(): Promise<void>;
}

/** Wire the production collaborators from a loaded config. */
export function createSyncEngine(config: SyncConfig): SyncEngine {
  const db = openStateDatabase(config.statePath);
  const source = new MysqlJobsSource(config.source);
  return {
    deps: {
      source,
      dispatcher: new WebhookClient(config.webhook, config.retry),
      store: new StateStore(db),
    },
    async close() {
      try {
        await source.close();
      } finally {
        db.close();
      }
    },
  };
}

export function exitCodeFor(summary: SyncRunSummary): number {
  return summary.status === "completed" ? 0 : 1;
}

interface RunProgress {
  stage: RunStage;
  counts: SyncRunSummary["counts"];
  failedBatches: FailedBatch[];
  skippedRecords: SkippedRecord[];
  state: SyncState;
}

/**
 * Run one sync: extract → map → batch on one side of a bounded queue,
 * dispatch → commit on the other. State only moves after a batch is
 * acknowledged, so a crash can resend a batch but never lose one.
 */
export async function runSync(
  deps: SyncDependencies,
  settings: EngineSettings,
  options: SyncOptions,
): Promise<SyncRunSummary> {
  const runId = options.runId ?? randomUUID();
  const startedAt = new Date();
  const dryRun = options.dryRun ?? false;
  const { mode } = options;
  const { store } = deps;

  const controller = new AbortController();
  const onAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) onAbort();
  options.signal?.addEventListener("abort", onAbort, { once: true });
  const timer = settings.runTimeoutMs
    ? setTimeout(() => controller.abort(new Error(`Run exceeded ${settings.runTimeoutMs}ms`)), settings.runTimeoutMs)
    : undefined;
  const signal = controller.signal;

  const progress: RunProgress = {
    stage: "INIT",
    counts: {
      recordsRead: 0,
      recordsMapped: 0,
      recordsSkipped: 0,
      batchesBuilt: 0,
      batchesSent: 0,
      batchesFailed: 0,
      inserted: 0,
      updated: 0,
    },
    failedBatches: [],
    skippedRecords: [],
    state: { mode: null, watermark: null, lastRunAt: null, fullScan: null },
  };

  log.info("Starting sync run", { runId, mode, dryRun });

  const finish = (status: RunStatus, initial: Watermark | null, failure: RunFailure | null): SyncRunSummary => {
    const completedAt = new Date();
    return {
      runId,
      mode,
      dryRun,
      status,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      elapsedMs: completedAt.getTime() - startedAt.getTime(),
      counts: progress.counts,
      failedBatches: progress.failedBatches,
      skippedRecords: progress.skippedRecords,
      initialWatermark: initial,
      finalWatermark: progress.state.watermark,
      failure,
    };
  };

  if (!dryRun) {
    try {
      store.acquireLock(runId, settings.lockStaleAfterMs);
    } catch (error) {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      log.error("Could not start sync run", describeError(error));
      progress.stage = "FAILED";
      return finish("failed", null, { stage: "INIT", error: errorMessage(error) });
    }
  }

  // Renew the lock on a timer so long retry waits never look stale to another run.
  const renewal = dryRun
    ? undefined
    : setInterval(() => {
        try {
          if (!store.renewLock(runId)) {
            log.error("Sync lock was taken over by another run; stopping", { runId });
            controller.abort(new Error("Sync lock was taken over by another run"));
          }
        } catch (error) {
          log.warn("Could not renew sync lock", { runId, error: errorMessage(error) });
        }
      }, lockRenewInterval(settings.lockStaleAfterMs));

  let initialWatermark: Watermark | null = null;
  let summary: SyncRunSummary | undefined;
  const queue = new BoundedQueue<Batch>(settings.queueCapacity);
  let producer: Promise<void> = Promise.resolve();

  try {
    progress.state = store.load();
    initialWatermark = progress.state.watermark;
    if (!dryRun) store.createRun(runId, mode, startedAt.toISOString());

    const resume = mode === "full" && !options.restartFullScan ? progress.state.fullScan : null;
    const start: ExtractStart =
      mode === "full"
        ? { mode, afterJobId: resume?.afterJobId ?? null }
        : { mode, after: progress.state.watermark };

    if (resume) {
      log.info("Resuming interrupted full scan", { afterJobId: resume.afterJobId });
    } else if (mode === "incremental" && progress.state.fullScan) {
      log.warn("An interrupted full scan is pending; incremental run continues from the watermark", {
        fullScanAfterJobId: progress.state.fullScan.afterJobId,
      });
    }
    log.info("Sync position", { mode, watermark: formatWatermark(progress.state.watermark) });

    progress.stage = "EXTRACT";
    // Change positions are capped at the run's start, so the watermark never passes it.
    producer = produce(deps.source, settings, { start, asOf: startedAt }, queue, progress, signal);

    // Highest position covered by acknowledged batches of this full scan.
    let scanMax: Watermark | null = resume?.maxSeen ?? null;
    // Set once a batch is given up on: later batches still go out, but state stays put.
    let frozen = false;

    for await (const batch of queue) {
      if (signal.aborted) break;
      progress.stage = "DISPATCH";
      if (dryRun) {
        log.info(`[DRY RUN] Would send batch ${batch.sequence}`, {
          records: batch.records.length,
          bytes: batch.bytes,
          jobIds: `${batch.first.jobId}..${batch.last.jobId}`,
        });
        log.debug("[DRY RUN] Skipping state commit", { watermark: formatWatermark(batch.maxSeen) });
        continue;
      }

      const result = await deps.dispatcher.send(batch, signal);

      if (result.outcome === "success") {
        progress.counts.batchesSent += 1;
        progress.counts.inserted += result.receipt?.inserted ?? 0;
        progress.counts.updated += result.receipt?.updated ?? 0;

        if (!frozen) {
          progress.stage = "COMMIT";
          if (mode === "incremental") {
            progress.state = store.commit(runId, { mode, watermark: batch.maxSeen });
          } else {
            scanMax = maxWatermark(scanMax, batch.maxSeen);
            progress.state = store.commit(runId, {
              mode,
              fullScan: { afterJobId: batch.last.jobId, maxSeen: scanMax },
            });
          }
        }
      } else {
        recordFailedBatch(progress, batch, result);
        if (result.outcome === "fatal") {
          throw new DispatchError(
            `Webhook rejected batch ${batch.sequence}: ${result.errorDetail ?? "unknown error"}`,
            "fatal",
            rangeOf(batch),
            result.status ?? undefined,
          );
        }
        if (signal.aborted) break;
        if (settings.onBatchFailure === "halt") {
          throw new DispatchError(
            `Batch ${batch.sequence} failed after ${result.attemptCount} attempts: ${result.errorDetail ?? "unknown error"}`,
            "retryable",
            rangeOf(batch),
            result.status ?? undefined,
          );
        }
        if (!frozen) {
          log.warn("Continuing past failed batch; sync position held before it", {
            sequence: batch.sequence,
            watermark: formatWatermark(progress.state.watermark),
          });
        }
        frozen = true;
      }

      if (signal.aborted) break;
    }

    if (signal.aborted) {
      queue.cancel();
      await producer;
      progress.stage = "DONE";
      log.warn("Sync run cancelled", {
        runId,
        reason: errorMessage(signal.reason),
        watermark: formatWatermark(progress.state.watermark),
      });
      summary = finish("cancelled", initialWatermark, null);
      return summary;
    }

    await producer;

    if (mode === "full" && !dryRun && !frozen) {
      // The scan is complete: its highest position becomes the incremental watermark.
      const current = progress.state.watermark;
      const advanced = scanMax !== null && (current === null || compareWatermarks(scanMax, current) > 0);
      if (advanced || progress.state.fullScan !== null) {
        progress.stage = "COMMIT";
        progress.state = store.commit(runId, {
          mode,
          fullScan: null,
          watermark: advanced && scanMax ? scanMax : undefined,
        });
      }
    }

    progress.stage = "DONE";
    summary = finish("completed", initialWatermark, null);
    log.info("Sync run complete", {
      runId,
      counts: summary.counts,
      watermark: formatWatermark(summary.finalWatermark),
      elapsedMs: summary.elapsedMs,
    });
    return summary;
  } catch (error) {
    const stage = error instanceof SyncEngineError ? error.stage : progress.stage;
    progress.stage = "FAILED";
    controller.abort(error);
    queue.cancel();
    await producer;

    const failure: RunFailure = { stage, error: errorMessage(error) };
    if (error instanceof DispatchError) failure.batch = error.batch;
    log.error("Sync run failed", { runId, ...describeError(error), stage });
    summary = finish("failed", initialWatermark, failure);
    return summary;
  } finally {
    clearTimeout(timer);
    clearInterval(renewal);
    options.signal?.removeEventListener("abort", onAbort);
    if (!dryRun) {
      try {
        if (summary) store.completeRun(summary);
      } catch (error) {
        log.error("Could not record run summary", { runId, error: errorMessage(error) });
      } finally {
        try {
          store.releaseLock(runId);
        } catch (error) {
          log.error("Could not release sync lock", { runId, error: errorMessage(error) });
        }
      }
    }
  }
}

/**
 * Producer side: pull rows, map them, group them, and hand batches to the
 * queue. Never rejects; failures travel to the consumer through the queue.
 */
async function produce(
  source: JobsSource,
  settings: EngineSettings,
  from: { start: ExtractStart; asOf: Date },
  queue: BoundedQueue<Batch>,
  progress: RunProgress,
  signal: AbortSignal,
): Promise<void> {
  try {
    const rows = extractRecords(source, {
      start: from.start,
      asOf: from.asOf,
      pageSize: settings.fetchPageSize,
      fromDate: settings.fromDate,
      reconnectAttempts: settings.reconnectAttempts,
      signal,
    });
    const batches = batchRecords(stageRows(rows, progress, signal), {
      maxRecords: settings.batchSize,
      maxBytes: settings.maxBatchBytes,
    });

    for await (const batch of batches) {
      if (signal.aborted) break;
      progress.counts.batchesBuilt += 1;
      if (!(await queue.push(batch))) return;
    }
    queue.close();
  } catch (error) {
    queue.fail(error);
  }
}

/** Map each row, counting and reporting the ones that fail validation. */
async function* stageRows(
  rows: AsyncIterable<SourceRecord>,
  progress: RunProgress,
  signal: AbortSignal,
): AsyncGenerator<StagedRecord> {
  const { counts } = progress;
  for await (const row of rows) {
    if (signal.aborted) return;
    counts.recordsRead += 1;
    let staged: StagedRecord;
    try {
      staged = stageRecord(row);
    } catch (error) {
      if (!(error instanceof MappingError)) throw error;
      counts.recordsSkipped += 1;
      if (progress.skippedRecords.length < MAX_REPORTED_SKIPS) {
        progress.skippedRecords.push({ jobId: error.jobId, issues: error.issues });
      }
      log.warn("Skipping record that failed mapping", { jobId: error.jobId, issues: error.issues });
      continue;
    }
    counts.recordsMapped += 1;
    yield staged;
  }
}

function recordFailedBatch(progress: RunProgress, batch: Batch, result: DispatchResult): void {
  progress.counts.batchesFailed += 1;
  progress.failedBatches.push({
    sequence: batch.sequence,
    firstJobId: batch.first.jobId,
    lastJobId: batch.last.jobId,
    records: batch.records.length,
    attemptCount: result.attemptCount,
    outcome: result.outcome,
    errorDetail: result.errorDetail,
  });
}

function lockRenewInterval(staleAfterMs: number): number {
  return Math.max(1, Math.min(MAX_LOCK_RENEW_INTERVAL_MS, Math.floor(staleAfterMs / 4)));
}

function rangeOf(batch: Batch): { sequence: number; firstJobId: number; lastJobId: number } {
  return { sequence: batch.sequence, firstJobId: batch.first.jobId, lastJobId: batch.last.jobId };
}
