import type Database from "better-sqlite3";
import { RunLockError, StateCommitError } from "@/sync/errors";
import { compareWatermarks, formatWatermark } from "./watermark";
import { createChildLogger } from "@/sync/logger";
import type { SyncMode, SyncRunSummary, SyncState, Watermark } from "@/sync/types";
import type { LockHolder, StateUpdate, SyncRunRecord } from "./types";

const log = createChildLogger("state-store");

/**
 * Sole owner of the persisted sync position. Every write is a single SQLite
 * transaction, so a crash leaves either the old or the new state on disk.
 */
export class StateStore {
  constructor(private readonly db: Database.Database) {}

  // --- State ---

  load(): SyncState {
    const row = this.db
      .prepare("SELECT * FROM sync_state WHERE id = 1")
      .get() as RawStateRow | undefined;
    return row ? toSyncState(row) : { mode: null, watermark: null, lastRunAt: null, fullScan: null };
  }

  /**
   * Persist a new position for the run holding the lock, renewing the lock in
   * the same transaction. Rejects a watermark that would move backwards, and
   * rejects writes from a run that lost the lock.
   */
  commit(runId: string, update: StateUpdate, now: Date = new Date()): SyncState {
    const apply = this.db.transaction((): SyncState => {
      const holder = this.currentHolder();
      if (!holder || holder.runId !== runId) {
        throw new StateCommitError("Run no longer holds the sync lock", {
          runId,
          holder: holder?.runId ?? null,
        });
      }
      this.renewLock(runId, now);

      const current = this.load();
      if (update.watermark && current.watermark && compareWatermarks(update.watermark, current.watermark) < 0) {
        throw new StateCommitError("Refusing to move the watermark backwards", {
          current: formatWatermark(current.watermark),
          proposed: formatWatermark(update.watermark),
        });
      }

      const next: SyncState = {
        mode: update.mode,
        watermark: update.watermark ?? current.watermark,
        fullScan: update.fullScan === undefined ? current.fullScan : update.fullScan,
        lastRunAt: now.toISOString(),
      };

      this.db.prepare(`
        INSERT INTO sync_state (id, mode, watermark_changed_at, watermark_job_id, full_scan_after_job_id,
          full_scan_max_changed_at, full_scan_max_job_id, last_run_at, updated_at)
        VALUES (1, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          mode = excluded.mode,
          watermark_changed_at = excluded.watermark_changed_at,
          watermark_job_id = excluded.watermark_job_id,
          full_scan_after_job_id = excluded.full_scan_after_job_id,
          full_scan_max_changed_at = excluded.full_scan_max_changed_at,
          full_scan_max_job_id = excluded.full_scan_max_job_id,
          last_run_at = excluded.last_run_at,
          updated_at = excluded.updated_at
      `).run(
        next.mode,
        next.watermark?.changedAt ?? null,
        next.watermark?.jobId ?? null,
        next.fullScan?.afterJobId ?? null,
        next.fullScan?.maxSeen?.changedAt ?? null,
        next.fullScan?.maxSeen?.jobId ?? null,
        next.lastRunAt,
        now.toISOString(),
      );
      return next;
    });

    try {
      return apply.immediate();
    } catch (error) {
      if (error instanceof StateCommitError) throw error;
      throw new StateCommitError(
        `Could not persist sync state: ${error instanceof Error ? error.message : String(error)}`,
        { runId },
      );
    }
  }

  // --- Run lock ---

  /** Take the lock, or take over one not renewed within `staleAfterMs`. */
  acquireLock(runId: string, staleAfterMs: number, now: Date = new Date()): void {
    const take = this.db.transaction(() => {
      const holder = this.currentHolder();
      if (holder) {
        const age = now.getTime() - Date.parse(holder.acquiredAt);
        if (age < staleAfterMs) {
          throw new RunLockError(holder.runId, holder.acquiredAt);
        }
        log.warn("Taking over stale sync lock", { previousRunId: holder.runId, acquiredAt: holder.acquiredAt });
      }
      this.db.prepare(`
        INSERT INTO sync_lock (id, run_id, acquired_at) VALUES (1, ?, ?)
        ON CONFLICT(id) DO UPDATE SET run_id = excluded.run_id, acquired_at = excluded.acquired_at
      `).run(runId, now.toISOString());
    });
    take.immediate();
  }

  /** Mark the caller's lock as live. False when another run holds it, or none does. */
  renewLock(runId: string, now: Date = new Date()): boolean {
    const result = this.db
      .prepare("UPDATE sync_lock SET acquired_at = ? WHERE id = 1 AND run_id = ?")
      .run(now.toISOString(), runId);
    return result.changes === 1;
  }

  releaseLock(runId: string): void {
    this.db.prepare("DELETE FROM sync_lock WHERE id = 1 AND run_id = ?").run(runId);
  }

  currentHolder(): LockHolder | undefined {
    const row = this.db
      .prepare("SELECT run_id, acquired_at FROM sync_lock WHERE id = 1")
      .get() as { run_id: string; acquired_at: string } | undefined;
    return row ? { runId: row.run_id, acquiredAt: row.acquired_at } : undefined;
  }

  // --- Sync Runs ---

  createRun(runId: string, mode: SyncMode, startedAt: string): void {
    this.db.prepare(`
      INSERT INTO sync_runs (run_id, started_at, mode, counts_json, status)
      VALUES (?, ?, ?, ?, ?)
    `).run(runId, startedAt, mode, "{}", "running");
  }

  completeRun(summary: SyncRunSummary): void {
    this.db.prepare(`
      UPDATE sync_runs
      SET completed_at = ?, counts_json = ?, failed_batches_json = ?, final_watermark_json = ?,
          failure_json = ?, status = ?
      WHERE run_id = ?
    `).run(
      summary.completedAt,
      JSON.stringify(summary.counts),
      JSON.stringify(summary.failedBatches),
      summary.finalWatermark ? JSON.stringify(summary.finalWatermark) : null,
      summary.failure ? JSON.stringify(summary.failure) : null,
      summary.status,
      summary.runId,
    );
  }

  recentRuns(limit = 5): SyncRunRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM sync_runs ORDER BY started_at DESC, id DESC LIMIT ?")
      .all(limit) as RawRunRow[];
    return rows.map(toRunRecord);
  }
}

// --- Internal helpers ---

interface RawStateRow {
  id: number;
  mode: string | null;
  watermark_changed_at: string | null;
  watermark_job_id: number | null;
  full_scan_after_job_id: number | null;
  full_scan_max_changed_at: string | null;
  full_scan_max_job_id: number | null;
  last_run_at: string | null;
  updated_at: string;
}

interface RawRunRow {
  id: number;
  run_id: string;
  started_at: string;
  completed_at: string | null;
  mode: string;
  counts_json: string;
  failed_batches_json: string;
  final_watermark_json: string | null;
  failure_json: string | null;
  status: string;
}

function toSyncState(row: RawStateRow): SyncState {
  const watermark: Watermark | null =
    row.watermark_changed_at !== null && row.watermark_job_id !== null
      ? { changedAt: row.watermark_changed_at, jobId: row.watermark_job_id }
      : null;
  const maxSeen: Watermark | null =
    row.full_scan_max_changed_at !== null && row.full_scan_max_job_id !== null
      ? { changedAt: row.full_scan_max_changed_at, jobId: row.full_scan_max_job_id }
      : null;

  return {
    mode: toMode(row.mode),
    watermark,
    lastRunAt: row.last_run_at,
    fullScan: row.full_scan_after_job_id !== null ? { afterJobId: row.full_scan_after_job_id, maxSeen } : null,
  };
}

function toMode(value: string | null): SyncMode | null {
  return value === "full" || value === "incremental" ? value : null;
}

function toRunStatus(value: string): SyncRunRecord["status"] {
  switch (value) {
    case "completed":
    case "failed":
    case "cancelled":
    case "running":
      return value;
    default:
      return "failed";
  }
}

function toRunRecord(row: RawRunRow): SyncRunRecord {
  return {
    id: row.id,
    runId: row.run_id,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    mode: toMode(row.mode) ?? "incremental",
    counts: row.status === "running" ? null : (JSON.parse(row.counts_json) as SyncRunSummary["counts"]),
    failedBatches: JSON.parse(row.failed_batches_json) as SyncRunRecord["failedBatches"],
    finalWatermark: row.final_watermark_json ? (JSON.parse(row.final_watermark_json) as Watermark) : null,
    failure: row.failure_json ? (JSON.parse(row.failure_json) as SyncRunRecord["failure"]) : null,
    status: toRunStatus(row.status),
  };
}
