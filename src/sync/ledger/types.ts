import type { FailedBatch, RunFailure, RunStatus, SyncMode, SyncRunSummary, Watermark } from "@/sync/types";

export interface LockHolder {
  runId: string;
  /** Taken, or last renewed by a commit or heartbeat. */
  acquiredAt: string;
}

/** A state write. Omitted fields keep their stored value. */
export interface StateUpdate {
  mode: SyncMode;
  watermark?: Watermark;
  fullScan?: { afterJobId: number; maxSeen: Watermark | null } | null;
}

export interface SyncRunRecord {
  id: number;
  runId: string;
  startedAt: string;
  completedAt: string | null;
  mode: SyncMode;
  counts: SyncRunSummary["counts"] | null;
  failedBatches: FailedBatch[];
  finalWatermark: Watermark | null;
  failure: RunFailure | null;
  status: RunStatus | "running";
}
