export type SyncMode = "full" | "incremental";

/** Keyset position over the `(changed_at, job_id)` ordering. */
export interface Watermark {
  changedAt: string;
  jobId: number;
}

export interface FullScanProgress {
  afterJobId: number;
  maxSeen: Watermark | null;
}

export interface SyncState {
  mode: SyncMode | null;
  watermark: Watermark | null;
  lastRunAt: string | null;
  fullScan: FullScanProgress | null;
}

/** A `bi_data.jobs` row as the source query returns it. */
export interface SourceRecord {
  job_id: number;
  customer: string | null;
  group_name: string | null;
  entity: string | null;
  job_created: Date | string | null;
  quote: string | number | null;
  quote_nett: string | number | null;
  quote_currency: string | null;
  due_date: Date | string | null;
  job_status: string | null;
  completed_date: Date | string | null;
  wip_completed_pct: string | number | null;
  gross_margin: string | number | null;
  changed_at: Date | string;
}

export interface MappedRecord {
  Customer: string | null;
  Group: string | null;
  Entity: string | null;
  TJ: string;
  Date: string;
  "TJAmount (in Sales Order currency)": number;
  "TJAmount nett (in Sales Order currency)": number | null;
  Currency: string;
  "Expected Due Date": string | null;
  Status: string;
  "Completed Date": string | null;
  WIP: number | null;
  "Gross Margin": number | null;
}

export interface RecordPosition {
  jobId: number;
  changedAt: string;
}

/** A mapped record still carrying the source position it came from. */
export interface StagedRecord {
  record: MappedRecord;
  position: RecordPosition;
}

export interface Batch {
  sequence: number;
  records: MappedRecord[];
  first: RecordPosition;
  last: RecordPosition;
  /** Greatest `(changedAt, jobId)` among the batch's records. */
  maxSeen: Watermark;
  bytes: number;
}

export type DispatchOutcome = "success" | "retryable" | "fatal";

export interface WebhookReceipt {
  inserted: number;
  updated: number;
}

export interface DispatchResult {
  outcome: DispatchOutcome;
  attemptCount: number;
  errorDetail: string | null;
  status: number | null;
  receipt: WebhookReceipt | null;
}

export type RunStage =
  | "INIT"
  | "EXTRACT"
  | "MAP"
  | "BATCH"
  | "DISPATCH"
  | "COMMIT"
  | "DONE"
  | "FAILED";

export type RunStatus = "completed" | "failed" | "cancelled";

export interface FailedBatch {
  sequence: number;
  firstJobId: number;
  lastJobId: number;
  records: number;
  attemptCount: number;
  outcome: DispatchOutcome;
  errorDetail: string | null;
}

export interface SkippedRecord {
  jobId: number | null;
  issues: string[];
}

export interface RunFailure {
  stage: RunStage;
  error: string;
  batch?: { sequence: number; firstJobId: number; lastJobId: number };
}

export interface SyncRunSummary {
  runId: string;
  mode: SyncMode;
  dryRun: boolean;
  status: RunStatus;
  startedAt: string;
  completedAt: string;
  elapsedMs: number;
  counts: {
    recordsRead: number;
    recordsMapped: number;
    recordsSkipped: number;
    batchesBuilt: number;
    batchesSent: number;
    batchesFailed: number;
    inserted: number;
    updated: number;
  };
  failedBatches: FailedBatch[];
  skippedRecords: SkippedRecord[];
  initialWatermark: Watermark | null;
  finalWatermark: Watermark | null;
  failure: RunFailure | null;
}
