import { compareWatermarks, toIsoTimestamp } from "@/sync/ledger/watermark";
import type { SourceRecord } from "@/sync/types";
import type { JobsSource, PageRequest } from "./types";

/**
 * In-process `JobsSource` over a fixed row set, applying the same filters and
 * keyset ordering as the MySQL query.
 */
export class InMemoryJobsSource implements JobsSource {
  readonly requests: PageRequest[] = [];
  reconnects = 0;
  closed = false;

  constructor(private rows: SourceRecord[]) {}

  /** Replace the table contents, e.g. to simulate new source rows between runs. */
  setRows(rows: SourceRecord[]): void {
    this.rows = rows;
  }

  async readPage(request: PageRequest): Promise<SourceRecord[]> {
    this.requests.push(request);
    const floor = Date.parse(`${request.fromDate}T00:00:00Z`);
    const cap = Date.parse(request.asOf);
    const eligible = this.rows
      .filter((row) => row.job_created !== null && Date.parse(toIsoTimestamp(row.job_created)) >= floor)
      .map((row) => capChangedAt(row, cap));

    if (request.mode === "full") {
      const afterJobId = request.afterJobId;
      return eligible
        .filter((row) => afterJobId === null || row.job_id > afterJobId)
        .sort((a, b) => a.job_id - b.job_id)
        .slice(0, request.limit);
    }

    const after = request.after;
    return eligible
      .filter((row) => after === null || compareWatermarks(positionOf(row), after) > 0)
      .sort((a, b) => compareWatermarks(positionOf(a), positionOf(b)))
      .slice(0, request.limit);
  }

  async reconnect(): Promise<void> {
    this.reconnects += 1;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Same cap as the SQL change column: no position later than the extraction clock. */
function capChangedAt(row: SourceRecord, cap: number): SourceRecord {
  const changed = row.changed_at instanceof Date ? row.changed_at.getTime() : Date.parse(row.changed_at);
  return changed > cap ? { ...row, changed_at: new Date(cap) } : row;
}

function positionOf(row: SourceRecord) {
  return { changedAt: toIsoTimestamp(row.changed_at), jobId: row.job_id };
}
