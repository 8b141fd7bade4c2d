import type { SourceRecord } from "@/sync/types";

const BASE_CREATED = Date.UTC(2025, 4, 1);

/**
 * A plausible jobs row for tests. Job N is created N minutes after
 * 2025-05-01 UTC; `changed_at` follows the later of created and completed
 * unless overridden.
 */
export function makeJobRow(jobId: number, overrides: Partial<SourceRecord> = {}): SourceRecord {
  const created = new Date(BASE_CREATED + jobId * 60_000);
  const row: SourceRecord = {
    job_id: jobId,
    customer: "Harbour Legal",
    group_name: "Harbour Group",
    entity: "Pacific Entity",
    job_created: created,
    quote: "1250.00",
    quote_nett: "1100.00",
    quote_currency: "nzd",
    due_date: new Date(BASE_CREATED + 14 * 86_400_000),
    job_status: "In Progress",
    completed_date: null,
    wip_completed_pct: "40.00",
    gross_margin: "0.35",
    changed_at: created,
    ...overrides,
  };
  if (overrides.changed_at === undefined && row.completed_date instanceof Date && row.completed_date.getTime() > created.getTime()) {
    row.changed_at = row.completed_date;
  }
  return row;
}

export function makeJobRows(count: number, firstJobId = 1): SourceRecord[] {
  return Array.from({ length: count }, (_, i) => makeJobRow(firstJobId + i));
}
