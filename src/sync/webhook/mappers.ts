import { z } from "zod";
import { MappingError } from "@/sync/errors";
import { toIsoTimestamp } from "@/sync/ledger/watermark";
import type { MappedRecord, SourceRecord, StagedRecord } from "@/sync/types";

// DECIMAL columns arrive as strings from mysql2.
const decimal = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite());

const timestamp = z
  .union([z.date(), z.string().min(1).transform((s) => new Date(s))])
  .pipe(z.date());

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v == null || v.trim() === "" ? null : v.trim()));

const sourceRowSchema = z.object({
  job_id: z.number().int().positive(),
  customer: optionalText,
  group_name: optionalText,
  entity: optionalText,
  job_created: timestamp,
  quote: decimal,
  quote_nett: decimal.nullish(),
  quote_currency: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/, "must be a 3-letter currency code")
    .transform((s) => s.toUpperCase()),
  due_date: timestamp.nullish(),
  job_status: z.string().trim().min(1, "must not be empty"),
  completed_date: timestamp.nullish(),
  wip_completed_pct: decimal.nullish(),
  gross_margin: decimal.nullish(),
});

/** Map one source row to the webhook record shape. Throws `MappingError` on invalid input. */
export function mapRecord(row: SourceRecord): MappedRecord {
  const parsed = sourceRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new MappingError(
      jobIdOf(row),
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const r = parsed.data;

  return {
    Customer: r.customer,
    Group: r.group_name,
    Entity: r.entity,
    TJ: `TJ${r.job_id}`,
    Date: r.job_created.toISOString(),
    "TJAmount (in Sales Order currency)": r.quote,
    "TJAmount nett (in Sales Order currency)": r.quote_nett ?? null,
    Currency: r.quote_currency,
    "Expected Due Date": r.due_date?.toISOString() ?? null,
    Status: r.job_status,
    "Completed Date": r.completed_date?.toISOString() ?? null,
    WIP: r.wip_completed_pct ?? null,
    "Gross Margin": r.gross_margin ?? null,
  };
}

/** Map a row and attach the keyset position it was read at. */
export function stageRecord(row: SourceRecord): StagedRecord {
  const record = mapRecord(row);
  let changedAt: string;
  try {
    changedAt = toIsoTimestamp(row.changed_at);
  } catch {
    throw new MappingError(row.job_id, ["changed_at: Invalid date"]);
  }
  return { record, position: { jobId: row.job_id, changedAt } };
}

function jobIdOf(row: SourceRecord): number | null {
  return typeof row.job_id === "number" ? row.job_id : null;
}
