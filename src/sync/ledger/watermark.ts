import type { RecordPosition, Watermark } from "@/sync/types";

/** Normalise a driver timestamp (Date or string) to an ISO-8601 UTC string. */
export function toIsoTimestamp(value: Date | string): string {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid timestamp: ${String(value)}`);
  }
  return date.toISOString();
}

/** Negative when `a` sorts before `b` in `(changedAt, jobId)` order. */
export function compareWatermarks(a: Watermark, b: Watermark): number {
  const byTime = Date.parse(a.changedAt) - Date.parse(b.changedAt);
  if (byTime !== 0) return byTime;
  return a.jobId - b.jobId;
}

export function maxWatermark(a: Watermark | null, b: Watermark | null): Watermark | null {
  if (!a) return b;
  if (!b) return a;
  return compareWatermarks(a, b) >= 0 ? a : b;
}

export function watermarkOf(position: RecordPosition): Watermark {
  return { changedAt: position.changedAt, jobId: position.jobId };
}

export function formatWatermark(watermark: Watermark | null): string {
  return watermark ? `${watermark.changedAt}#${watermark.jobId}` : "(none)";
}
