import { describe, expect, it } from "vitest";
import { MappingError } from "@/sync/errors";
import { makeJobRow } from "@/sync/testing";
import { mapRecord, stageRecord } from "./mappers";

function mappingErrorFrom(fn: () => unknown): MappingError {
  try {
    fn();
  } catch (error) {
    if (error instanceof MappingError) return error;
    throw error;
  }
  throw new Error("expected a MappingError");
}

describe("mapRecord", () => {
  it("maps a source row to the webhook record", () => {
    expect(mapRecord(makeJobRow(42))).toEqual({
      Customer: "Harbour Legal",
      Group: "Harbour Group",
      Entity: "Pacific Entity",
      TJ: "TJ42",
      Date: "2025-05-01T00:42:00.000Z",
      "TJAmount (in Sales Order currency)": 1250,
      "TJAmount nett (in Sales Order currency)": 1100,
      Currency: "NZD",
      "Expected Due Date": "2025-05-15T00:00:00.000Z",
      Status: "In Progress",
      "Completed Date": null,
      WIP: 40,
      "Gross Margin": 0.35,
    });
  });

  it("accepts driver strings for dates and numbers for decimals", () => {
    const record = mapRecord(
      makeJobRow(7, {
        job_created: "2025-05-03T10:00:00Z",
        completed_date: "2025-05-20T16:30:00Z",
        quote: 99.5,
        job_status: " Completed ",
      }),
    );

    expect(record.Date).toBe("2025-05-03T10:00:00.000Z");
    expect(record["Completed Date"]).toBe("2025-05-20T16:30:00.000Z");
    expect(record["TJAmount (in Sales Order currency)"]).toBe(99.5);
    expect(record.Status).toBe("Completed");
  });

  it("turns blank and missing optional fields into null", () => {
    const record = mapRecord(
      makeJobRow(8, { customer: "   ", group_name: null, quote_nett: null, due_date: null, gross_margin: null }),
    );

    expect(record.Customer).toBeNull();
    expect(record.Group).toBeNull();
    expect(record["TJAmount nett (in Sales Order currency)"]).toBeNull();
    expect(record["Expected Due Date"]).toBeNull();
    expect(record["Gross Margin"]).toBeNull();
  });

  it("rejects a row without a currency", () => {
    const error = mappingErrorFrom(() => mapRecord(makeJobRow(42, { quote_currency: null })));

    expect(error.jobId).toBe(42);
    expect(error.issues).toEqual(["quote_currency: Expected string, received null"]);
    expect(error.message).toBe("Record 42 failed validation: quote_currency: Expected string, received null");
    expect(error.fatal).toBe(false);
  });

  it("rejects a malformed currency code", () => {
    const error = mappingErrorFrom(() => mapRecord(makeJobRow(42, { quote_currency: "NZ$" })));

    expect(error.issues).toEqual(["quote_currency: must be a 3-letter currency code"]);
  });

  it("collects every invalid field", () => {
    const error = mappingErrorFrom(() => mapRecord(makeJobRow(42, { quote_currency: "EURO", job_status: "  " })));

    expect(error.issues).toEqual([
      "quote_currency: must be a 3-letter currency code",
      "job_status: must not be empty",
    ]);
  });

  it("rejects a non-numeric amount", () => {
    const error = mappingErrorFrom(() => mapRecord(makeJobRow(42, { quote: "n/a" })));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith("quote:")).toBe(true);
  });
});

describe("stageRecord", () => {
  it("keeps the row's keyset position", () => {
    const completed = new Date("2025-05-20T10:00:00Z");

    expect(stageRecord(makeJobRow(42, { completed_date: completed })).position).toEqual({
      jobId: 42,
      changedAt: "2025-05-20T10:00:00.000Z",
    });
  });

  it("rejects a row without a usable change timestamp", () => {
    const error = mappingErrorFrom(() => stageRecord(makeJobRow(42, { changed_at: "garbage" })));

    expect(error.issues).toEqual(["changed_at: Invalid date"]);
  });
});
