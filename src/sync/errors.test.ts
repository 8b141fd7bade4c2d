import { describe, expect, it } from "vitest";
import { DispatchError, ExtractionError, RunLockError, describeError, errorMessage } from "./errors";

describe("describeError", () => {
  it("surfaces a dispatch failure's classification and status", () => {
    const error = new DispatchError("Webhook rejected batch 3: HTTP 422", "fatal", { sequence: 3, firstJobId: 401, lastJobId: 600 }, 422);

    expect(describeError(error)).toEqual({
      error: "Webhook rejected batch 3: HTTP 422",
      name: "DispatchError",
      stage: "DISPATCH",
      sequence: 3,
      firstJobId: 401,
      lastJobId: 600,
      classification: "fatal",
      statusCode: 422,
    });
  });

  it("names the run holding the lock", () => {
    const error = new RunLockError("run-a", "2025-06-01T00:00:00.000Z");

    expect(describeError(error)).toEqual({
      error: "Sync state is locked by run run-a (last active 2025-06-01T00:00:00.000Z)",
      name: "RunLockError",
      stage: "INIT",
      holder: "run-a",
      acquiredAt: "2025-06-01T00:00:00.000Z",
    });
  });

  it("spreads the context of other engine errors", () => {
    const error = new ExtractionError("Source query failed: timeout", { code: "ETIMEDOUT", context: { page: 2 } });

    expect(describeError(error)).toEqual({
      error: "Source query failed: timeout",
      name: "ExtractionError",
      stage: "EXTRACT",
      page: 2,
    });
  });

  it("falls back to the message for plain values", () => {
    expect(describeError(new TypeError("bad"))).toEqual({ error: "bad", name: "TypeError" });
    expect(describeError("boom")).toEqual({ error: "boom" });
    expect(errorMessage(42)).toBe("42");
  });
});
