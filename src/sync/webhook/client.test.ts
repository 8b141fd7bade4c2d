import { beforeEach, describe, expect, it, vi } from "vitest";
import { Batcher } from "@/sync/pipeline/batcher";
import { makeJobRows } from "@/sync/testing";
import type { Batch } from "@/sync/types";
import { WebhookClient } from "./client";
import { stageRecord } from "./mappers";
import type { Sleep } from "./retry";

const settings = {
  baseUrl: "https://forecast.example.test/",
  apiKey: "test-api-key",
  requestTimeoutMs: 30_000,
};
const retry = { maxAttempts: 3, baseDelayMs: 2_000, maxDelayMs: 30_000, jitter: 0 };

function batchOf(count: number): Batch {
  const batcher = new Batcher({ maxRecords: 1_000 });
  for (const row of makeJobRows(count)) batcher.push(stageRecord(row));
  const batch = batcher.flush();
  if (!batch) throw new Error("empty batch");
  return batch;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function timeoutError(): Error {
  return Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
}

describe("WebhookClient", () => {
  const fetchMock = vi.fn<typeof fetch>();
  const sleepMock = vi.fn<Sleep>();
  let client: WebhookClient;

  beforeEach(() => {
    fetchMock.mockReset();
    sleepMock.mockReset();
    sleepMock.mockResolvedValue(undefined);
    client = new WebhookClient(settings, retry, { fetch: fetchMock, sleep: sleepMock });
  });

  it("posts the batch and reads the receipt", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ inserted: 2, updated: 1 }));
    const batch = batchOf(3);

    const result = await client.send(batch);

    expect(result).toEqual({
      outcome: "success",
      attemptCount: 1,
      errorDetail: null,
      status: 200,
      receipt: { inserted: 2, updated: 1 },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://forecast.example.test/webhook");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "X-Api-Key": "test-api-key",
      "Content-Type": "application/json",
      Accept: "application/json",
    });
    expect(init?.body).toBe(JSON.stringify({ data: batch.records }));
  });

  it("retries timeouts and succeeds on the third attempt", async () => {
    fetchMock
      .mockRejectedValueOnce(timeoutError())
      .mockRejectedValueOnce(timeoutError())
      .mockResolvedValueOnce(jsonResponse({ inserted: 1, updated: 0 }));

    const result = await client.send(batchOf(1));

    expect(result.outcome).toBe("success");
    expect(result.attemptCount).toBe(3);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleepMock.mock.calls.map(([ms]) => ms)).toEqual([2_000, 4_000]);
  });

  it("gives up after the last attempt on repeated 5xx", async () => {
    fetchMock.mockImplementation(() =>
      Promise.resolve(new Response("busy", { status: 503, statusText: "Service Unavailable" })),
    );

    const result = await client.send(batchOf(2));

    expect(result).toEqual({
      outcome: "retryable",
      attemptCount: 3,
      errorDetail: "HTTP 503 Service Unavailable: busy",
      status: 503,
      receipt: null,
    });
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleepMock).toHaveBeenCalledTimes(2);
  });

  it("treats an authentication failure as fatal without retrying", async () => {
    fetchMock.mockResolvedValueOnce(new Response("invalid key", { status: 401, statusText: "Unauthorized" }));

    const result = await client.send(batchOf(1));

    expect(result).toEqual({
      outcome: "fatal",
      attemptCount: 1,
      errorDetail: "HTTP 401 Unauthorized: invalid key",
      status: 401,
      receipt: null,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleepMock).not.toHaveBeenCalled();
  });

  it.each([400, 404, 422, 429])("treats HTTP %i as fatal", async (status) => {
    fetchMock.mockResolvedValueOnce(new Response("rejected", { status }));

    const result = await client.send(batchOf(1));

    expect(result.outcome).toBe("fatal");
    expect(result.status).toBe(status);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports the socket error code of a transport failure", async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } }))
      .mockResolvedValueOnce(jsonResponse({ inserted: 1 }));
    const single = new WebhookClient(settings, { ...retry, maxAttempts: 1 }, { fetch: fetchMock, sleep: sleepMock });

    const result = await single.send(batchOf(1));

    expect(result).toEqual({
      outcome: "retryable",
      attemptCount: 1,
      errorDetail: "fetch failed (ECONNREFUSED)",
      status: null,
      receipt: null,
    });
  });

  it("describes a request timeout", async () => {
    fetchMock.mockRejectedValue(timeoutError());

    const result = await client.send(batchOf(1));

    expect(result.errorDetail).toBe("Request timed out after 30000ms");
    expect(result.attemptCount).toBe(3);
  });

  it("accepts a 2xx without a JSON receipt", async () => {
    fetchMock.mockResolvedValueOnce(new Response("ok", { status: 200 }));

    const result = await client.send(batchOf(1));

    expect(result.outcome).toBe("success");
    expect(result.receipt).toBeNull();
  });

  it("defaults missing receipt counts to zero", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ inserted: 4 }));

    expect((await client.send(batchOf(4))).receipt).toEqual({ inserted: 4, updated: 0 });
  });

  it("stops retrying when the backoff wait is cancelled", async () => {
    fetchMock.mockResolvedValue(new Response("busy", { status: 502, statusText: "Bad Gateway" }));
    sleepMock.mockRejectedValueOnce(new Error("aborted"));

    const result = await client.send(batchOf(1));

    expect(result).toEqual({
      outcome: "retryable",
      attemptCount: 1,
      errorDetail: "HTTP 502 Bad Gateway: busy; retry cancelled",
      status: 502,
      receipt: null,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
