import type { SourceRecord, Watermark } from "@/sync/types";

interface PageRequestBase {
  limit: number;
  /** Lower bound on `job_created`, `YYYY-MM-DD`. */
  fromDate: string;
  /** ISO instant that caps every change position read in this extraction. */
  asOf: string;
}

export interface FullPageRequest extends PageRequestBase {
  mode: "full";
  afterJobId: number | null;
}

export interface IncrementalPageRequest extends PageRequestBase {
  mode: "incremental";
  after: Watermark | null;
}

export type PageRequest = FullPageRequest | IncrementalPageRequest;

/** One keyset page of the jobs query per call. */
export interface JobsSource {
  readPage(request: PageRequest): Promise<SourceRecord[]>;
  reconnect(): Promise<void>;
  close(): Promise<void>;
}
