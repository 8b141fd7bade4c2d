import { z } from "zod";

export interface SourceConnectionConfig {
  host: string;
  user: string;
  password: string;
  database: string;
  port: number;
  connectTimeoutMs: number;
}

export interface WebhookCredentials {
  baseUrl: string;
  apiKey: string;
}

/** Body the webhook answers a successful POST with. Both counts are optional. */
export const webhookReceiptSchema = z.object({
  inserted: z.number().int().nonnegative().default(0),
  updated: z.number().int().nonnegative().default(0),
});
