import { createPool, type Pool, type RowDataPacket } from "mysql2/promise";
import type { SourceConnectionConfig } from "@/sync/types/api";
import type { SourceRecord } from "@/sync/types";
import { buildPageQuery } from "./query";
import type { JobsSource, PageRequest } from "./types";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("mysql-source");

interface JobRow extends RowDataPacket, SourceRecord {}

export class MysqlJobsSource implements JobsSource {
  private pool: Pool | null = null;

  constructor(private readonly config: SourceConnectionConfig) {}

  private connect(): Pool {
    if (!this.pool) {
      this.pool = createPool({
        host: this.config.host,
        port: this.config.port,
        user: this.config.user,
        password: this.config.password,
        database: this.config.database,
        connectTimeout: this.config.connectTimeoutMs,
        connectionLimit: 2,
        waitForConnections: true,
        enableKeepAlive: true,
        timezone: "Z",
      });
      log.info("Connected to MySQL", { host: this.config.host, database: this.config.database });
    }
    return this.pool;
  }

  async readPage(request: PageRequest): Promise<SourceRecord[]> {
    const { sql, params } = buildPageQuery(request);
    log.debug("Reading source page", { mode: request.mode, limit: request.limit });
    const [rows] = await this.connect().query<JobRow[]>(sql, params);
    return rows;
  }

  async reconnect(): Promise<void> {
    await this.close();
    this.connect();
  }

  async close(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
    }
  }
}
