import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { Pool, type PoolClient, type QueryResultRow } from "pg";
import { getApiEnv } from "../common/env";

/** Anything that runs SQL: the pool itself, or a client inside a transaction. */
export interface DbExecutor {
  query<R extends QueryResultRow>(text: string, values?: readonly unknown[]): Promise<R[]>;
}

class ClientExecutor implements DbExecutor {
  constructor(private readonly client: PoolClient) {}

  async query<R extends QueryResultRow>(text: string, values: readonly unknown[] = []) {
    const result = await this.client.query<R>(text, [...values]);
    return result.rows;
  }
}

@Injectable()
export class DatabaseService implements DbExecutor, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;

  constructor() {
    const env = getApiEnv();
    this.pool = new Pool({ connectionString: env.DATABASE_URL, max: env.DATABASE_POOL_MAX });
    this.pool.on("error", (error) => {
      this.logger.error(`Idle database client failed: ${error.message}`, error.stack);
    });
  }

  async query<R extends QueryResultRow>(text: string, values: readonly unknown[] = []) {
    const result = await this.pool.query<R>(text, [...values]);
    return result.rows;
  }

  /** Runs `work` on one client between BEGIN and COMMIT, rolling back if it throws. */
  async transaction<T>(work: (tx: DbExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await work(new ClientExecutor(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        this.logger.error("Rollback failed", rollbackError instanceof Error ? rollbackError.stack : undefined);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async ping() {
    await this.pool.query("SELECT 1");
  }

  async onModuleDestroy() {
    await this.pool.end();
  }
}

/** True for a Postgres unique constraint violation. */
export const isUniqueViolation = (error: unknown) =>
  typeof error === "object" && error !== null && "code" in error && error.code === "23505";
