import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import pg from "pg";

import type { DatabaseConfig } from "../config.js";
import { PersistenceFailureError, describeError } from "../errors.js";

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS owners (
    id SERIAL PRIMARY KEY,
    owner_id TEXT NOT NULL UNIQUE,
    display_name TEXT NOT NULL,
    vehicle_descriptor TEXT NOT NULL DEFAULT '',
    plate_key TEXT NOT NULL UNIQUE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  // matched_owner_id is captured by value; no foreign key so removals never touch history.
  `CREATE TABLE IF NOT EXISTS verification_attempts (
    id SERIAL PRIMARY KEY,
    scanned_plate TEXT NOT NULL,
    matched_owner_id TEXT,
    match_found BOOLEAN NOT NULL,
    confidence DOUBLE PRECISION NOT NULL,
    scan_timestamp TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
];

/**
 * Owns the connection pool shared by the Postgres repositories. `open()`
 * creates the schema and may be called any number of times.
 */
@Injectable()
export class PostgresDatabase implements OnModuleDestroy {
  private readonly logger = new Logger(PostgresDatabase.name);
  private opened = false;

  constructor(readonly pool: pg.Pool) {}

  static fromConfig(config: DatabaseConfig): PostgresDatabase {
    return new PostgresDatabase(new pg.Pool({
      connectionString: config.url,
      max: config.poolMax,
      connectionTimeoutMillis: config.connectTimeoutMs,
    }));
  }

  async open(): Promise<void> {
    if (this.opened) {
      return;
    }
    try {
      for (const statement of SCHEMA) {
        await this.pool.query(statement);
      }
    } catch (error) {
      throw new PersistenceFailureError(
        `Failed to initialize schema: ${describeError(error)}`,
        { cause: error },
      );
    }
    this.opened = true;
    this.logger.log("Postgres registry schema ready");
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.opened = false;
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }
}
