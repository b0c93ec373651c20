import { Injectable, Logger } from "@nestjs/common";
import type pg from "pg";

import { DuplicateKeyError, PersistenceFailureError, describeError } from "../errors.js";
import { buildStats } from "./attempt.repository.js";
import type {
  AttemptRepository,
  AttemptStats,
  NewVerificationAttempt,
  VerificationAttempt,
} from "./attempt.repository.js";
import type { NewOwner, OwnerRecord, OwnerRepository } from "./owner.repository.js";
import type { PostgresDatabase } from "./postgres.database.js";

type OwnerRow = {
  owner_id: string;
  display_name: string;
  vehicle_descriptor: string;
  plate_key: string;
  created_at: Date;
  updated_at: Date;
};

type AttemptRow = {
  id: number | string;
  scanned_plate: string;
  matched_owner_id: string | null;
  match_found: boolean;
  confidence: number | string;
  scan_timestamp: Date;
};

type CountRow = {
  count: number | string;
};

type ClockRow = {
  db_now: Date;
};

const OWNER_COLUMNS = "owner_id, display_name, vehicle_descriptor, plate_key, created_at, updated_at";
const ATTEMPT_COLUMNS = "id, scanned_plate, matched_owner_id, match_found, confidence, scan_timestamp";

// Transaction-scoped advisory lock shared by every instance appending to the log.
const APPEND_LOCK_KEY = 7314001;
const INSERT_ATTEMPTS = 2;

function toOwner(row: OwnerRow): OwnerRecord {
  return {
    ownerId: row.owner_id,
    displayName: row.display_name,
    vehicleDescriptor: row.vehicle_descriptor,
    plateKey: row.plate_key,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toAttempt(row: AttemptRow): VerificationAttempt {
  return {
    attemptId: Number(row.id),
    scannedPlate: row.scanned_plate,
    matchedOwnerId: row.matched_owner_id ?? undefined,
    matchFound: row.match_found,
    confidence: Number(row.confidence),
    scanTimestamp: new Date(row.scan_timestamp),
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "23505";
}

async function guard<T>(operation: string, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    if (error instanceof DuplicateKeyError || error instanceof PersistenceFailureError) {
      throw error;
    }
    throw new PersistenceFailureError(`${operation} failed: ${describeError(error)}`, { cause: error });
  }
}

@Injectable()
export class PostgresOwnerRepository implements OwnerRepository {
  constructor(private readonly database: PostgresDatabase) {}

  async insert(owner: NewOwner): Promise<OwnerRecord> {
    return guard("Owner registration", async () => {
      // The conflicting row may be removed before it is looked up; insert again.
      for (let attempt = 0; attempt < INSERT_ATTEMPTS; attempt += 1) {
        const row = await this.insertUnlessConflicting(owner);
        if (row) {
          return toOwner(row);
        }
        const conflict = await this.findConflict(owner);
        if (conflict) {
          throw conflict;
        }
      }
      throw new PersistenceFailureError(
        `Registration of ${owner.ownerId} kept conflicting with records that no longer exist`,
      );
    });
  }

  async findByPlate(plateKey: string): Promise<OwnerRecord | undefined> {
    return guard("Plate lookup", async () => {
      const result = await this.database.pool.query<OwnerRow>(
        `SELECT ${OWNER_COLUMNS} FROM owners WHERE plate_key = $1`,
        [plateKey],
      );
      const row = result.rows[0];
      return row ? toOwner(row) : undefined;
    });
  }

  async listAll(): Promise<OwnerRecord[]> {
    return guard("Owner listing", async () => {
      const result = await this.database.pool.query<OwnerRow>(
        `SELECT ${OWNER_COLUMNS} FROM owners ORDER BY id ASC`,
      );
      return result.rows.map(toOwner);
    });
  }

  async remove(ownerId: string): Promise<boolean> {
    return guard("Owner removal", async () => {
      const result = await this.database.pool.query<Pick<OwnerRow, "owner_id">>(
        "DELETE FROM owners WHERE owner_id = $1 RETURNING owner_id",
        [ownerId],
      );
      return result.rows.length > 0;
    });
  }

  protected async insertUnlessConflicting(owner: NewOwner): Promise<OwnerRow | undefined> {
    try {
      const result = await this.database.pool.query<OwnerRow>(
        `INSERT INTO owners (owner_id, display_name, vehicle_descriptor, plate_key)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT DO NOTHING
         RETURNING ${OWNER_COLUMNS}`,
        [owner.ownerId, owner.displayName, owner.vehicleDescriptor, owner.plateKey],
      );
      return result.rows[0];
    } catch (error) {
      if (isUniqueViolation(error)) {
        return undefined;
      }
      throw error;
    }
  }

  private async findConflict(owner: NewOwner): Promise<DuplicateKeyError | undefined> {
    const existing = await this.database.pool.query<Pick<OwnerRow, "owner_id" | "plate_key">>(
      "SELECT owner_id, plate_key FROM owners WHERE owner_id = $1 OR plate_key = $2",
      [owner.ownerId, owner.plateKey],
    );
    if (existing.rows.some((row) => row.owner_id === owner.ownerId)) {
      return new DuplicateKeyError("ownerId", owner.ownerId);
    }
    if (existing.rows.some((row) => row.plate_key === owner.plateKey)) {
      return new DuplicateKeyError("plateKey", owner.plateKey);
    }
    return undefined;
  }
}

@Injectable()
export class PostgresAttemptRepository implements AttemptRepository {
  private readonly logger = new Logger(PostgresAttemptRepository.name);
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly database: PostgresDatabase) {}

  async append(entry: NewVerificationAttempt): Promise<VerificationAttempt> {
    return this.serialize(() => guard("Attempt append", () => this.insertAttempt(entry)));
  }

  async recent(limit: number): Promise<VerificationAttempt[]> {
    if (limit <= 0) {
      return [];
    }
    return guard("Attempt history read", async () => {
      const result = await this.database.pool.query<AttemptRow>(
        `SELECT ${ATTEMPT_COLUMNS} FROM verification_attempts ORDER BY id DESC LIMIT $1`,
        [limit],
      );
      return result.rows.map(toAttempt);
    });
  }

  async stats(): Promise<AttemptStats> {
    return guard("Attempt statistics", async () => {
      const total = await this.database.pool.query<CountRow>(
        "SELECT COUNT(*) AS count FROM verification_attempts",
      );
      const matched = await this.database.pool.query<CountRow>(
        "SELECT COUNT(*) AS count FROM verification_attempts WHERE match_found = TRUE",
      );
      return buildStats(Number(total.rows[0]?.count ?? 0), Number(matched.rows[0]?.count ?? 0));
    });
  }

  /**
   * Stamps the row with the later of the database clock and the newest
   * stored timestamp, under the append lock, so timestamps never decrease
   * in id order even when the clock steps back or several instances write.
   */
  private async insertAttempt(entry: NewVerificationAttempt): Promise<VerificationAttempt> {
    const client = await this.database.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(`SELECT pg_advisory_xact_lock(${APPEND_LOCK_KEY})`);
      const clock = await client.query<ClockRow>("SELECT NOW() AS db_now");
      const latest = await client.query<Pick<AttemptRow, "scan_timestamp">>(
        "SELECT scan_timestamp FROM verification_attempts ORDER BY id DESC LIMIT 1",
      );
      const now = clock.rows[0]?.db_now;
      if (!now) {
        throw new PersistenceFailureError("Database clock returned no row");
      }
      const previous = latest.rows[0]?.scan_timestamp;
      const stamp = new Date(
        Math.max(new Date(now).getTime(), previous ? new Date(previous).getTime() : 0),
      );
      const result = await client.query<AttemptRow>(
        `INSERT INTO verification_attempts (scanned_plate, matched_owner_id, match_found, confidence, scan_timestamp)
         VALUES ($1, $2, $3, $4, $5::timestamptz)
         RETURNING ${ATTEMPT_COLUMNS}`,
        [entry.scannedPlate, entry.matchedOwnerId ?? null, entry.matchFound, entry.confidence, stamp.toISOString()],
      );
      const row = result.rows[0];
      if (!row) {
        throw new PersistenceFailureError("Attempt append returned no row");
      }
      await client.query("COMMIT");
      return toAttempt(row);
    } catch (error) {
      await this.rollback(client, error);
      throw error;
    } finally {
      client.release();
    }
  }

  private async rollback(client: pg.PoolClient, cause: unknown): Promise<void> {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      this.logger.warn(
        `Rollback after "${describeError(cause)}" failed: ${describeError(rollbackError)}`,
      );
    }
  }

  // Appends from this process wait here rather than on the database lock,
  // holding at most one pooled connection.
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.catch((error: unknown) => {
      this.logger.debug(`Append queue continuing after failure: ${describeError(error)}`);
    });
    return run;
  }
}
