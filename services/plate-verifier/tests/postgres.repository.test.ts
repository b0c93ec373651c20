import { DataType, newDb } from "pg-mem";
import { describe, expect, it, vi } from "vitest";

import { PersistenceFailureError } from "../src/errors.js";
import type { NewOwner } from "../src/repository/owner.repository.js";
import { PostgresDatabase } from "../src/repository/postgres.database.js";
import { PostgresAttemptRepository, PostgresOwnerRepository } from "../src/repository/postgres.repository.js";
import { describeAttemptRepository, describeOwnerRepository, johnDoe } from "./repository.contract.js";

async function openDatabase(): Promise<PostgresDatabase> {
  const db = newDb({ noAstCoverageCheck: true });
  // In-process store has a single writer; the lock only has to exist.
  db.public.registerFunction({
    name: "pg_advisory_xact_lock",
    args: [DataType.integer],
    returns: DataType.bool,
    implementation: () => true,
    impure: true,
  });
  const { Pool } = db.adapters.createPg();
  const database = new PostgresDatabase(new Pool());
  await database.open();
  return database;
}

/** Reports a conflict whose row is gone by the time it is looked up. */
class VanishingConflictOwnerRepository extends PostgresOwnerRepository {
  constructor(database: PostgresDatabase, private vanishedConflicts: number) {
    super(database);
  }

  protected async insertUnlessConflicting(owner: NewOwner) {
    if (this.vanishedConflicts > 0) {
      this.vanishedConflicts -= 1;
      return undefined;
    }
    return super.insertUnlessConflicting(owner);
  }
}

describeOwnerRepository("postgres", async () => new PostgresOwnerRepository(await openDatabase()));
describeAttemptRepository("postgres", async () => new PostgresAttemptRepository(await openDatabase()));

describe("postgres repositories", () => {
  it("creates the schema idempotently", async () => {
    const database = await openDatabase();
    const owners = new PostgresOwnerRepository(database);
    await owners.insert(johnDoe);

    await database.open();
    await new PostgresDatabase(database.pool).open();

    await expect(owners.listAll()).resolves.toHaveLength(1);
  });

  it("leaves attempts untouched when the matched owner is removed", async () => {
    const database = await openDatabase();
    const owners = new PostgresOwnerRepository(database);
    const attempts = new PostgresAttemptRepository(database);
    await owners.insert(johnDoe);
    const attempt = await attempts.append({ scannedPlate: "ABC1234", matchedOwnerId: "STU001", matchFound: true, confidence: 0.95 });

    await owners.remove("STU001");

    await expect(attempts.recent(1)).resolves.toEqual([attempt]);
  });

  it("reports storage errors as persistence failures", async () => {
    const database = await openDatabase();
    const owners = new PostgresOwnerRepository(database);
    const attempts = new PostgresAttemptRepository(database);
    await database.pool.query("DROP TABLE owners");
    await database.pool.query("DROP TABLE verification_attempts");

    await expect(owners.findByPlate("ABC1234")).rejects.toBeInstanceOf(PersistenceFailureError);
    await expect(owners.insert(johnDoe)).rejects.toBeInstanceOf(PersistenceFailureError);
    await expect(
      attempts.append({ scannedPlate: "ABC1234", matchFound: false, confidence: 0.5 }),
    ).rejects.toThrow(/^Attempt append failed/);
  });

  it("keeps appending after a failed append", async () => {
    const database = await openDatabase();
    const attempts = new PostgresAttemptRepository(database);
    vi.spyOn(database.pool, "connect").mockRejectedValueOnce(new Error("connection reset"));

    await expect(
      attempts.append({ scannedPlate: "P1", matchFound: false, confidence: 0.5 }),
    ).rejects.toThrow("Attempt append failed: connection reset");

    const stored = await attempts.append({ scannedPlate: "P2", matchFound: false, confidence: 0.5 });
    expect(stored.scannedPlate).toBe("P2");
    await expect(attempts.recent(10)).resolves.toEqual([stored]);
  });

  it("never stamps an attempt earlier than the newest one stored", async () => {
    const database = await openDatabase();
    const attempts = new PostgresAttemptRepository(database);
    // Written while the database clock was ahead of where it is now.
    await database.pool.query(
      `INSERT INTO verification_attempts (scanned_plate, match_found, confidence, scan_timestamp)
       VALUES ('P1', FALSE, 0.5, '2099-01-01T00:00:00.000Z')`,
    );

    const first = await attempts.append({ scannedPlate: "P2", matchFound: false, confidence: 0.5 });
    const second = await attempts.append({ scannedPlate: "P3", matchFound: false, confidence: 0.5 });

    expect(first.scanTimestamp.toISOString()).toBe("2099-01-01T00:00:00.000Z");
    expect(second.scanTimestamp.toISOString()).toBe("2099-01-01T00:00:00.000Z");
    expect(second.attemptId).toBeGreaterThan(first.attemptId);
  });

  it("registers once a conflicting row has been removed", async () => {
    const database = await openDatabase();
    const owners = new VanishingConflictOwnerRepository(database, 1);

    const stored = await owners.insert(johnDoe);

    expect(stored.ownerId).toBe("STU001");
    await expect(owners.listAll()).resolves.toEqual([stored]);
  });

  it("gives up when conflicts keep vanishing", async () => {
    const database = await openDatabase();
    const owners = new VanishingConflictOwnerRepository(database, 2);

    await expect(owners.insert(johnDoe)).rejects.toThrow(
      "Registration of STU001 kept conflicting with records that no longer exist",
    );
    await expect(owners.listAll()).resolves.toEqual([]);
  });
});
