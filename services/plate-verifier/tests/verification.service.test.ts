import { beforeEach, describe, expect, it, vi } from "vitest";

import { PersistenceFailureError } from "../src/errors.js";
import type { VerificationAttempt } from "../src/repository/attempt.repository.js";
import { InMemoryAttemptRepository, InMemoryOwnerRepository } from "../src/repository/memory.repository.js";
import type { OwnerRecord } from "../src/repository/owner.repository.js";
import { VerificationService } from "../src/services/verification.service.js";
import { johnDoe } from "./repository.contract.js";

class UnavailableAttemptRepository extends InMemoryAttemptRepository {
  async append(): Promise<VerificationAttempt> {
    throw new PersistenceFailureError("Attempt append failed: connection refused");
  }
}

class UnreachableOwnerRepository extends InMemoryOwnerRepository {
  async findByPlate(): Promise<OwnerRecord | undefined> {
    throw new Error("socket hang up");
  }
}

describe("VerificationService", () => {
  let owners: InMemoryOwnerRepository;
  let attempts: InMemoryAttemptRepository;
  let service: VerificationService;

  beforeEach(async () => {
    owners = new InMemoryOwnerRepository();
    attempts = new InMemoryAttemptRepository();
    service = new VerificationService(owners, attempts);
    await owners.insert(johnDoe);
  });

  it("matches a scan to its registered owner after normalizing it", async () => {
    const result = await service.verify("abc1234", 0.95);

    expect(result.matchFound).toBe(true);
    expect(result.owner?.displayName).toBe("John Doe");
    expect(result.scannedPlate).toBe("ABC1234");
    expect(result.confidence).toBe(0.95);
    expect(result.message).toBe("Match found: John Doe (STU001)");

    const [attempt] = await attempts.recent(1);
    expect(attempt).toMatchObject({
      attemptId: result.attemptId,
      scannedPlate: "ABC1234",
      matchedOwnerId: "STU001",
      matchFound: true,
      confidence: 0.95,
    });
  });

  it("records unmatched scans without an owner reference", async () => {
    const result = await service.verify("UNKNOWN99", 0.85);

    expect(result).toMatchObject({
      matchFound: false,
      owner: null,
      scannedPlate: "UNKNOWN99",
      message: "No record found for plate: UNKNOWN99",
    });
    const [attempt] = await attempts.recent(1);
    expect(attempt?.matchFound).toBe(false);
    expect(attempt?.matchedOwnerId).toBeUndefined();
  });

  it("treats internal spaces as part of the plate", async () => {
    const result = await service.verify("ABC 1234", 0.9);

    expect(result.matchFound).toBe(false);
    expect(result.scannedPlate).toBe("ABC 1234");
  });

  it("records blank scans without looking them up", async () => {
    const lookup = vi.spyOn(owners, "findByPlate");

    const result = await service.verify("   ", 0.3);

    expect(lookup).not.toHaveBeenCalled();
    expect(result).toMatchObject({ matchFound: false, scannedPlate: "", message: "No plate text to verify" });
    await expect(attempts.stats()).resolves.toMatchObject({ total: 1, matched: 0 });
  });

  it("adds exactly one attempt per call whatever the outcome", async () => {
    const inputs = ["abc1234", "nope", "", "ABC 1234", " abc1234 "];
    for (const [index, text] of inputs.entries()) {
      await service.verify(text, 0.5);
      await expect(attempts.stats()).resolves.toMatchObject({ total: index + 1 });
    }
    await expect(attempts.stats()).resolves.toEqual({ total: 5, matched: 2, unmatched: 3, matchRate: 0.4 });
  });

  it("clamps confidence before recording it", async () => {
    const high = await service.verify("abc1234", 1.4);
    const low = await service.verify("abc1234", -3);

    expect(high.confidence).toBe(1);
    expect(low.confidence).toBe(0);
    const recorded = await attempts.recent(2);
    expect(recorded.map((attempt) => attempt.confidence)).toEqual([0, 1]);
  });

  it("returns recent attempts most recent first", async () => {
    for (const text of ["a1", "a2", "a3", "a4", "a5"]) {
      await service.verify(text, 0.7);
    }

    const recent = await service.recentAttempts(2);
    expect(recent.map((attempt) => attempt.scannedPlate)).toEqual(["A5", "A4"]);
  });

  it("keeps history intact when the matched owner is removed", async () => {
    await service.verify("abc1234", 0.95);
    const before = await attempts.recent(10);

    await owners.remove("STU001");

    await expect(attempts.recent(10)).resolves.toEqual(before);
    const after = await service.verify("abc1234", 0.95);
    expect(after.matchFound).toBe(false);
  });

  it("surfaces an append failure instead of a result", async () => {
    service = new VerificationService(owners, new UnavailableAttemptRepository());

    await expect(service.verify("abc1234", 0.95)).rejects.toThrow(
      "Attempt append failed: connection refused",
    );
    await expect(service.verify("UNKNOWN99", 0.95)).rejects.toBeInstanceOf(PersistenceFailureError);
  });

  it("surfaces a lookup failure as a persistence failure and records nothing", async () => {
    service = new VerificationService(new UnreachableOwnerRepository(), attempts);

    const error = await service.verify("abc1234", 0.95).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(PersistenceFailureError);
    expect(error).toMatchObject({
      message: 'Verification of plate "ABC1234" could not be completed: socket hang up',
    });
    await expect(attempts.stats()).resolves.toMatchObject({ total: 0 });
  });
});
