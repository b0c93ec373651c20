import { Injectable } from "@nestjs/common";

import { DuplicateKeyError } from "../errors.js";
import { buildStats } from "./attempt.repository.js";
import type {
  AttemptRepository,
  AttemptStats,
  NewVerificationAttempt,
  VerificationAttempt,
} from "./attempt.repository.js";
import type { NewOwner, OwnerRecord, OwnerRepository } from "./owner.repository.js";

type Clock = () => Date;

const systemClock: Clock = () => new Date();

function copyOwner(record: OwnerRecord): OwnerRecord {
  return {
    ...record,
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt),
  };
}

function copyAttempt(attempt: VerificationAttempt): VerificationAttempt {
  return { ...attempt, scanTimestamp: new Date(attempt.scanTimestamp) };
}

@Injectable()
export class InMemoryOwnerRepository implements OwnerRepository {
  // Map iteration follows insertion order.
  private readonly byOwnerId = new Map<string, OwnerRecord>();
  private readonly ownerIdByPlate = new Map<string, string>();

  constructor(private readonly clock: Clock = systemClock) {}

  async insert(owner: NewOwner): Promise<OwnerRecord> {
    if (this.byOwnerId.has(owner.ownerId)) {
      throw new DuplicateKeyError("ownerId", owner.ownerId);
    }
    if (this.ownerIdByPlate.has(owner.plateKey)) {
      throw new DuplicateKeyError("plateKey", owner.plateKey);
    }
    const now = this.clock();
    const record: OwnerRecord = { ...owner, createdAt: now, updatedAt: now };
    this.byOwnerId.set(owner.ownerId, record);
    this.ownerIdByPlate.set(owner.plateKey, owner.ownerId);
    return copyOwner(record);
  }

  async findByPlate(plateKey: string): Promise<OwnerRecord | undefined> {
    const ownerId = this.ownerIdByPlate.get(plateKey);
    const record = ownerId === undefined ? undefined : this.byOwnerId.get(ownerId);
    return record ? copyOwner(record) : undefined;
  }

  async listAll(): Promise<OwnerRecord[]> {
    return Array.from(this.byOwnerId.values(), copyOwner);
  }

  async remove(ownerId: string): Promise<boolean> {
    const record = this.byOwnerId.get(ownerId);
    if (!record) {
      return false;
    }
    this.byOwnerId.delete(ownerId);
    this.ownerIdByPlate.delete(record.plateKey);
    return true;
  }
}

@Injectable()
export class InMemoryAttemptRepository implements AttemptRepository {
  private readonly entries: VerificationAttempt[] = [];
  private nextId = 1;

  constructor(private readonly clock: Clock = systemClock) {}

  async append(entry: NewVerificationAttempt): Promise<VerificationAttempt> {
    const previous = this.entries.at(-1)?.scanTimestamp.getTime() ?? 0;
    const attempt: VerificationAttempt = {
      attemptId: this.nextId,
      scannedPlate: entry.scannedPlate,
      matchedOwnerId: entry.matchedOwnerId,
      matchFound: entry.matchFound,
      confidence: entry.confidence,
      scanTimestamp: new Date(Math.max(previous, this.clock().getTime())),
    };
    this.nextId += 1;
    this.entries.push(attempt);
    return copyAttempt(attempt);
  }

  async recent(limit: number): Promise<VerificationAttempt[]> {
    if (limit <= 0) {
      return [];
    }
    return this.entries.slice(-limit).reverse().map(copyAttempt);
  }

  async stats(): Promise<AttemptStats> {
    const matched = this.entries.filter((entry) => entry.matchFound).length;
    return buildStats(this.entries.length, matched);
  }
}
