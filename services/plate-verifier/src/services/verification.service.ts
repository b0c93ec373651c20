import { Inject, Injectable, Logger } from "@nestjs/common";

import { PersistenceFailureError, describeError } from "../errors.js";
import { clampConfidence, normalizePlate } from "../normalizer.js";
import type {
  AttemptRepository,
  AttemptStats,
  VerificationAttempt,
} from "../repository/attempt.repository.js";
import type { OwnerRecord, OwnerRepository } from "../repository/owner.repository.js";
import { ATTEMPT_REPOSITORY, OWNER_REPOSITORY } from "../tokens.js";
import type { VerificationResult } from "../types.js";

/**
 * Answers "does this scan belong to a registered owner?" and records every
 * attempt. The result is only returned once its audit entry is stored; if the
 * lookup or the append fails the call rejects with PersistenceFailureError
 * instead of reporting a non-match.
 */
@Injectable()
export class VerificationService {
  private readonly logger = new Logger(VerificationService.name);

  constructor(
    @Inject(OWNER_REPOSITORY) private readonly owners: OwnerRepository,
    @Inject(ATTEMPT_REPOSITORY) private readonly attempts: AttemptRepository,
  ) {}

  async verify(scannedText: string, confidence: number): Promise<VerificationResult> {
    const scannedPlate = normalizePlate(scannedText);
    const clamped = clampConfidence(confidence);

    try {
      const owner = scannedPlate ? await this.owners.findByPlate(scannedPlate) : undefined;
      const attempt = await this.attempts.append({
        scannedPlate,
        matchedOwnerId: owner?.ownerId,
        matchFound: owner !== undefined,
        confidence: clamped,
      });
      return buildResult(scannedPlate, owner, attempt);
    } catch (error) {
      this.logger.error(`Verification of plate "${scannedPlate}" failed: ${describeError(error)}`);
      if (error instanceof PersistenceFailureError) {
        throw error;
      }
      throw new PersistenceFailureError(
        `Verification of plate "${scannedPlate}" could not be completed: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  async recentAttempts(limit: number): Promise<VerificationAttempt[]> {
    return this.attempts.recent(limit);
  }

  async attemptStats(): Promise<AttemptStats> {
    return this.attempts.stats();
  }
}

function buildResult(
  scannedPlate: string,
  owner: OwnerRecord | undefined,
  attempt: VerificationAttempt,
): VerificationResult {
  const recorded = {
    scannedPlate,
    confidence: attempt.confidence,
    attemptId: attempt.attemptId,
    scanTimestamp: attempt.scanTimestamp,
  };
  if (owner) {
    return {
      ...recorded,
      matchFound: true,
      owner,
      message: `Match found: ${owner.displayName} (${owner.ownerId})`,
    };
  }
  return {
    ...recorded,
    matchFound: false,
    owner: null,
    message: scannedPlate ? `No record found for plate: ${scannedPlate}` : "No plate text to verify",
  };
}
