import type { VerificationAttempt } from "../repository/attempt.repository.js";

export class AttemptResponseDto {
  attemptId!: number;
  scannedPlate!: string;
  matchedOwnerId!: string | null;
  matchFound!: boolean;
  confidence!: number;
  scanTimestamp!: string;
}

export function toAttemptResponse(attempt: VerificationAttempt): AttemptResponseDto {
  return {
    attemptId: attempt.attemptId,
    scannedPlate: attempt.scannedPlate,
    matchedOwnerId: attempt.matchedOwnerId ?? null,
    matchFound: attempt.matchFound,
    confidence: attempt.confidence,
    scanTimestamp: attempt.scanTimestamp.toISOString(),
  };
}
