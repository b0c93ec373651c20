import type { VerificationResult } from "../types.js";
import type { OwnerResponseDto } from "./owner-response.dto.js";
import { toOwnerResponse } from "./owner-response.dto.js";

export class VerificationResponseDto {
  matchFound!: boolean;
  owner!: OwnerResponseDto | null;
  scannedPlate!: string;
  confidence!: number;
  message!: string;
  attemptId!: number;
  scanTimestamp!: string;
}

export function toVerificationResponse(result: VerificationResult): VerificationResponseDto {
  return {
    matchFound: result.matchFound,
    owner: result.matchFound ? toOwnerResponse(result.owner) : null,
    scannedPlate: result.scannedPlate,
    confidence: result.confidence,
    message: result.message,
    attemptId: result.attemptId,
    scanTimestamp: result.scanTimestamp.toISOString(),
  };
}
