import type { OwnerRecord } from "./repository/owner.repository.js";

interface VerificationOutcome {
  scannedPlate: string;
  confidence: number;
  message: string;
  attemptId: number;
  scanTimestamp: Date;
}

export interface MatchedVerification extends VerificationOutcome {
  matchFound: true;
  owner: OwnerRecord;
}

export interface UnmatchedVerification extends VerificationOutcome {
  matchFound: false;
  owner: null;
}

export type VerificationResult = MatchedVerification | UnmatchedVerification;

export interface RegisterOwnerInput {
  ownerId: string;
  displayName: string;
  vehicleDescriptor?: string;
  plate: string;
}

export type RegistrationFailureReason =
  | "duplicate_owner_id"
  | "duplicate_plate_key"
  | "invalid_plate";

export type RegistrationResult =
  | { registered: true; owner: OwnerRecord }
  | { registered: false; reason: RegistrationFailureReason; message: string };
