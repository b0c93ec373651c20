export interface Owner {
  ownerId: string;
  displayName: string;
  vehicleDescriptor: string;
  plateKey: string;
  createdAt: string;
  updatedAt: string;
}

export interface RegisterOwnerRequest {
  ownerId: string;
  displayName: string;
  vehicleDescriptor?: string;
  plate: string;
}

export type RegisterOwnerResult =
  | { registered: true; owner: Owner }
  | {
    registered: false;
    reason: 'duplicate_owner_id' | 'duplicate_plate_key' | 'invalid_input';
    message: string;
  };

interface VerificationBase {
  scannedPlate: string;
  confidence: number;
  message: string;
  attemptId: number;
  scanTimestamp: string;
}

export type VerificationResponse =
  | (VerificationBase & { matchFound: true; owner: Owner })
  | (VerificationBase & { matchFound: false; owner: null });

export interface VerificationAttempt {
  attemptId: number;
  scannedPlate: string;
  matchedOwnerId: string | null;
  matchFound: boolean;
  confidence: number;
  scanTimestamp: string;
}

export interface AttemptStats {
  total: number;
  matched: number;
  unmatched: number;
  matchRate: number;
}
