export interface NewVerificationAttempt {
  scannedPlate: string;
  matchedOwnerId?: string;
  matchFound: boolean;
  confidence: number;
}

export interface VerificationAttempt extends NewVerificationAttempt {
  attemptId: number;
  scanTimestamp: Date;
}

export interface AttemptStats {
  total: number;
  matched: number;
  unmatched: number;
  matchRate: number;
}

export interface AttemptRepository {
  append(entry: NewVerificationAttempt): Promise<VerificationAttempt>;
  /** Most recent first. */
  recent(limit: number): Promise<VerificationAttempt[]>;
  stats(): Promise<AttemptStats>;
}

export function buildStats(total: number, matched: number): AttemptStats {
  return {
    total,
    matched,
    unmatched: total - matched,
    matchRate: total === 0 ? 0 : Number((matched / total).toFixed(4)),
  };
}
