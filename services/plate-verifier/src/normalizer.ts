/**
 * Maps scanned plate text to the canonical key used for registry storage and
 * lookup: surrounding whitespace trimmed, letters uppercased. Spaces inside the
 * plate are kept, so "ABC 1234" and "ABC1234" are different keys.
 */
export function normalizePlate(raw: string): string {
  return raw.trim().toUpperCase();
}

export function clampConfidence(confidence: number): number {
  if (Number.isNaN(confidence)) {
    return 0;
  }
  return Math.min(1, Math.max(0, confidence));
}
