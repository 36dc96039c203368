const PREFIX_LENGTH = 3;
const MIDDLE_LENGTH = 2;
const SUFFIX_LENGTH = 4;

/**
 * Round half to even, so 2.5 -> 2 and 3.5 -> 4.
 */
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Compact "serial" form of an analysis identifier:
 * first 3 characters, 2 characters from the middle, last 4 characters.
 *
 * Returns null when the identifier is too short for every slice to be taken
 * in full.
 */
export function deriveSerialForm(analysisId: string): string | null {
  const middleStart = roundHalfEven(analysisId.length / 2);

  if (
    analysisId.length < PREFIX_LENGTH ||
    analysisId.length < SUFFIX_LENGTH ||
    middleStart + MIDDLE_LENGTH > analysisId.length
  ) {
    return null;
  }

  const prefix = analysisId.slice(0, PREFIX_LENGTH);
  const middle = analysisId.slice(middleStart, middleStart + MIDDLE_LENGTH);
  const suffix = analysisId.slice(-SUFFIX_LENGTH);

  return `${prefix}-${middle}-${suffix}`;
}
