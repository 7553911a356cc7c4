/**
 * Playfair alphabet
 *
 * 25 slots, one per letter a-z with i and j sharing a slot.
 */

const CODE_A = 0x61; // 'a'
const CODE_J = 0x6a; // 'j'

export const ALPHABET_SIZE = 25;

// Slot shared by i and j
export const IJ_INDEX = 0x69 - CODE_A;

// Slot of 'x', inserted between doubled letters and after a trailing odd letter
export const FILLER_INDEX = 0x78 - CODE_A - 1;

/**
 * Map a character code to its alphabet slot, or null when it is not a
 * lowercase ASCII letter
 */
export function letterIndex(code: number): number | null {
  const offset = code - CODE_A;
  if (offset < 0 || offset >= 26) {
    return null;
  }
  return code < CODE_J ? offset : offset - 1;
}

/**
 * Letter stored for a slot. The shared i/j slot always yields 'i'.
 */
export function canonicalLetter(index: number): number {
  return index <= IJ_INDEX ? CODE_A + index : CODE_A + index + 1;
}
