/**
 * Digraph transform
 *
 * Groups the letters of a text into pairs and substitutes each pair through
 * the key square. Everything that is not a lowercase a-z code unit is copied
 * through untouched and never takes part in pairing. The walk is over UTF-16
 * code units, so surrogate pairs and lone surrogates are copied verbatim.
 */

import { FILLER_INDEX, letterIndex } from './alphabet.js';
import { EncodingError } from './errors.js';
import type { KeySquare } from './square.js';

export type Direction = 'encode' | 'decode';

const ROW_STEP = 8;
const ROW_MASK = 0o70;
const COL_MASK = 7;

const MAX_CODE_UNIT = 0xffff;
const CHUNK_SIZE = 8192;

/**
 * Substitute one pair of alphabet slots, returning the two output letters
 * as char codes
 */
export function substitutePair(
  square: KeySquare,
  a: number,
  b: number,
  direction: Direction
): [number, number] {
  return substitute(square, a, b, direction, false);
}

function substitute(
  square: KeySquare,
  a: number,
  b: number,
  direction: Direction,
  redispatched: boolean
): [number, number] {
  const posA = square.positionOf(a);
  const posB = square.positionOf(b);

  if (posA === posB) {
    // x paired with x has no classical rule; leave it as is
    if (a === FILLER_INDEX || redispatched) {
      return [square.letterAt(posA), square.letterAt(posB)];
    }
    return substitute(square, a, FILLER_INDEX, direction, true);
  }

  const forward = direction === 'encode';

  if ((posA & COL_MASK) === (posB & COL_MASK)) {
    const step = forward ? ROW_STEP : -ROW_STEP;
    return [square.letterAt(posA + step), square.letterAt(posB + step)];
  }

  if ((posA & ROW_MASK) === (posB & ROW_MASK)) {
    const step = forward ? 1 : -1;
    return [square.letterAt(posA + step), square.letterAt(posB + step)];
  }

  // Rectangle: own row, partner's column. Self-inverse.
  return [
    square.letterAt((posA & ROW_MASK) | (posB & COL_MASK)),
    square.letterAt((posB & ROW_MASK) | (posA & COL_MASK)),
  ];
}

interface PendingLetter {
  offset: number;
  index: number;
}

/**
 * Encode or decode a whole text
 */
export function transformText(square: KeySquare, text: string, direction: Direction): string {
  const output: number[] = [];
  let pending: PendingLetter | null = null;

  const emit = (first: PendingLetter, second: number): void => {
    const [a, b] = substitutePair(square, first.index, second, direction);
    output[first.offset] = a;
    output.push(b);
  };

  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    const index = letterIndex(unit);
    if (index === null) {
      output.push(unit);
      continue;
    }

    if (pending !== null) {
      if (pending.index === index) {
        // Split the doubled letter; the second one opens the next pair
        emit(pending, FILLER_INDEX);
      } else {
        emit(pending, index);
        pending = null;
        continue;
      }
    }

    // Reserve the slot; it is overwritten once the pair is complete
    pending = { offset: output.length, index };
    output.push(0);
  }

  if (pending !== null) {
    emit(pending, FILLER_INDEX);
  }

  return assembleText(output);
}

/**
 * Turn transformed UTF-16 code units back into a string
 */
export function assembleText(units: readonly number[]): string {
  const chunks: string[] = [];

  for (let start = 0; start < units.length; start += CHUNK_SIZE) {
    const chunk = units.slice(start, start + CHUNK_SIZE);
    const bad = chunk.findIndex(unit => !Number.isInteger(unit) || unit < 0 || unit > MAX_CODE_UNIT);
    if (bad !== -1) {
      throw new EncodingError(`Invalid code unit ${String(chunk[bad])} at offset ${start + bad}`);
    }
    chunks.push(String.fromCharCode(...chunk));
  }

  return chunks.join('');
}
