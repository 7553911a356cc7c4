/**
 * Playfair cipher engine
 *
 * Holds one immutable key square; encode and decode are pure functions of
 * the square and the input, so one instance can be shared freely.
 *
 * Only lowercase a-z are cipher letters. Uppercase, digits, punctuation and
 * any non-ASCII text pass through untouched, so callers wanting
 * case-insensitive behaviour should lowercase first.
 *
 * @example
 * const cipher = new PlayfairCipher('playfair example');
 * cipher.encode('hide the gold in the tree stump');
 * // 'bmod zbx dnab ek udm uixmm ouvif'
 */

import { transformText, type Direction } from './digraph.js';
import { KeySquare } from './square.js';

export class PlayfairCipher {
  readonly square: KeySquare;

  constructor(key: string) {
    this.square = KeySquare.build(key);
  }

  /**
   * @throws {EncodingError} if the output cannot be reassembled into text
   */
  encode(text: string): string {
    return transformText(this.square, text, 'encode');
  }

  /**
   * @throws {EncodingError} if the output cannot be reassembled into text
   */
  decode(text: string): string {
    return transformText(this.square, text, 'decode');
  }

  transform(text: string, direction: Direction): string {
    return transformText(this.square, text, direction);
  }
}
