/**
 * Key Square
 *
 * The 5x5 Playfair grid built from a key. Positions are packed as
 * row * 8 + col with row and col in 1..5, so the column is `pos & 7` and
 * the row bits are `pos & 0o70`.
 *
 * The letter table is 7x7: row/column 0 mirror row/column 5 and row/column 6
 * mirror row/column 1, so one step past an edge lands on the opposite edge.
 */

import { ALPHABET_SIZE, canonicalLetter, letterIndex } from './alphabet.js';

export const GRID_SIZE = 5;

const UNASSIGNED = -1;
const CODE_I = 0x69;
const CODE_J = 0x6a;

export function encodePosition(row: number, col: number): number {
  return row * 8 + col;
}

export function rowOf(position: number): number {
  return position >> 3;
}

export function colOf(position: number): number {
  return position & 7;
}

// Walks the interior cells left to right, top to bottom
class Cursor {
  private row = 1;
  private col = 1;

  take(): number {
    const position = encodePosition(this.row, this.col);
    this.col++;
    if (this.col > GRID_SIZE) {
      this.col = 1;
      this.row++;
    }
    return position;
  }
}

export class KeySquare {
  private readonly positions: readonly number[];
  private readonly letters: readonly number[];

  private constructor(positions: number[], letters: number[]) {
    this.positions = Object.freeze(positions);
    this.letters = Object.freeze(letters);
  }

  /**
   * Build a square from a key. Characters other than lowercase a-z are
   * skipped, as are letters whose slot is already taken.
   */
  static build(key: string): KeySquare {
    const positions = new Array<number>(ALPHABET_SIZE).fill(UNASSIGNED);
    const letters = new Array<number>(64).fill(0);
    const cursor = new Cursor();

    for (let i = 0; i < key.length; i++) {
      const code = key.charCodeAt(i);
      const index = letterIndex(code);
      if (index === null || positions[index] !== UNASSIGNED) {
        continue;
      }
      const position = cursor.take();
      positions[index] = position;
      letters[position] = code === CODE_J ? CODE_I : code;
    }

    // Remaining letters in alphabetical order
    for (let index = 0; index < ALPHABET_SIZE; index++) {
      if (positions[index] !== UNASSIGNED) {
        continue;
      }
      const position = cursor.take();
      positions[index] = position;
      letters[position] = canonicalLetter(index);
    }

    for (let row = 1; row <= GRID_SIZE; row++) {
      letters[encodePosition(row, 0)] = letters[encodePosition(row, GRID_SIZE)];
      letters[encodePosition(row, GRID_SIZE + 1)] = letters[encodePosition(row, 1)];
    }
    for (let col = 0; col <= GRID_SIZE + 1; col++) {
      letters[encodePosition(0, col)] = letters[encodePosition(GRID_SIZE, col)];
      letters[encodePosition(GRID_SIZE + 1, col)] = letters[encodePosition(1, col)];
    }

    return new KeySquare(positions, letters);
  }

  /**
   * Packed position of an alphabet slot
   */
  positionOf(index: number): number {
    return this.positions[index];
  }

  /**
   * Letter (char code) at a packed position, border cells included
   */
  letterAt(position: number): number {
    return this.letters[position];
  }

  /**
   * The five interior rows, top to bottom
   */
  rows(): string[] {
    const rows: string[] = [];
    for (let row = 1; row <= GRID_SIZE; row++) {
      const codes: number[] = [];
      for (let col = 1; col <= GRID_SIZE; col++) {
        codes.push(this.letters[encodePosition(row, col)]);
      }
      rows.push(String.fromCharCode(...codes));
    }
    return rows;
  }

  toString(): string {
    return this.rows().join('\n');
  }
}
