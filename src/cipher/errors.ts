/**
 * Raised when transformed output cannot be reassembled into text.
 * Substitution only ever yields ASCII letters, so this signals a broken
 * key square rather than bad input.
 */
export class EncodingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EncodingError';
  }
}
