/**
 * Playfair Cipher Module
 *
 * Classical 5x5 digraph substitution with merged i/j and 'x' as filler.
 * Not a security primitive.
 */

export * from './alphabet.js';
export * from './square.js';
export * from './digraph.js';
export * from './errors.js';
export * from './playfair.js';
