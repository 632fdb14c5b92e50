/**
 * Allele alphabets.
 *
 * A gene holds one allele per chromosome set. The set of admissible alleles is
 * either an ordered finite list of symbols of a single type (numbers or
 * printable characters) or the continuous unit interval [0, 1]. Permutation
 * genomes (partially matched crossover) draw on a finite list as well, but every
 * chromosome must hold each symbol exactly once.
 *
 * The three cases travel through the engine as the tagged `Encoding` union so
 * that operators switch on `kind` instead of inspecting allele values.
 */

/** A single allele value. */
export type Allele = number | string;

/** Sentinel selecting the continuous unit interval as the allele alphabet. */
export const CONTINUOUS: unique symbol = Symbol('CONTINUOUS');

/** Alphabet as accepted by the optimizer options. */
export type AlphabetInput = readonly Allele[] | typeof CONTINUOUS;

/** Discrete ordered symbol set. */
export interface DiscreteEncoding {
  readonly kind: 'discrete';
  readonly symbols: readonly Allele[];
}

/** Real valued genes in [0, 1]. */
export interface ContinuousEncoding {
  readonly kind: 'continuous';
}

/** Every chromosome is a permutation of `symbols`. */
export interface PermutationEncoding {
  readonly kind: 'permutation';
  readonly symbols: readonly Allele[];
}

export type Encoding = DiscreteEncoding | ContinuousEncoding | PermutationEncoding;

/** Letters of the English alphabet and a blank. */
export const ALPHA_ALPHABET: readonly string[] = Object.freeze(
  ' ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz'.split('')
);

/** `ALPHA_ALPHABET` plus decimal digits. */
export const ALNUM_ALPHABET: readonly string[] = Object.freeze([
  ...ALPHA_ALPHABET,
  ...'0123456789'.split(''),
]);

/** Every character found on an American keyboard. */
export const CHARACTER_ALPHABET: readonly string[] = Object.freeze([
  ...ALNUM_ALPHABET,
  ...'~`!@#$%^&*()-_=+[{]}\\|;:\'",<.>/?'.split(''),
]);

// Blank or any code point outside the control, format, separator and unassigned categories.
const PRINTABLE = /^(?:[^\p{C}\p{Z}]| )*$/u;

/** True when every symbol is a string made of printable characters. */
export function isPrintableAlphabet(symbols: readonly Allele[]): boolean {
  return symbols.every((s) => typeof s === 'string' && PRINTABLE.test(s));
}

/** Number of symbols; `Infinity` for the continuous alphabet. */
export function alphabetSize(encoding: Encoding): number {
  return encoding.kind === 'continuous' ? Infinity : encoding.symbols.length;
}

/** Symbols of a finite alphabet or the `CONTINUOUS` sentinel. */
export function alphabetOf(encoding: Encoding): readonly Allele[] | typeof CONTINUOUS {
  return encoding.kind === 'continuous' ? CONTINUOUS : encoding.symbols;
}

/** Element-wise equality of two symbol lists. */
export function sameSymbols(
  a: readonly Allele[],
  b: readonly Allele[]
): boolean {
  return a.length === b.length && a.every((symbol, i) => symbol === b[i]);
}

/** Integers 0 .. length-1, the default alphabet of permutation genomes. */
export function sequenceAlphabet(length: number): number[] {
  return Array.from({ length }, (_, i) => i);
}
