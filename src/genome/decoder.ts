import { Allele, sameSymbols } from './alphabet';
import Genotype from './genotype';
import { UnsupportedEncodingError } from '../utils/errors';

/** Value produced by the generic decoder for one argument slot. */
export type GenericValue = Allele | Allele[] | Allele[][];

/** Argument list produced by the generic decoder: always a single argument. */
export type GenericPhenotype = [GenericValue];

const BIALLELIC: readonly Allele[] = [0, 1];
const TRIALLELIC: readonly Allele[] = [-1, 0, 1];

/**
 * Interpret a bit sequence as a big-endian binary fraction in [0, 1]:
 * `sum(bit_i * 2^(L-1-i)) / (2^L - 1)`.
 *
 * @example
 * binaryFraction([1, 0, 1]); // 5 / 7
 */
export function binaryFraction(bits: readonly number[]): number {
  let accumulator = 0;
  let power = Math.pow(2, bits.length - 1);
  for (const bit of bits) {
    accumulator += bit * power;
    power /= 2;
  }
  return accumulator / (Math.pow(2, bits.length) - 1);
}

/**
 * Expression of a diploid gene over the alphabet [-1, 0, 1], where -1 is a
 * recessive 1, 0 a 0 and 1 a dominant 1: the absolute value of the larger allele.
 *
 * (1, -1) -> 1, (-1, 0) -> 0, (-1, -1) -> 1, (0, 0) -> 0
 */
export function expressDominance(gene: readonly Allele[]): number {
  return Math.abs(Math.max(Number(gene[0]), Number(gene[1])));
}

/**
 * Generic decoder mapping simple encodings onto the argument list of the
 * objective function.
 *
 * | genotype                               | result                                       |
 * |----------------------------------------|----------------------------------------------|
 * | continuous or permutation, haploid     | one array per chromosome (array / scalar when single) |
 * | printable characters, haploid          | one string per chromosome (string when single) |
 * | haploid over [0, 1]                    | one binary fraction per chromosome           |
 * | diploid over [-1, 0, 1]                | dominance expression, then binary fraction   |
 *
 * Several parameters packed into one chromosome, or any other alphabet / ploidy
 * combination, need a custom decoder.
 *
 * @throws {UnsupportedEncodingError} for combinations listed nowhere above.
 */
export function genericDecoder(genotype: Genotype): GenericPhenotype {
  const encoding = genotype.encoding;
  const chromosomes = genotype.numberChromosomes;

  if (encoding.kind === 'continuous' || encoding.kind === 'permutation') {
    if (genotype.diploid)
      throw new UnsupportedEncodingError(
        'Can only handle haploid chromosomes for continuous and permutation genomes'
      );
    const columns = Array.from({ length: chromosomes }, (_, i) => genotype.column(i));
    if (columns.length > 1) return [columns];
    if (columns[0].length > 1) return [columns[0]];
    return [columns[0][0]];
  }

  if (genotype.characterAlphabet) {
    if (genotype.diploid)
      throw new UnsupportedEncodingError(
        'Can only handle haploid chromosomes for character chromosomes'
      );
    const words = Array.from({ length: chromosomes }, (_, i) =>
      genotype.column(i).join('')
    );
    return chromosomes === 1 ? [words[0]] : [words];
  }

  let express: (gene: readonly Allele[]) => number;
  if (genotype.haploid) {
    if (!sameSymbols(encoding.symbols, BIALLELIC))
      throw new UnsupportedEncodingError(
        'Can only handle biallelic haploid chromosomes when alphabet is [0, 1]'
      );
    express = (gene) => Number(gene[0]);
  } else {
    if (!sameSymbols(encoding.symbols, TRIALLELIC))
      throw new UnsupportedEncodingError(
        'Can only handle triallelic diploid chromosomes when alphabet is [-1, 0, 1]'
      );
    express = expressDominance;
  }

  const values = genotype.genome.map((chromosome) =>
    binaryFraction(chromosome.map(express))
  );
  return chromosomes === 1 ? [values[0]] : [values];
}
