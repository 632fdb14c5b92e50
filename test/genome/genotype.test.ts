import Genotype from '../../src/genome/genotype';
import { CONTINUOUS } from '../../src/genome/alphabet';
import { InvalidFitnessError } from '../../src/utils/errors';
import { createRandomSource } from '../../src/utils/random';
import {
  BINARY,
  CONTINUOUS_ENCODING,
  TERNARY,
  expectPermutationOf,
  haploid,
  permutationEncoding,
} from '../utils/test-helpers';

describe('Genotype', () => {
  describe('random', () => {
    it('draws discrete alleles from the alphabet with the requested shape', () => {
      // Arrange
      const random = createRandomSource('genotype');
      // Act
      const genotype = Genotype.random(
        { chromosomeLengths: [4, 6], ploidy: 2, encoding: TERNARY },
        random
      );
      // Assert
      expect(genotype.chromosomeLengths).toEqual([4, 6]);
      expect(genotype.numberChromosomes).toBe(2);
      expect(genotype.diploid).toBe(true);
      const alleles = genotype.genome.flat(2);
      expect(alleles).toHaveLength(20);
      expect(alleles.every((a) => a === -1 || a === 0 || a === 1)).toBe(true);
    });

    it('draws continuous alleles in [0, 1)', () => {
      // Act
      const genotype = Genotype.random(
        { chromosomeLengths: [50], ploidy: 1, encoding: CONTINUOUS_ENCODING },
        createRandomSource(1)
      );
      // Assert
      const alleles = genotype.column(0);
      expect(alleles.every((a) => typeof a === 'number' && a >= 0 && a < 1)).toBe(true);
      expect(genotype.alphabet).toBe(CONTINUOUS);
      expect(genotype.alphabetLength).toBe(Infinity);
    });

    it('draws one permutation per chromosome under pmx', () => {
      // Arrange
      const encoding = permutationEncoding(6);
      // Act
      const genotype = Genotype.random(
        { chromosomeLengths: [6, 6], ploidy: 1, encoding },
        createRandomSource(2)
      );
      // Assert
      expect(genotype.pmx).toBe(true);
      expectPermutationOf(genotype.column(0), [0, 1, 2, 3, 4, 5]);
      expectPermutationOf(genotype.column(1), [0, 1, 2, 3, 4, 5]);
    });
  });

  describe('fromGenome', () => {
    it('deep-copies the genome it is given', () => {
      // Arrange
      const genome = [[[0], [1], [1]]];
      // Act
      const genotype = Genotype.fromGenome(genome, 1, BINARY);
      genome[0][0][0] = 1;
      // Assert
      expect(genotype.allele(0, 0)).toBe(0);
    });

    it('rejects genes that do not match the ploidy', () => {
      // Act & Assert
      expect(() => Genotype.fromGenome([[[0, 1], [1]]], 2, BINARY)).toThrow(RangeError);
    });
  });

  describe('copy', () => {
    it('returns an unevaluated genotype with its own storage', () => {
      // Arrange
      const original = haploid([0, 1, 1]);
      original.fitness = 0.5;
      // Act
      const copy = original.copy();
      copy.setAllele(0, 0, 0, 1);
      // Assert
      expect(copy.fitness).toBeUndefined();
      expect(original.toString()).toBe('011');
      expect(copy.toString()).toBe('111');
    });
  });

  describe('fitness', () => {
    it('starts undefined', () => {
      // Arrange
      const genotype = haploid([0]);
      // Assert
      expect(genotype.fitness).toBeUndefined();
      expect(genotype.scaledFitness).toBeUndefined();
    });

    it('accepts zero', () => {
      // Arrange
      const genotype = haploid([0]);
      // Act
      genotype.fitness = 0;
      // Assert
      expect(genotype.fitness).toBe(0);
    });

    it.each([-1, Number.NaN, Infinity, -Infinity])('rejects %p', (value) => {
      // Arrange
      const genotype = haploid([0]);
      // Act & Assert
      expect(() => {
        genotype.fitness = value;
      }).toThrow(InvalidFitnessError);
    });

    it('names the offending value in the message', () => {
      // Arrange
      const genotype = haploid([0]);
      // Act & Assert
      expect(() => {
        genotype.fitness = -1;
      }).toThrow(/- not -1$/);
    });

    it('validates scaled fitness as well', () => {
      // Arrange
      const genotype = haploid([0]);
      // Act & Assert
      expect(() => {
        genotype.scaledFitness = -0.5;
      }).toThrow(InvalidFitnessError);
    });
  });

  describe('accessors', () => {
    it('reports alphabet properties', () => {
      // Arrange
      const genotype = haploid(['a', 'b'], { kind: 'discrete', symbols: ['a', 'b'] });
      // Assert
      expect(genotype.characterAlphabet).toBe(true);
      expect(genotype.alphabet).toEqual(['a', 'b']);
      expect(genotype.alphabetLength).toBe(2);
      expect(genotype.pmx).toBe(false);
      expect(genotype.haploid).toBe(true);
    });

    it('swaps alleles within one chromosome set', () => {
      // Arrange
      const genotype = haploid([0, 1, 2], permutationEncoding(3));
      // Act
      genotype.swapAlleles(0, 0, 2);
      // Assert
      expect(genotype.column(0)).toEqual([2, 1, 0]);
    });
  });

  describe('toString', () => {
    it('concatenates haploid discrete alleles and separates chromosomes', () => {
      // Arrange
      const genotype = Genotype.fromGenome(
        [
          [[0], [1], [1]],
          [[1], [0]],
        ],
        1,
        BINARY
      );
      // Assert
      expect(genotype.toString()).toBe('011, 10');
    });

    it('prints both sets of diploid genomes', () => {
      // Arrange
      const genotype = Genotype.fromGenome(
        [
          [
            [1, -1],
            [0, 0],
          ],
        ],
        2,
        TERNARY
      );
      // Assert
      expect(genotype.toString()).toBe('(10),(-10)');
    });

    it('separates continuous genes by blanks', () => {
      // Arrange
      const genotype = haploid([0.25, 0.5], CONTINUOUS_ENCODING);
      // Assert
      expect(genotype.toString()).toBe('0.25 0.5');
    });

    it('separates permutation genes by blanks', () => {
      // Arrange
      const genotype = haploid([2, 0, 1], permutationEncoding(3));
      // Assert
      expect(genotype.toString()).toBe('2 0 1');
    });
  });
});
