import Genotype from '../../src/genome/genotype';
import {
  binaryFraction,
  expressDominance,
  genericDecoder,
} from '../../src/genome/decoder';
import { UnsupportedEncodingError } from '../../src/utils/errors';
import {
  BINARY,
  CONTINUOUS_ENCODING,
  TERNARY,
  haploid,
  permutationEncoding,
} from '../utils/test-helpers';

describe('decoder', () => {
  describe('binaryFraction', () => {
    it('reads bits big-endian and normalizes by 2^L - 1', () => {
      expect(binaryFraction([1, 0, 1])).toBe(5 / 7);
    });
    it('maps all ones to 1', () => {
      expect(binaryFraction([1, 1, 1, 1])).toBe(1);
    });
    it('maps all zeros to 0', () => {
      expect(binaryFraction([0, 0])).toBe(0);
    });
  });

  describe('expressDominance', () => {
    it.each([
      [[1, -1], 1],
      [[-1, 1], 1],
      [[-1, 0], 0],
      [[0, -1], 0],
      [[-1, -1], 1],
      [[0, 0], 0],
      [[0, 1], 1],
    ])('expresses %p as %p', (gene, expected) => {
      expect(expressDominance(gene)).toBe(expected);
    });
  });

  describe('genericDecoder', () => {
    it('decodes a single binary chromosome to one fraction', () => {
      // Arrange
      const genotype = haploid([1, 0, 1]);
      // Act
      const phenotype = genericDecoder(genotype);
      // Assert
      expect(phenotype).toEqual([5 / 7]);
    });

    it('decodes several binary chromosomes to an array of fractions', () => {
      // Arrange
      const genotype = Genotype.fromGenome(
        [
          [[1], [0], [1]],
          [[0], [1]],
        ],
        1,
        BINARY
      );
      // Act
      const phenotype = genericDecoder(genotype);
      // Assert
      expect(phenotype).toEqual([[5 / 7, 1 / 3]]);
    });

    it('expresses diploid triallelic genes before reading the fraction', () => {
      // Arrange
      const genotype = Genotype.fromGenome(
        [
          [
            [1, -1],
            [0, 0],
            [-1, -1],
          ],
        ],
        2,
        TERNARY
      );
      // Act
      const phenotype = genericDecoder(genotype);
      // Assert
      expect(phenotype).toEqual([5 / 7]);
    });

    it('joins character alleles into a word per chromosome', () => {
      // Arrange
      const encoding = { kind: 'discrete', symbols: ['a', 'b', ' '] } as const;
      const single = haploid(['a', 'b'], encoding);
      const double = Genotype.fromGenome(
        [
          [['a'], [' ']],
          [['b'], ['b']],
        ],
        1,
        encoding
      );
      // Assert
      expect(genericDecoder(single)).toEqual(['ab']);
      expect(genericDecoder(double)).toEqual([['a ', 'bb']]);
    });

    it('returns a scalar for a single continuous gene', () => {
      expect(genericDecoder(haploid([0.25], CONTINUOUS_ENCODING))).toEqual([0.25]);
    });

    it('returns the gene array for a single continuous chromosome', () => {
      expect(genericDecoder(haploid([0.25, 0.5], CONTINUOUS_ENCODING))).toEqual([
        [0.25, 0.5],
      ]);
    });

    it('returns one array per permutation chromosome', () => {
      // Arrange
      const genotype = Genotype.fromGenome(
        [
          [[1], [0]],
          [[0], [1]],
        ],
        1,
        permutationEncoding(2)
      );
      // Assert
      expect(genericDecoder(genotype)).toEqual([
        [
          [1, 0],
          [0, 1],
        ],
      ]);
    });

    it('is a pure function of the genome', () => {
      // Arrange
      const genotype = haploid([0, 1, 1, 0, 1]);
      // Act
      const first = genericDecoder(genotype);
      const second = genericDecoder(genotype.copy());
      // Assert
      expect(first).toEqual(second);
    });

    it.each([
      ['haploid alphabet other than [0, 1]', haploid([0, 2], { kind: 'discrete', symbols: [0, 1, 2] })],
      ['diploid alphabet other than [-1, 0, 1]', Genotype.fromGenome([[[0, 1]]], 2, BINARY)],
      ['diploid continuous genomes', Genotype.fromGenome([[[0.1, 0.2]]], 2, CONTINUOUS_ENCODING)],
      [
        'diploid character genomes',
        Genotype.fromGenome([[['a', 'b']]], 2, { kind: 'discrete', symbols: ['a', 'b'] }),
      ],
    ])('rejects %s', (_, genotype) => {
      // Act & Assert
      expect(() => genericDecoder(genotype)).toThrow(UnsupportedEncodingError);
    });
  });
});
