import {
  Allele,
  CONTINUOUS,
  Encoding,
  alphabetOf,
  alphabetSize,
  isPrintableAlphabet,
} from './alphabet';
import { InvalidFitnessError } from '../utils/errors';
import { RandomSource, permutation, randomInt } from '../utils/random';

/** Number of complete chromosome sets: 1 (haploid) or 2 (diploid). */
export type Ploidy = 1 | 2;

/**
 * One chromosome as a `length x ploidy` matrix: `chromosome[gene][set]`.
 */
export type Chromosome = Allele[][];

/** Read-only view of a genome as handed out by `Genotype.genome`. */
export type GenomeView = ReadonlyArray<ReadonlyArray<ReadonlyArray<Allele>>>;

/**
 * Shape shared by every individual of a population.
 */
export interface GenomeLayout {
  readonly chromosomeLengths: readonly number[];
  readonly ploidy: Ploidy;
  readonly encoding: Encoding;
}

/**
 * Genome of one individual (a list of chromosomes) together with the fitness
 * of the phenotype it decodes to.
 *
 * Instances own their gene storage: `fromGenome()` deep-copies its input, so
 * offspring never alias the storage of their parents. Operators write through
 * `setAllele()` / `swapAlleles()` on freshly created offspring only.
 *
 * @example
 * const g = Genotype.fromGenome([[[0], [1], [1]]], 1, { kind: 'discrete', symbols: [0, 1] });
 * g.toString(); // "011"
 */
export default class Genotype {
  private readonly _genome: Chromosome[];
  private readonly _ploidy: Ploidy;
  private readonly _encoding: Encoding;
  private readonly _characterAlphabet: boolean;
  private _fitness?: number;
  private _scaledFitness?: number;

  private constructor(genome: Chromosome[], ploidy: Ploidy, encoding: Encoding) {
    this._genome = genome;
    this._ploidy = ploidy;
    this._encoding = encoding;
    this._characterAlphabet =
      encoding.kind !== 'continuous' && isPrintableAlphabet(encoding.symbols);
  }

  /**
   * Draw a random genome.
   *
   * Continuous genes are uniform in [0, 1); permutation chromosomes are uniform
   * random permutations of the alphabet; discrete genes are drawn uniformly
   * and independently from the alphabet.
   */
  static random(layout: GenomeLayout, random: RandomSource): Genotype {
    const { chromosomeLengths, ploidy, encoding } = layout;
    const genome: Chromosome[] = chromosomeLengths.map((length) => {
      switch (encoding.kind) {
        case 'continuous':
          return Array.from({ length }, () =>
            Array.from({ length: ploidy }, () => random())
          );
        case 'permutation': {
          // permutation genomes are always haploid
          const order = permutation(random, encoding.symbols);
          return order.map((allele) => [allele]);
        }
        case 'discrete': {
          const symbols = encoding.symbols;
          return Array.from({ length }, () =>
            Array.from(
              { length: ploidy },
              () => symbols[randomInt(random, symbols.length)]
            )
          );
        }
      }
    });
    return new Genotype(genome, ploidy, encoding);
  }

  /**
   * Build a genotype from explicit genome data (deep copy).
   *
   * @throws {RangeError} when a gene does not carry exactly `ploidy` alleles.
   */
  static fromGenome(genome: GenomeView, ploidy: Ploidy, encoding: Encoding): Genotype {
    const copy: Chromosome[] = genome.map((chromosome, i) =>
      chromosome.map((gene, j) => {
        if (gene.length !== ploidy)
          throw new RangeError(
            `Gene ${j} of chromosome ${i} holds ${gene.length} alleles, expected ${ploidy}`
          );
        return gene.slice();
      })
    );
    return new Genotype(copy, ploidy, encoding);
  }

  /** Unevaluated copy with its own gene storage. */
  copy(): Genotype {
    return Genotype.fromGenome(this._genome, this._ploidy, this._encoding);
  }

  /** Raw fitness set by evaluation; `undefined` until evaluated. */
  get fitness(): number | undefined {
    return this._fitness;
  }

  set fitness(value: number) {
    this._fitness = checkFitness(
      value,
      'Fitness returned by objective function must be a finite number greater than or equal to 0'
    );
  }

  /** Fitness after linear scaling; equals `fitness` when scaling is disabled. */
  get scaledFitness(): number | undefined {
    return this._scaledFitness;
  }

  set scaledFitness(value: number) {
    this._scaledFitness = checkFitness(
      value,
      'The computed scaled fitness must be a finite number greater than or equal to 0'
    );
  }

  get chromosomeLengths(): number[] {
    return this._genome.map((chromosome) => chromosome.length);
  }

  get ploidy(): Ploidy {
    return this._ploidy;
  }

  get haploid(): boolean {
    return this._ploidy === 1;
  }

  get diploid(): boolean {
    return this._ploidy === 2;
  }

  get numberChromosomes(): number {
    return this._genome.length;
  }

  /** Full genome, `genome[chromosome][gene][set]`. */
  get genome(): GenomeView {
    return this._genome;
  }

  get encoding(): Encoding {
    return this._encoding;
  }

  /** Allele symbols, or `CONTINUOUS` for real valued genes. */
  get alphabet(): readonly Allele[] | typeof CONTINUOUS {
    return alphabetOf(this._encoding);
  }

  /** Alphabet size; `Infinity` for continuous alphabets. */
  get alphabetLength(): number {
    return alphabetSize(this._encoding);
  }

  /** True when every allele symbol is a printable string. */
  get characterAlphabet(): boolean {
    return this._characterAlphabet;
  }

  /** True for permutation genomes (partially matched crossover). */
  get pmx(): boolean {
    return this._encoding.kind === 'permutation';
  }

  allele(chromosome: number, gene: number, set = 0): Allele {
    return this._genome[chromosome][gene][set];
  }

  setAllele(chromosome: number, gene: number, set: number, value: Allele): void {
    this._genome[chromosome][gene][set] = value;
  }

  swapAlleles(chromosome: number, geneA: number, geneB: number, set = 0): void {
    const genes = this._genome[chromosome];
    const tmp = genes[geneA][set];
    genes[geneA][set] = genes[geneB][set];
    genes[geneB][set] = tmp;
  }

  /** Copy of one chromosome set (column) of a chromosome. */
  column(chromosome: number, set = 0): Allele[] {
    return this._genome[chromosome].map((gene) => gene[set]);
  }

  /**
   * Chromosomes separated by ", ". Continuous and permutation genomes print
   * their genes separated by blanks, discrete haploid genomes concatenate the
   * alleles, diploid genomes print both sets as "(set 0),(set 1)".
   */
  toString(): string {
    const chromosomes = this._genome.map((_, i) => {
      if (this._encoding.kind !== 'discrete') return this.column(i).join(' ');
      if (this.haploid) return this.column(i).join('');
      return `(${this.column(i, 0).join('')}),(${this.column(i, 1).join('')})`;
    });
    return chromosomes.join(', ');
  }
}

function checkFitness(value: number, message: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0)
    throw new InvalidFitnessError(`${message} - not ${String(value)}`, value);
  return value;
}
