import Genotype, { Chromosome, GenomeLayout } from '../genome/genotype';
import { warn } from '../utils/warnings';
import type { ResolvedOptions } from './optimizer.types';

/** Layout shared by every individual built from `options`. */
export function layoutOf(options: ResolvedOptions): GenomeLayout {
  return {
    chromosomeLengths: options.chromosomeLengths,
    ploidy: options.ploidy,
    encoding: options.encoding,
  };
}

/**
 * Random initial population of `options.populationSize` individuals.
 *
 * Fringe seeding: for discrete alphabets that are neither permutations nor
 * printable characters, individual k is replaced by a genome holding only the
 * k-th symbol (k < alphabet size), so every allele occurs at every locus of
 * generation 0. This needs a population larger than the alphabet.
 */
export function createInitialPopulation(options: ResolvedOptions): Genotype[] {
  const layout = layoutOf(options);
  const population = Array.from({ length: options.populationSize }, () =>
    Genotype.random(layout, options.random)
  );

  const { encoding } = options;
  if (encoding.kind !== 'discrete' || options.characterAlphabet) return population;
  if (options.populationSize <= encoding.symbols.length) {
    warn(
      `Population of ${options.populationSize} cannot represent all ${encoding.symbols.length} alleles at every locus; initial population left fully random`
    );
    return population;
  }

  encoding.symbols.forEach((symbol, k) => {
    const genome: Chromosome[] = options.chromosomeLengths.map((length) =>
      Array.from({ length }, () => Array.from({ length: options.ploidy }, () => symbol))
    );
    population[k] = Genotype.fromGenome(genome, options.ploidy, encoding);
  });
  return population;
}
