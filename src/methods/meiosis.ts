import Genotype, { Chromosome } from '../genome/genotype';
import { CrossoverContext, OperatorResult, simpleCrossover } from './crossover';

/**
 * Sexual reproduction of diploid genomes.
 *
 * Each parent is split into its two chromosome sets (haploid gametes), the
 * gametes of one parent recombine by simple crossover into `numberChildren`
 * gametes, and maternal and paternal gametes are paired one-to-one into
 * diploid children.
 */
export const meiosis = {
  MEIOSIS: {
    name: 'MEIOSIS',
  },
} as const;

/** Split a diploid genotype into two haploid genotypes, one per chromosome set. */
export function splitGametes(parent: Genotype): [Genotype, Genotype] {
  if (!parent.diploid) throw new Error('Only diploid genomes can be split into gametes');
  const gamete = (set: number): Genotype =>
    Genotype.fromGenome(
      parent.genome.map((_, i) => parent.column(i, set).map((allele) => [allele])),
      1,
      parent.encoding
    );
  return [gamete(0), gamete(1)];
}

/**
 * Pair maternal and paternal gametes one-to-one into diploid genotypes:
 * set 0 comes from the maternal gamete, set 1 from the paternal one.
 */
export function fertilize(
  maternal: readonly Genotype[],
  paternal: readonly Genotype[]
): Genotype[] {
  if (maternal.length !== paternal.length)
    throw new Error(
      `Cannot pair ${maternal.length} maternal with ${paternal.length} paternal gametes`
    );
  return maternal.map((egg, n) => {
    const sperm = paternal[n];
    const genome: Chromosome[] = egg.genome.map((chromosome, i) =>
      chromosome.map((gene, j) => [gene[0], sperm.allele(i, j)])
    );
    return Genotype.fromGenome(genome, 2, egg.encoding);
  });
}

/**
 * Meiosis of both parents followed by fertilization.
 *
 * @returns `numberChildren` diploid children; `events` counts crossovers in both parents.
 */
export function reproduceDiploid(
  mother: Genotype,
  father: Genotype,
  context: CrossoverContext
): OperatorResult {
  const [motherA, motherB] = splitGametes(mother);
  const [fatherA, fatherB] = splitGametes(father);
  const eggs = simpleCrossover(motherA, motherB, context);
  const sperms = simpleCrossover(fatherA, fatherB, context);
  return {
    offspring: fertilize(eggs.offspring, sperms.offspring),
    events: eggs.events + sperms.events,
  };
}
