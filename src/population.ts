import { v4 as uuidv4 } from 'uuid';
import type { FitnessFunction, GenerationStats, Genome, ParameterMap } from './types.js';
import { FitnessEvaluationError, NoTemplatesError, toError } from './errors.js';
import { positiveInt } from './json.js';
import type { Random } from './random.js';

export const copyGenes = (genes: Readonly<ParameterMap>): ParameterMap => ({ ...genes });

/** Build `size` genomes by sampling templates with replacement; fitness is unset. */
export function createPopulation(templates: readonly ParameterMap[], size: number, random: Random): Genome[] {
  if (templates.length === 0) throw new NoTemplatesError();
  positiveInt('populationSize', size);
  return Array.from({ length: size }, () => newGenome(copyGenes(random.pick(templates)), 0, []));
}

export function newGenome(genes: ParameterMap, generation: number, parentIds: string[]): Genome {
  return { id: uuidv4(), genes, fitness: null, generation, parentIds };
}

/** Deep copy that keeps identity and score (elitism). */
export function cloneGenome(g: Genome): Genome {
  return { ...g, genes: copyGenes(g.genes), parentIds: [...g.parentIds] };
}

/** Score a genome in place. Fitness failures propagate; they are never scored as zero. */
export function evaluateGenome(genome: Genome, fitness: FitnessFunction): number {
  let score: number;
  try {
    score = fitness(copyGenes(genome.genes));
  } catch (e) {
    const err = toError(e);
    throw new FitnessEvaluationError(genome.id, err.message, err);
  }
  if (typeof score !== 'number' || Number.isNaN(score)) {
    throw new FitnessEvaluationError(genome.id, `fitness function returned ${String(score)}`);
  }
  genome.fitness = score;
  return score;
}

const scoreOf = (g: Genome): number => g.fitness ?? -Infinity;

/** Fittest genome; the earliest wins ties. */
export function bestGenome(population: readonly Genome[]): Genome {
  if (population.length === 0) throw new Error('Population is empty');
  return population.reduce((best, g) => (scoreOf(g) > scoreOf(best) ? g : best));
}

export function fitnessStats(population: readonly Genome[], generation: number): GenerationStats {
  const scores = population.map(scoreOf);
  return {
    generation,
    bestFitness: Math.max(...scores),
    meanFitness: scores.reduce((a, b) => a + b, 0) / (scores.length || 1),
    worstFitness: Math.min(...scores)
  };
}
