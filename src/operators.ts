/**
 * Reproduction operators: tournament selection, uniform crossover and
 * bounded Gaussian mutation. Children never alias a parent's genes.
 */

import type { Genome, MutationBound, MutationBounds, ParameterMap } from './types.js';
import { InvalidConfigError } from './errors.js';
import { copyGenes, newGenome } from './population.js';
import type { Random } from './random.js';

/** Fittest of `size` distinct genomes sampled uniformly (capped at the population size) */
export function tournamentSelect(population: readonly Genome[], size: number, random: Random): Genome {
  if (population.length === 0) throw new Error('Cannot select from an empty population');
  const entrants = random.sample(population, Math.max(1, size));
  return entrants.reduce((best, g) => ((g.fitness ?? -Infinity) > (best.fitness ?? -Infinity) ? g : best));
}

/** For each key present in both parents take either parent's value; other keys are dropped. */
export function uniformCrossover(a: Genome, b: Genome, random: Random, generation: number): Genome {
  const genes: ParameterMap = {};
  for (const key of Object.keys(a.genes)) {
    if (!Object.prototype.hasOwnProperty.call(b.genes, key)) continue;
    genes[key] = random.chance(0.5) ? a.genes[key] : b.genes[key];
  }
  return newGenome(genes, generation, [a.id, b.id]);
}

/** Fresh, unevaluated copy of a single parent */
export function cloneAsChild(parent: Genome, generation: number): Genome {
  return newGenome(copyGenes(parent.genes), generation, [parent.id]);
}

/**
 * With probability `rate`, perturb every numeric gene that has bounds by
 * N(0, std) noise and clamp it to [min, max]. Returns whether it fired.
 */
export function mutateGenome(genome: Genome, bounds: MutationBounds, rate: number, random: Random): boolean {
  if (!random.chance(rate)) return false;
  for (const [key, value] of Object.entries(genome.genes)) {
    const bound = bounds[key];
    if (!bound || typeof value !== 'number') continue;
    genome.genes[key] = clamp(value + random.gaussian(0, bound.std), bound.min, bound.max);
  }
  return true;
}

export function validateBounds(bounds: MutationBounds): void {
  for (const [key, b] of Object.entries(bounds)) validateBound(key, b);
}

function validateBound(key: string, b: MutationBound): void {
  if (![b.std, b.min, b.max].every(Number.isFinite)) throw new InvalidConfigError(`mutation.${key}`, 'std, min and max must be finite numbers');
  if (b.std < 0) throw new InvalidConfigError(`mutation.${key}`, `std must be non-negative, got ${b.std}`);
  if (b.min > b.max) throw new InvalidConfigError(`mutation.${key}`, `min ${b.min} exceeds max ${b.max}`);
}

export const clamp = (x: number, min: number, max: number): number => Math.max(min, Math.min(max, x));
