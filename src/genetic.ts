import type {
  EvolutionOutcome, FitnessFunction, GenerationStats, GeneticOptions, Genome, MutationBounds, ParameterMap
} from './types.js';
import { nonNegativeInt, positiveInt, probability } from './json.js';
import { type Logger, silentLogger } from './logger.js';
import { Random } from './random.js';
import { bestGenome, cloneGenome, createPopulation, evaluateGenome, fitnessStats } from './population.js';
import { cloneAsChild, mutateGenome, tournamentSelect, uniformCrossover, validateBounds } from './operators.js';

export const DEFAULT_GENETIC_OPTIONS = {
  populationSize: 50,
  generations: 100,
  mutationRate: 0.1,
  crossoverRate: 0.8,
  tournamentSize: 3
} as const;

/**
 * Generational GA with single-genome elitism. Runs exactly `generations`
 * generations; the best fitness never decreases from one to the next.
 */
export class GeneticOptimizer {
  readonly populationSize: number;
  readonly generations: number;
  readonly mutationRate: number;
  readonly crossoverRate: number;
  readonly tournamentSize: number;
  private readonly random: Random;
  private readonly logger: Logger;
  private readonly onGeneration?: GeneticOptions['onGeneration'];

  constructor(opts: GeneticOptions = {}) {
    this.populationSize = positiveInt('populationSize', opts.populationSize ?? DEFAULT_GENETIC_OPTIONS.populationSize);
    this.generations = nonNegativeInt('generations', opts.generations ?? DEFAULT_GENETIC_OPTIONS.generations);
    this.mutationRate = probability('mutationRate', opts.mutationRate ?? DEFAULT_GENETIC_OPTIONS.mutationRate);
    this.crossoverRate = probability('crossoverRate', opts.crossoverRate ?? DEFAULT_GENETIC_OPTIONS.crossoverRate);
    this.tournamentSize = positiveInt('tournamentSize', opts.tournamentSize ?? DEFAULT_GENETIC_OPTIONS.tournamentSize);
    this.random = opts.random ?? new Random();
    this.logger = opts.logger ?? silentLogger;
    this.onGeneration = opts.onGeneration;
  }

  evolve(templates: readonly ParameterMap[], fitness: FitnessFunction, bounds: MutationBounds = {}): EvolutionOutcome {
    validateBounds(bounds);
    const N = this.populationSize;
    this.logger.step('Evolution start', `N=${N}, G=${this.generations}, pm=${this.mutationRate}, pc=${this.crossoverRate}, k=${this.tournamentSize}`);

    let population = createPopulation(templates, N, this.random);
    let evaluations = 0;
    for (const g of population) { evaluateGenome(g, fitness); evaluations++; }

    const history: GenerationStats[] = [];
    for (let gen = 0; gen < this.generations; gen++) {
      const stats = fitnessStats(population, gen);
      history.push(stats);
      this.logger.debug(`Gen ${gen}: best=${stats.bestFitness.toFixed(4)} mean=${stats.meanFitness.toFixed(4)} worst=${stats.worstFitness.toFixed(4)}`);
      this.onGeneration?.(stats, population);

      const next: Genome[] = [cloneGenome(bestGenome(population))];
      while (next.length < N) {
        const child = this.reproduce(population, gen + 1);
        mutateGenome(child, bounds, this.mutationRate, this.random);
        evaluateGenome(child, fitness);
        evaluations++;
        next.push(child);
      }
      population = next.slice(0, N);
    }

    const best = bestGenome(population);
    this.logger.step('Evolution done', `best=${(best.fitness ?? -Infinity).toFixed(4)} evaluations=${evaluations}`);
    return { best: cloneGenome(best), population, history, evaluations };
  }

  private reproduce(population: readonly Genome[], generation: number): Genome {
    if (this.random.chance(this.crossoverRate)) {
      const a = tournamentSelect(population, this.tournamentSize, this.random);
      const b = tournamentSelect(population, this.tournamentSize, this.random);
      return uniformCrossover(a, b, this.random, generation);
    }
    return cloneAsChild(tournamentSelect(population, this.tournamentSize, this.random), generation);
  }
}
