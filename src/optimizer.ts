import { v4 as uuidv4 } from 'uuid';
import type { FitnessFunction, GeneticOptions, MutationBounds, OptimizationResult, ParameterMap } from './types.js';
import { NoTemplatesError } from './errors.js';
import { GeneticOptimizer } from './genetic.js';
import { type Logger, silentLogger } from './logger.js';
import { copyGenes } from './population.js';
import { Random } from './random.js';

export interface ParameterOptimizerOptions extends Omit<GeneticOptions, 'random'> {
  seed?: number;
  random?: Random;
}

/** Tunes one algorithm's parameters with the genetic optimizer. */
export class ParameterOptimizer {
  readonly algorithm: string;
  private readonly templates: ParameterMap[];
  private readonly genetic: GeneticOptimizer;
  private readonly logger: Logger;

  constructor(algorithm: string, params: ParameterMap | readonly ParameterMap[], opts: ParameterOptimizerOptions = {}) {
    this.algorithm = algorithm;
    this.templates = (isTemplateList(params) ? params : [params]).map(copyGenes);
    if (this.templates.length === 0) throw new NoTemplatesError();
    this.logger = (opts.logger ?? silentLogger).child(algorithm);
    const { seed, random, ...genetic } = opts;
    this.genetic = new GeneticOptimizer({ ...genetic, random: random ?? new Random(seed), logger: this.logger });
  }

  optimize(fitness: FitnessFunction, mutationBounds: MutationBounds = {}): Readonly<OptimizationResult> {
    const startedAt = new Date().toISOString();
    const outcome = this.genetic.evolve(this.templates, fitness, mutationBounds);
    const result: OptimizationResult = {
      id: uuidv4(),
      algorithm: this.algorithm,
      bestGenome: outcome.best,
      bestFitness: outcome.best.fitness ?? -Infinity,
      history: outcome.history,
      generations: outcome.history.length,
      evaluations: outcome.evaluations,
      startedAt,
      finishedAt: new Date().toISOString()
    };
    Object.freeze(result.bestGenome.genes);
    Object.freeze(result.bestGenome);
    result.history.forEach(h => Object.freeze(h));
    Object.freeze(result.history);
    return Object.freeze(result);
  }
}

function isTemplateList(x: ParameterMap | readonly ParameterMap[]): x is readonly ParameterMap[] {
  return Array.isArray(x);
}
