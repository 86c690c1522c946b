import { GeneticOptimizer } from '../src/genetic.js';
import { FitnessEvaluationError, InvalidConfigError, NoTemplatesError } from '../src/errors.js';
import { Random } from '../src/random.js';
import type { FitnessFunction, GenerationStats } from '../src/types.js';

const towardFive: FitnessFunction = genes => {
  const x = typeof genes.x === 'number' ? genes.x : 0;
  return -((x - 5) ** 2);
};
const bounds = { x: { std: 1, min: -10, max: 10 } };

describe('GeneticOptimizer', () => {
  test('population size, history length and evaluation count', () => {
    const ga = new GeneticOptimizer({ populationSize: 12, generations: 7, random: new Random(1) });
    const out = ga.evolve([{ x: 0 }], towardFive, bounds);
    expect(out.population).toHaveLength(12);
    expect(out.history).toHaveLength(7);
    expect(out.history.map(h => h.generation)).toEqual([0, 1, 2, 3, 4, 5, 6]);
    expect(out.evaluations).toBe(12 + 7 * 11);
    out.population.forEach(g => expect(g.fitness).not.toBeNull());
  });

  test('elitism keeps the best fitness from decreasing', () => {
    const ga = new GeneticOptimizer({ populationSize: 20, generations: 30, mutationRate: 0.5, random: new Random(17) });
    const out = ga.evolve([{ x: -8 }, { x: 9 }], towardFive, bounds);
    for (let i = 1; i < out.history.length; i++) {
      expect(out.history[i].bestFitness).toBeGreaterThanOrEqual(out.history[i - 1].bestFitness);
    }
    expect(out.best.fitness).toBeGreaterThanOrEqual(out.history[out.history.length - 1].bestFitness);
  });

  test('zero generations evaluates the initial population only', () => {
    const ga = new GeneticOptimizer({ populationSize: 5, generations: 0, random: new Random(3) });
    const out = ga.evolve([{ x: 1 }, { x: 4 }], towardFive);
    expect(out.history).toEqual([]);
    expect(out.evaluations).toBe(5);
    expect(out.population).toHaveLength(5);
  });

  test('onGeneration sees every recorded generation', () => {
    const seen: GenerationStats[] = [];
    const sizes: number[] = [];
    const ga = new GeneticOptimizer({
      populationSize: 6,
      generations: 4,
      random: new Random(9),
      onGeneration: (stats, population) => { seen.push(stats); sizes.push(population.length); }
    });
    const out = ga.evolve([{ x: 0 }], towardFive, bounds);
    expect(seen).toEqual(out.history);
    expect(sizes).toEqual([6, 6, 6, 6]);
  });

  test('same seed, same run', () => {
    const run = () => new GeneticOptimizer({ populationSize: 10, generations: 10, mutationRate: 0.4, random: new Random(77) })
      .evolve([{ x: 0 }], towardFive, bounds);
    const a = run();
    const b = run();
    expect(a.history).toEqual(b.history);
    expect(a.best.genes).toEqual(b.best.genes);
  });

  test('best is a copy, not a population member', () => {
    const out = new GeneticOptimizer({ populationSize: 4, generations: 2, random: new Random(5) }).evolve([{ x: 0 }], towardFive, bounds);
    expect(out.population).not.toContain(out.best);
  });

  test('converges on a quadratic optimum', () => {
    let hits = 0;
    for (let seed = 1; seed <= 10; seed++) {
      const ga = new GeneticOptimizer({ populationSize: 30, generations: 60, mutationRate: 0.3, random: new Random(seed) });
      const out = ga.evolve([{ x: 0 }], towardFive, bounds);
      const x = out.best.genes.x;
      if (typeof x === 'number' && Math.abs(x - 5) <= 0.5) hits++;
    }
    expect(hits).toBeGreaterThanOrEqual(8);
  });

  test('default rates reach the optimum within tolerance', () => {
    const wide = { x: { std: 1, min: -50, max: 50 } };
    let hits = 0;
    for (let seed = 1; seed <= 10; seed++) {
      const out = new GeneticOptimizer({ populationSize: 30, generations: 50, random: new Random(seed) }).evolve([{ x: 0 }], towardFive, wide);
      const x = out.best.genes.x;
      const fitness = out.best.fitness ?? -Infinity;
      if (typeof x === 'number' && Math.abs(x - 5) <= 0.5 && Math.abs(fitness) <= 0.25) hits++;
    }
    expect(hits).toBeGreaterThanOrEqual(8);
  });

  test('fitness failures propagate', () => {
    const ga = new GeneticOptimizer({ populationSize: 4, generations: 3, random: new Random(1) });
    let calls = 0;
    const flaky: FitnessFunction = () => {
      calls++;
      if (calls === 6) throw new Error('sensor offline');
      return 0;
    };
    expect(() => ga.evolve([{ x: 0 }], flaky, bounds)).toThrow(FitnessEvaluationError);
  });

  test('rejects bad inputs', () => {
    expect(() => new GeneticOptimizer({ populationSize: 0 })).toThrow(InvalidConfigError);
    expect(() => new GeneticOptimizer({ generations: -1 })).toThrow(InvalidConfigError);
    expect(() => new GeneticOptimizer({ crossoverRate: 2 })).toThrow(InvalidConfigError);
    expect(() => new GeneticOptimizer().evolve([], towardFive)).toThrow(NoTemplatesError);
    expect(() => new GeneticOptimizer().evolve([{ x: 0 }], towardFive, { x: { std: 1, min: 1, max: 0 } })).toThrow(InvalidConfigError);
  });
});
