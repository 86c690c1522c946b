import * as fs from 'node:fs/promises';
import { DEFAULT_GENETIC_OPTIONS } from './genetic.js';
import { DEFAULT_POLICY_OPTIONS } from './policy.js';
import { InvalidConfigError } from './errors.js';
import { isObject, nonNegativeInt, parseJsonWithSchema, positiveInt, probability, toNumber, type Schema } from './json.js';

/** Everything the core recognizes, with defaults applied */
export interface AgentConfig {
  learningRate: number;
  discountFactor: number;
  epsilon: number;
  populationSize: number;
  generations: number;
  mutationRate: number;
  crossoverRate: number;
  tournamentSize: number;
  /** Fixed seed for reproducible runs; random when absent */
  seed?: number;
}

export const DEFAULT_CONFIG: Readonly<AgentConfig> = Object.freeze({
  ...DEFAULT_POLICY_OPTIONS,
  ...DEFAULT_GENETIC_OPTIONS
});

type NumericKey = Exclude<keyof AgentConfig, 'seed'>;
type Check = (key: string, x: number) => number;

const FIELDS: Record<NumericKey, Check> = {
  learningRate: probability,
  discountFactor: probability,
  epsilon: probability,
  populationSize: positiveInt,
  generations: nonNegativeInt,
  mutationRate: probability,
  crossoverRate: probability,
  tournamentSize: positiveInt
};

const NUMERIC_KEYS: readonly NumericKey[] = [
  'learningRate', 'discountFactor', 'epsilon', 'populationSize', 'generations', 'mutationRate', 'crossoverRate', 'tournamentSize'
];

const ENV_KEYS: Record<keyof AgentConfig, string> = {
  learningRate: 'ALGO_LEARNING_RATE',
  discountFactor: 'ALGO_DISCOUNT_FACTOR',
  epsilon: 'ALGO_EPSILON',
  populationSize: 'ALGO_POPULATION_SIZE',
  generations: 'ALGO_GENERATIONS',
  mutationRate: 'ALGO_MUTATION_RATE',
  crossoverRate: 'ALGO_CROSSOVER_RATE',
  tournamentSize: 'ALGO_TOURNAMENT_SIZE',
  seed: 'ALGO_SEED'
};

/** Layer a partial, untrusted object over `base`. Unknown keys are ignored. */
export function resolveConfig(raw: Record<string, unknown>, base: Readonly<AgentConfig> = DEFAULT_CONFIG): AgentConfig {
  const out: AgentConfig = { ...base };
  for (const key of NUMERIC_KEYS) {
    if (raw[key] === undefined) continue;
    out[key] = FIELDS[key](key, toNumber(key, raw[key]));
  }
  if (raw.seed !== undefined) out.seed = nonNegativeInt('seed', toNumber('seed', raw.seed));
  return out;
}

/** Config keys read from `ALGO_*` environment variables */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const v = env[name];
    if (v !== undefined && v !== '') out[key] = v;
  }
  return out;
}

const configFileSchema: Schema<Record<string, unknown>> = {
  parse(input: unknown): Record<string, unknown> {
    if (!isObject(input)) throw new InvalidConfigError('config', 'must be a JSON object');
    return input;
  }
};

export async function loadConfigFile(file: string): Promise<Record<string, unknown>> {
  return parseJsonWithSchema(await fs.readFile(file, 'utf8'), configFileSchema, file);
}

/** defaults <- config file <- environment */
export async function loadConfig(opts: { file?: string; env?: NodeJS.ProcessEnv } = {}): Promise<AgentConfig> {
  const fromFile = opts.file ? resolveConfig(await loadConfigFile(opts.file)) : { ...DEFAULT_CONFIG };
  return resolveConfig(configFromEnv(opts.env ?? process.env), fromFile);
}
