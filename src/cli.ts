#!/usr/bin/env node
import * as fs from 'node:fs/promises';
import dotenv from 'dotenv';
import type { FitnessFunction, GeneValue, MutationBound, MutationBounds, ParameterMap, PolicyState } from './types.js';
import { loadDefaultCatalog } from './catalog.js';
import { loadConfig, type AgentConfig } from './config.js';
import { DiscoveryCoordinator, stateKey } from './discovery.js';
import { AgentError, InvalidConfigError } from './errors.js';
import { isObject, parseJsonWithSchema, toNumber, type Schema } from './json.js';
import { createLogger, isLogLevel, type Logger } from './logger.js';
import { ParameterOptimizer } from './optimizer.js';
import { RunStore } from './persist.js';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  env: NodeJS.ProcessEnv;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_UNKNOWN_CATEGORY = 2;

const USAGE = [
  'Usage: algo-discovery <command> [--flags]',
  '  catalog   [--category c]',
  '  discover  --category c --size n [--quality q]',
  '  reinforce --category c --size n --algorithm a --reward r',
  '  history   [--limit n] [--category c] [--algorithm a]',
  '  optimize  --input file.json',
  'Common: --store dir  --config file  --log  --log-level level'
].join('\n');

export interface ParsedArgs {
  command: string | undefined;
  args: Record<string, string>;
}

/** `<command> --key value --flag`; a flag without a value is 'true' */
export function parseArgs(argv: string[]): ParsedArgs {
  const args: Record<string, string> = {};
  let command: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const cur = argv[i];
    if (cur.startsWith('--')) {
      const key = cur.slice(2);
      const next = argv[i + 1];
      const val = next !== undefined && !next.startsWith('--') ? argv[++i] : 'true';
      args[key] = val;
    } else if (command === undefined) {
      command = cur;
    }
  }
  return { command, args };
}

/** Input file of the `optimize` command */
export interface OptimizeInput {
  algorithm: string;
  templates: ParameterMap[];
  mutation: MutationBounds;
  target: Record<string, number>;
}

const isGeneValue = (x: unknown): x is GeneValue =>
  typeof x === 'number' || typeof x === 'string' || typeof x === 'boolean';

function parameterMap(key: string, x: unknown): ParameterMap {
  if (!isObject(x)) throw new InvalidConfigError(key, 'must be an object');
  const out: ParameterMap = {};
  for (const [k, v] of Object.entries(x)) {
    if (!isGeneValue(v)) throw new InvalidConfigError(`${key}.${k}`, 'must be a number, string or boolean');
    out[k] = v;
  }
  return out;
}

function mutationBound(key: string, x: unknown): MutationBound {
  if (!isObject(x)) throw new InvalidConfigError(key, 'must be an object with std, min and max');
  return { std: toNumber(`${key}.std`, x.std), min: toNumber(`${key}.min`, x.min), max: toNumber(`${key}.max`, x.max) };
}

export const optimizeInputSchema: Schema<OptimizeInput> = {
  parse(input: unknown): OptimizeInput {
    if (!isObject(input)) throw new InvalidConfigError('input', 'must be a JSON object');
    if (typeof input.algorithm !== 'string' || input.algorithm === '') throw new InvalidConfigError('algorithm', 'must be a non-empty string');
    let templates: ParameterMap[];
    if (Array.isArray(input.templates)) {
      templates = input.templates.map((t, i) => parameterMap(`templates[${i}]`, t));
    } else if (input.params !== undefined) {
      templates = [parameterMap('params', input.params)];
    } else {
      throw new InvalidConfigError('input', 'needs "templates" or "params"');
    }
    const mutation: MutationBounds = {};
    if (input.mutation !== undefined) {
      if (!isObject(input.mutation)) throw new InvalidConfigError('mutation', 'must be an object');
      for (const [k, v] of Object.entries(input.mutation)) mutation[k] = mutationBound(`mutation.${k}`, v);
    }
    if (!isObject(input.target)) throw new InvalidConfigError('target', 'must be an object of numbers');
    const target: Record<string, number> = {};
    for (const [k, v] of Object.entries(input.target)) target[k] = toNumber(`target.${k}`, v);
    return { algorithm: input.algorithm, templates, mutation, target };
  }
};

/** Negated squared distance to `target` over its keys; non-numeric genes count as 0 */
export function distanceFitness(target: Readonly<Record<string, number>>): FitnessFunction {
  return genes => {
    let sum = 0;
    for (const [k, t] of Object.entries(target)) {
      const g = genes[k];
      const d = (typeof g === 'number' ? g : 0) - t;
      sum += d * d;
    }
    return -sum;
  };
}

interface Context {
  args: Record<string, string>;
  io: CliIo;
  config: AgentConfig;
  store: RunStore;
  logger: Logger;
}

function required(args: Record<string, string>, key: string): string {
  const v = args[key];
  if (v === undefined || v === 'true') throw new InvalidConfigError(key, `missing --${key}`);
  return v;
}

function optionalNumber(args: Record<string, string>, key: string): number | undefined {
  return args[key] === undefined ? undefined : toNumber(key, args[key]);
}

/** A fixed seed advanced by the stored visit total, so successive calls draw differently but replay per store */
export function callSeed(seed: number | undefined, policyState: PolicyState | null): number | undefined {
  if (seed === undefined) return undefined;
  const visits = (policyState?.visits ?? []).reduce((sum, [, n]) => sum + n, 0);
  return (seed + Math.imul(visits, 0x9e3779b9)) >>> 0;
}

function coordinatorFor(ctx: Context, policyState: PolicyState | null): DiscoveryCoordinator {
  const { learningRate, discountFactor, epsilon } = ctx.config;
  const seed = callSeed(ctx.config.seed, policyState);
  return new DiscoveryCoordinator({ learningRate, discountFactor, epsilon, seed, policyState, logger: ctx.logger.child('discovery') });
}

async function withLock<T>(store: RunStore, fn: () => Promise<T>): Promise<T> {
  const unlock = await store.lock();
  try {
    return await fn();
  } finally {
    await unlock();
  }
}

function catalogCommand(ctx: Context): number {
  const catalog = loadDefaultCatalog();
  const category = ctx.args.category;
  if (category === undefined) {
    catalog.categories().forEach(c => ctx.io.out(c));
    return EXIT_OK;
  }
  if (!catalog.hasCategory(category)) {
    ctx.io.err(`Unknown category "${category}"`);
    return EXIT_UNKNOWN_CATEGORY;
  }
  for (const name of catalog.rankByTimeComplexity(category)) {
    const c = catalog.complexityOf(category, name);
    ctx.io.out(`${name}\ttime=${c.time}\tspace=${c.space}`);
  }
  return EXIT_OK;
}

async function discoverCommand(ctx: Context): Promise<number> {
  const category = required(ctx.args, 'category');
  const size = toNumber('size', required(ctx.args, 'size'));
  const quality = optionalNumber(ctx.args, 'quality');
  return withLock(ctx.store, async () => {
    const coordinator = coordinatorFor(ctx, await ctx.store.loadPolicy());
    const result = coordinator.discover(category, size, quality === undefined ? {} : { quality });
    if (!result.ok) {
      ctx.io.err(`Unknown category "${result.category}"`);
      return EXIT_UNKNOWN_CATEGORY;
    }
    await ctx.store.recordDiscovery(result.record);
    await ctx.store.savePolicy(coordinator.snapshot());
    ctx.io.out(JSON.stringify(result.record, null, 2));
    return EXIT_OK;
  });
}

async function reinforceCommand(ctx: Context): Promise<number> {
  const category = required(ctx.args, 'category');
  const size = toNumber('size', required(ctx.args, 'size'));
  const algorithm = required(ctx.args, 'algorithm');
  const reward = toNumber('reward', required(ctx.args, 'reward'));
  return withLock(ctx.store, async () => {
    const coordinator = coordinatorFor(ctx, await ctx.store.loadPolicy());
    if (!coordinator.catalog.hasCategory(category)) {
      ctx.io.err(`Unknown category "${category}"`);
      return EXIT_UNKNOWN_CATEGORY;
    }
    if (!coordinator.catalog.algorithmsFor(category).includes(algorithm)) {
      throw new InvalidConfigError('algorithm', `"${algorithm}" is not a ${category} algorithm`);
    }
    const state = stateKey(category, size);
    const value = coordinator.reinforce({ state, selectedAlgorithm: algorithm }, reward);
    await ctx.store.savePolicy(coordinator.snapshot());
    ctx.io.out(JSON.stringify({ state, algorithm, value }));
    return EXIT_OK;
  });
}

async function historyCommand(ctx: Context): Promise<number> {
  const records = await ctx.store.listDiscoveries({
    limit: optionalNumber(ctx.args, 'limit'),
    category: ctx.args.category,
    algorithm: ctx.args.algorithm
  });
  for (const r of records) {
    const quality = r.quality === null ? '' : `\tquality=${r.quality}`;
    ctx.io.out(`${r.createdAt}\t${r.category}\tn=${r.inputSize}\t${r.selectedAlgorithm}${quality}`);
  }
  return EXIT_OK;
}

async function optimizeCommand(ctx: Context): Promise<number> {
  const file = required(ctx.args, 'input');
  const input = parseJsonWithSchema(await fs.readFile(file, 'utf8'), optimizeInputSchema, file);
  const { populationSize, generations, mutationRate, crossoverRate, tournamentSize, seed } = ctx.config;
  const optimizer = new ParameterOptimizer(input.algorithm, input.templates, {
    populationSize, generations, mutationRate, crossoverRate, tournamentSize, seed,
    logger: ctx.logger
  });
  ctx.logger.step('Optimize', input.algorithm);
  const result = optimizer.optimize(distanceFitness(input.target), input.mutation);
  await ctx.store.recordOptimization(result);
  ctx.io.out(JSON.stringify({
    id: result.id,
    algorithm: result.algorithm,
    bestFitness: result.bestFitness,
    genes: result.bestGenome.genes,
    generations: result.generations,
    evaluations: result.evaluations
  }, null, 2));
  return EXIT_OK;
}

const defaultIo: CliIo = {
  // eslint-disable-next-line no-console
  out: line => console.log(line),
  // eslint-disable-next-line no-console
  err: line => console.error(line),
  env: process.env
};

/** Runs one command; resolves to the process exit code. */
export async function main(argv: string[] = process.argv.slice(2), io: CliIo = defaultIo): Promise<number> {
  const { command, args } = parseArgs(argv);
  if (command === undefined || args.help !== undefined) {
    io.out(USAGE);
    return command === undefined && args.help === undefined ? EXIT_FAILURE : EXIT_OK;
  }
  const levelArg = args['log-level'] ?? 'info';
  if (!isLogLevel(levelArg)) {
    io.err(`Unknown log level "${levelArg}"`);
    return EXIT_FAILURE;
  }
  const logger = createLogger(args.log !== undefined && args.log !== 'false', levelArg, 'algo');

  try {
    const config = await loadConfig({ file: args.config, env: io.env });
    const store = new RunStore(args.store ?? io.env.RUNS_ROOT ?? 'runs');
    const ctx: Context = { args, io, config, store, logger };
    switch (command) {
      case 'catalog': return catalogCommand(ctx);
      case 'discover': return await discoverCommand(ctx);
      case 'reinforce': return await reinforceCommand(ctx);
      case 'history': return await historyCommand(ctx);
      case 'optimize': return await optimizeCommand(ctx);
      default:
        io.err(`Unknown command "${command}"`);
        io.out(USAGE);
        return EXIT_FAILURE;
    }
  } catch (e) {
    if (!(e instanceof AgentError)) throw e;
    logger.debug(JSON.stringify(e.toJSON()));
    io.err(`Error [${e.code}]: ${e.message}`);
    return EXIT_FAILURE;
  }
}

// Run when invoked directly (not when imported by tests)
if (require.main === module) {
  dotenv.config();
  main()
    .then(code => { process.exitCode = code; })
    .catch((err: unknown) => { console.error(err); process.exitCode = EXIT_FAILURE; });
}
