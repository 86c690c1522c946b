import { v4 as uuidv4 } from 'uuid';
import type { Action, DiscoveryRecord, DiscoveryResult, PolicyOptions, PolicyState, State } from './types.js';
import { AlgorithmCatalog, loadDefaultCatalog } from './catalog.js';
import { InvalidConfigError } from './errors.js';
import { type Logger, silentLogger } from './logger.js';
import { QPolicy } from './policy.js';
import { Random } from './random.js';

export interface CoordinatorOptions extends Omit<PolicyOptions, 'random'> {
  catalog?: AlgorithmCatalog;
  /** Seed for the coordinator's own random source */
  seed?: number;
  random?: Random;
  logger?: Logger;
  /** Restore previously learned values and visit counts */
  policyState?: PolicyState | null;
}

export interface DiscoverOptions {
  /** Measured quality of the selection, when the caller has one */
  quality?: number;
}

export interface ProblemRef {
  category: string;
  inputSize: number;
}

/** Number of decimal digits of the floored size: 0..9 -> 1, 10..99 -> 2, ... */
export function sizeBucket(inputSize: number): number {
  if (!Number.isFinite(inputSize) || inputSize < 0) {
    throw new InvalidConfigError('inputSize', `must be a non-negative finite number, got ${inputSize}`);
  }
  const n = Math.floor(inputSize);
  if (n < 10) return 1;
  let digits = Math.floor(Math.log10(n)) + 1;
  // log10 may land just off an exact power of ten
  if (10 ** (digits - 1) > n) digits--;
  else if (10 ** digits <= n) digits++;
  return digits;
}

export function stateKey(category: string, inputSize: number): State {
  return `${category}:d${sizeBucket(inputSize)}`;
}

/**
 * Picks an algorithm for (category, input size) with an epsilon-greedy policy
 * and keeps an append-only history of the choices it made.
 */
export class DiscoveryCoordinator {
  readonly catalog: AlgorithmCatalog;
  private readonly policyOptions: PolicyOptions;
  private readonly logger: Logger;
  private policy: QPolicy;
  private records: Array<Readonly<DiscoveryRecord>> = [];

  constructor(opts: CoordinatorOptions = {}) {
    this.catalog = opts.catalog ?? loadDefaultCatalog();
    this.logger = opts.logger ?? silentLogger;
    this.policyOptions = {
      learningRate: opts.learningRate,
      discountFactor: opts.discountFactor,
      epsilon: opts.epsilon,
      random: opts.random ?? new Random(opts.seed)
    };
    this.policy = opts.policyState ? QPolicy.from(opts.policyState, this.policyOptions) : new QPolicy(this.policyOptions);
  }

  discover(category: string, inputSize: number, opts: DiscoverOptions = {}): DiscoveryResult {
    if (!this.catalog.hasCategory(category)) {
      this.logger.warn(`Unknown category "${category}"`);
      return { ok: false, reason: 'unknown_category', category };
    }
    const state = stateKey(category, inputSize);
    if (opts.quality !== undefined && !Number.isFinite(opts.quality)) {
      throw new InvalidConfigError('quality', `must be a finite number, got ${opts.quality}`);
    }

    const selected = this.policy.selectAction(state, this.catalog.algorithmsFor(category));
    const complexity = this.catalog.complexityOf(category, selected);
    const record: Readonly<DiscoveryRecord> = Object.freeze({
      id: uuidv4(),
      category,
      inputSize,
      state,
      selectedAlgorithm: selected,
      timeComplexity: complexity.time,
      spaceComplexity: complexity.space,
      quality: opts.quality ?? null,
      createdAt: new Date().toISOString()
    });
    this.records.push(record);
    this.logger.debug(`Selected ${selected} for ${state} (visits=${this.policy.visitsOf(state)})`);
    return { ok: true, record };
  }

  /**
   * Feed measured reward for a past selection back into the policy. Terminal
   * by default; pass `next` to bootstrap from the follow-up problem's values.
   */
  reinforce(record: Pick<DiscoveryRecord, 'state' | 'selectedAlgorithm'>, reward: number, opts: { next?: ProblemRef } = {}): number {
    const nextState = opts.next ? stateKey(opts.next.category, opts.next.inputSize) : record.state;
    const nextActions = opts.next ? this.catalog.algorithmsFor(opts.next.category) : [];
    const value = this.policy.update(record.state, record.selectedAlgorithm, reward, nextState, nextActions);
    this.logger.debug(`Reinforced ${record.selectedAlgorithm}@${record.state} reward=${reward} value=${value.toFixed(4)}`);
    return value;
  }

  bestAlgorithm(category: string, inputSize: number): Action | null {
    return this.policy.bestAction(stateKey(category, inputSize));
  }

  valueOf(category: string, inputSize: number, algorithm: Action): number {
    return this.policy.valueOf(stateKey(category, inputSize), algorithm);
  }

  visitsOf(category: string, inputSize: number): number {
    return this.policy.visitsOf(stateKey(category, inputSize));
  }

  /** Most recent records, oldest first; all of them when `limit` is omitted */
  history(limit?: number): Array<Readonly<DiscoveryRecord>> {
    if (limit === undefined) return [...this.records];
    return limit > 0 ? this.records.slice(-limit) : [];
  }

  snapshot(): PolicyState {
    return this.policy.serialize();
  }

  /** Back to the unlearned state: no values, no visits, no history */
  reset(): void {
    this.policy = new QPolicy(this.policyOptions);
    this.records = [];
    this.logger.info('Coordinator reset');
  }
}
