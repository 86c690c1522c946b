/* Strict domain types for algorithm discovery and parameter tuning */

import type { Logger } from './logger.js';
import type { Random } from './random.js';

/** Opaque lookup key derived from (category, input-size bucket) */
export type State = string;

/** Candidate algorithm name drawn from the catalog */
export type Action = string;

export interface Complexity {
  time: string;
  space: string;
}

/** category -> algorithm -> complexity labels */
export type CatalogTable = Record<string, Record<string, Complexity>>;

export interface ValueEntry {
  state: State;
  action: Action;
  /** Running value estimate */
  value: number;
  /** Number of updates applied to this entry */
  updates: number;
}

/** Serializable policy state for resume */
export interface PolicyState {
  version: 1;
  entries: ValueEntry[];
  visits: Array<[State, number]>;
  /** Actions seen per state, in first-seen order; absent in older snapshots */
  actions?: Array<[State, Action[]]>;
}

export interface PolicyOptions {
  learningRate?: number;   // default 0.1
  discountFactor?: number; // default 0.95
  epsilon?: number;        // default 0.1
  random?: Random;
}

export type GeneValue = number | string | boolean;
export type ParameterMap = Record<string, GeneValue>;

export interface Genome {
  id: string;
  genes: ParameterMap;
  /** null until evaluated */
  fitness: number | null;
  generation: number;
  parentIds: string[];
}

/** Caller-supplied objective; higher is better. May throw. */
export type FitnessFunction = (genes: Readonly<ParameterMap>) => number;

export interface MutationBound {
  /** Standard deviation of the Gaussian noise */
  std: number;
  min: number;
  max: number;
}

export type MutationBounds = Record<string, MutationBound>;

export interface GenerationStats {
  generation: number;
  bestFitness: number;
  meanFitness: number;
  worstFitness: number;
}

export interface GeneticOptions {
  populationSize?: number; // default 50
  generations?: number;    // default 100
  mutationRate?: number;   // default 0.1
  crossoverRate?: number;  // default 0.8
  tournamentSize?: number; // default 3
  random?: Random;
  logger?: Logger;
  /** Called after each generation's stats are recorded, before reproduction */
  onGeneration?: (stats: GenerationStats, population: readonly Genome[]) => void;
}

export interface EvolutionOutcome {
  best: Genome;
  population: Genome[];
  history: GenerationStats[];
  /** Total fitness-function calls */
  evaluations: number;
}

export interface DiscoveryRecord {
  id: string;
  category: string;
  inputSize: number;
  state: State;
  selectedAlgorithm: Action;
  timeComplexity: string;
  spaceComplexity: string;
  /** Measured or caller-supplied quality; null when none was given */
  quality: number | null;
  /** ISO timestamp */
  createdAt: string;
}

export type DiscoveryResult =
  | { ok: true; record: Readonly<DiscoveryRecord> }
  | { ok: false; reason: 'unknown_category'; category: string };

export interface OptimizationResult {
  id: string;
  algorithm: string;
  bestGenome: Genome;
  bestFitness: number;
  history: GenerationStats[];
  generations: number;
  evaluations: number;
  startedAt: string;
  finishedAt: string;
}

export interface DiscoveryQuery {
  limit?: number;
  category?: string;
  algorithm?: string;
}

/** Durable storage for discovery and optimization results */
export interface DiscoverySink {
  recordDiscovery(record: Readonly<DiscoveryRecord>): Promise<void>;
  recordOptimization(result: Readonly<OptimizationResult>): Promise<void>;
  listDiscoveries(query?: DiscoveryQuery): Promise<DiscoveryRecord[]>;
  listOptimizations(query?: Omit<DiscoveryQuery, 'category'>): Promise<OptimizationResult[]>;
  loadPolicy(): Promise<PolicyState | null>;
  savePolicy(state: PolicyState): Promise<void>;
}
