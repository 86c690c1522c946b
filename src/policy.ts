import type { Action, PolicyOptions, PolicyState, State, ValueEntry } from './types.js';
import { NoLegalActionsError, InvalidConfigError } from './errors.js';
import { probability } from './json.js';
import { Random } from './random.js';

export const DEFAULT_POLICY_OPTIONS = {
  learningRate: 0.1,
  discountFactor: 0.95,
  epsilon: 0.1
} as const;

const keyOf = (state: State, action: Action): string => `${state}\u0000${action}`;

/**
 * Epsilon-greedy action selection over tabular value estimates, updated with
 * the one-step bootstrapped rule
 * `Q(s,a) += alpha * (r + gamma * max_a' Q(s',a') - Q(s,a))`.
 */
export class QPolicy {
  readonly learningRate: number;
  readonly discountFactor: number;
  readonly epsilon: number;
  private readonly random: Random;
  private entries = new Map<string, ValueEntry>();
  /** Actions seen per state (offered or written), first seen first; bestAction ties resolve to it */
  private actionsByState = new Map<State, Action[]>();
  private visits = new Map<State, number>();

  constructor(opts: PolicyOptions = {}) {
    this.learningRate = probability('learningRate', opts.learningRate ?? DEFAULT_POLICY_OPTIONS.learningRate);
    this.discountFactor = probability('discountFactor', opts.discountFactor ?? DEFAULT_POLICY_OPTIONS.discountFactor);
    this.epsilon = probability('epsilon', opts.epsilon ?? DEFAULT_POLICY_OPTIONS.epsilon);
    this.random = opts.random ?? new Random();
  }

  /** Pick an action; counts as a visit to `state`. */
  selectAction(state: State, legalActions: readonly Action[]): Action {
    if (legalActions.length === 0) throw new NoLegalActionsError(state);
    this.visits.set(state, this.visitsOf(state) + 1);
    legalActions.forEach(a => this.noteAction(state, a));

    if (this.random.chance(this.epsilon)) return this.random.pick(legalActions);

    let best = -Infinity;
    let maximizers: Action[] = [];
    for (const a of legalActions) {
      const q = this.valueOf(state, a);
      if (q > best) { best = q; maximizers = [a]; }
      else if (q === best) maximizers.push(a);
    }
    return this.random.pick(maximizers);
  }

  /** Apply one bootstrapped update; returns the new estimate. Sole writer of values. */
  update(state: State, action: Action, reward: number, nextState: State, nextLegalActions: readonly Action[]): number {
    if (!Number.isFinite(reward)) throw new InvalidConfigError('reward', `must be a finite number, got ${reward}`);
    const old = this.valueOf(state, action);
    const maxNext = nextLegalActions.length
      ? Math.max(...nextLegalActions.map(a => this.valueOf(nextState, a)))
      : 0;
    const value = old + this.learningRate * (reward + this.discountFactor * maxNext - old);

    const key = keyOf(state, action);
    const entry = this.entries.get(key);
    if (entry) {
      entry.value = value;
      entry.updates += 1;
    } else {
      this.entries.set(key, { state, action, value, updates: 1 });
      this.noteAction(state, action);
    }
    return value;
  }

  /**
   * Highest-valued action seen for `state`, unwritten ones counting at 0.
   * Null only for a state never visited and never updated.
   */
  bestAction(state: State): Action | null {
    const seen = this.actionsByState.get(state);
    if (!seen || seen.length === 0) return null;
    let bestA = seen[0];
    let bestQ = this.valueOf(state, bestA);
    for (const a of seen.slice(1)) {
      const q = this.valueOf(state, a);
      if (q > bestQ) { bestQ = q; bestA = a; }
    }
    return bestA;
  }

  /** Current estimate; 0 for a pair never updated (not materialized) */
  valueOf(state: State, action: Action): number {
    return this.entries.get(keyOf(state, action))?.value ?? 0;
  }

  visitsOf(state: State): number {
    return this.visits.get(state) ?? 0;
  }

  reset(): void {
    this.entries = new Map();
    this.actionsByState = new Map();
    this.visits = new Map();
  }

  serialize(): PolicyState {
    return {
      version: 1,
      entries: [...this.entries.values()].map(e => ({ ...e })),
      visits: [...this.visits.entries()],
      actions: [...this.actionsByState.entries()].map(([s, seen]): [State, Action[]] => [s, [...seen]])
    };
  }

  static from(state: PolicyState, opts: PolicyOptions = {}): QPolicy {
    const p = new QPolicy(opts);
    for (const [s, seen] of state.actions ?? []) seen.forEach(a => p.noteAction(s, a));
    for (const e of state.entries) {
      p.entries.set(keyOf(e.state, e.action), { ...e });
      p.noteAction(e.state, e.action);
    }
    for (const [s, n] of state.visits) p.visits.set(s, n);
    return p;
  }

  private noteAction(state: State, action: Action): void {
    const seen = this.actionsByState.get(state);
    if (!seen) this.actionsByState.set(state, [action]);
    else if (!seen.includes(action)) seen.push(action);
  }
}
