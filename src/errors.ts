/**
 * Error taxonomy. Unknown categories and unvisited states are returned
 * as values; everything here is thrown.
 */

export const ErrorCodes = {
  NO_LEGAL_ACTIONS: 'NO_LEGAL_ACTIONS',
  NO_TEMPLATES: 'NO_TEMPLATES',
  FITNESS_EVALUATION_FAILED: 'FITNESS_EVALUATION_FAILED',
  INVALID_CONFIG: 'INVALID_CONFIG',
  STORE_LOCKED: 'STORE_LOCKED',
  STORE_CORRUPT: 'STORE_CORRUPT'
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class AgentError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'AgentError';
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause instanceof Error ? { name: this.cause.name, message: this.cause.message } : undefined
    };
  }
}

/** The category exists but has no configured algorithms, or the caller passed none. */
export class NoLegalActionsError extends AgentError {
  readonly state: string;

  constructor(state: string) {
    super(`No legal actions for state "${state}"`, ErrorCodes.NO_LEGAL_ACTIONS);
    this.name = 'NoLegalActionsError';
    this.state = state;
  }
}

export class NoTemplatesError extends AgentError {
  constructor() {
    super('Cannot build a population without templates', ErrorCodes.NO_TEMPLATES);
    this.name = 'NoTemplatesError';
  }
}

export class FitnessEvaluationError extends AgentError {
  readonly genomeId: string;

  constructor(genomeId: string, message: string, cause?: Error) {
    super(`Fitness evaluation failed for genome ${genomeId}: ${message}`, ErrorCodes.FITNESS_EVALUATION_FAILED, cause);
    this.name = 'FitnessEvaluationError';
    this.genomeId = genomeId;
  }
}

export class InvalidConfigError extends AgentError {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid "${key}": ${message}`, ErrorCodes.INVALID_CONFIG);
    this.name = 'InvalidConfigError';
    this.key = key;
  }
}

export class StoreError extends AgentError {
  constructor(message: string, code: typeof ErrorCodes.STORE_LOCKED | typeof ErrorCodes.STORE_CORRUPT, cause?: Error) {
    super(message, code, cause);
    this.name = 'StoreError';
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
