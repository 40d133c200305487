/**
 * @fileoverview Concord error hierarchy
 *
 * Input errors (unknown objectives, unresolvable conflicts, validation) end a
 * request. Infrastructure errors (cache, storage) are retryable and are
 * degraded around by the store wrapper.
 */

import type { ConflictSeverity } from '../types.js';

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class ConcordError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// INPUT ERRORS
// ============================================================================

export class UnknownObjectiveError extends ConcordError {
  readonly code = 'UNKNOWN_OBJECTIVE';
  readonly retryable = false;

  constructor(
    readonly names: string[],
    readonly known: string[],
  ) {
    super(`Unknown objective${names.length === 1 ? '' : 's'}: ${names.join(', ')}`);
    this.name = 'UnknownObjectiveError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        names: this.names,
        known: this.known,
      },
    };
  }
}

export interface OffendingConflict {
  a: string;
  b: string;
  severity: ConflictSeverity;
  component: number;
}

export class UnresolvableConflictError extends ConcordError {
  readonly code = 'UNRESOLVABLE_CONFLICT';
  readonly retryable = false;

  constructor(
    readonly pairs: OffendingConflict[],
    readonly harmonyScore: number,
    readonly minHarmony: number,
  ) {
    super(
      `Harmony ${harmonyScore.toFixed(3)} is below the minimum ${minHarmony.toFixed(3)}; ` +
        `relax one of: ${pairs.map((pair) => `${pair.a}/${pair.b}`).join(', ')}`,
    );
    this.name = 'UnresolvableConflictError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        pairs: this.pairs,
        harmonyScore: this.harmonyScore,
        minHarmony: this.minHarmony,
      },
    };
  }
}

export class ValidationError extends ConcordError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// INFRASTRUCTURE ERRORS
// ============================================================================

export type StorageOperation = 'read' | 'write' | 'delete' | 'evict' | 'migrate';

export class StorageError extends ConcordError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

export class CacheUnavailableError extends ConcordError {
  readonly code = 'CACHE_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    readonly operation: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Cache ${operation} unavailable: ${message}`);
    this.name = 'CacheUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isConcordError(error: unknown): error is ConcordError {
  return error instanceof ConcordError;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof ConcordError) return error.retryable;
  return error instanceof Error && error.name === 'TimeoutError';
}
