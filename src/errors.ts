import { Violation } from './types';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ValidationError extends Error {
  readonly violations: Violation[];

  constructor(violations: Violation[]) {
    super(violations.map((violation) => `${violation.field}: ${violation.message}`).join('; '));
    this.name = 'ValidationError';
    this.violations = violations;
  }
}

export class StoreError extends Error {
  constructor(
    readonly operation: string,
    readonly cause: unknown,
  ) {
    super(`Store operation "${operation}" failed: ${errorMessage(cause)}`);
    this.name = 'StoreError';
  }
}

export class TransportError extends Error {
  constructor(
    readonly operation: string,
    readonly cause: unknown,
    readonly status?: number,
  ) {
    super(`Transport operation "${operation}" failed: ${errorMessage(cause)}`);
    this.name = 'TransportError';
  }
}

export function withStore<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StoreError) throw error;
    throw new StoreError(operation, error);
  }
}

export function extractErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }

  if (error instanceof TransportError && error.status !== undefined) {
    return error.status;
  }

  const status = 'status' in error ? error.status : undefined;
  if (typeof status !== 'number') {
    return undefined;
  }

  return Number.isFinite(status) ? status : undefined;
}

export function isMessageAlreadyDeleted(error: unknown): boolean {
  if (extractErrorStatus(error) === 404) {
    return true;
  }

  const normalized = errorMessage(error).toLowerCase();
  return normalized.includes('not found')
    || normalized.includes('message not found')
    || normalized.includes('already deleted');
}
