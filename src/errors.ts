import type { ChainAxis } from './operators/types.js';
import type { ValidationFinding } from './schema/types.js';

export type ResolutionErrorCode = 'NOT_FOUND' | 'CIRCULAR_DEPENDENCY' | 'MISSING_PARENT' | 'VALIDATION_FAILED';

/**
 * Base class for every failure the resolution engine reports. Callers branch
 * on the subclass (or on `code`) instead of parsing messages.
 */
export abstract class ResolutionError extends Error {
  abstract readonly code: ResolutionErrorCode;

  /** Structured details, safe to serialize into an API response. */
  abstract details(): Record<string, unknown>;

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message, ...this.details() };
  }
}

export class NotFoundError extends ResolutionError {
  readonly code = 'NOT_FOUND';

  constructor(readonly operator: string) {
    super(`Operator "${operator}" not found`);
    this.name = 'NotFoundError';
  }

  details(): Record<string, unknown> {
    return { operator: this.operator };
  }
}

export class CircularDependencyError extends ResolutionError {
  readonly code = 'CIRCULAR_DEPENDENCY';

  /**
   * @param cycle - names from the first occurrence of the repeated name through its repetition
   * @param path - every name visited before the repetition was found, plus the repetition
   */
  constructor(
    readonly cycle: readonly string[],
    readonly path: readonly string[],
    readonly axis: ChainAxis,
  ) {
    super(`Circular dependency in ${axis} chain: ${cycle.join(' -> ')}`);
    this.name = 'CircularDependencyError';
  }

  details(): Record<string, unknown> {
    return { cycle: [...this.cycle], path: [...this.path], axis: this.axis };
  }
}

export class MissingParentError extends ResolutionError {
  readonly code = 'MISSING_PARENT';

  constructor(
    readonly operator: string,
    readonly missing: string,
    readonly kind: ChainAxis,
  ) {
    super(
      kind === 'theme'
        ? `Operator "${operator}" uses theme "${missing}", which does not exist`
        : `Operator "${operator}" extends "${missing}", which does not exist`,
    );
    this.name = 'MissingParentError';
  }

  details(): Record<string, unknown> {
    return { operator: this.operator, missing: this.missing, kind: this.kind };
  }
}

export class ValidationError extends ResolutionError {
  readonly code = 'VALIDATION_FAILED';
  readonly findings: readonly ValidationFinding[];

  constructor(readonly operator: string, findings: readonly ValidationFinding[]) {
    const errors = findings.filter((f) => f.severity === 'error');
    const first = errors[0];
    const summary = first ? `${first.field}: ${first.message}` : 'no error findings';
    const more = errors.length > 1 ? ` (and ${errors.length - 1} more)` : '';
    super(`Operator "${operator}" failed validation: ${summary}${more}`);
    this.name = 'ValidationError';
    this.findings = errors;
  }

  details(): Record<string, unknown> {
    return { operator: this.operator, findings: [...this.findings] };
  }
}

export function isResolutionError(err: unknown): err is ResolutionError {
  return err instanceof ResolutionError;
}
