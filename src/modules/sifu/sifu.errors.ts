/**
 * SIFU ENGINE — Errors
 *
 * One error class, discriminated by `kind`. A validation failure on any
 * component aborts the evaluation of the whole SIFU.
 */

import { AppError } from '../../common/errors.js';

export type SilErrorKind =
  | 'MissingRate'
  | 'InvalidParameter'
  | 'InvalidBeta'
  | 'InvalidRatio'
  | 'ModeMismatch'
  | 'DuplicateIdentifier'
  | 'PartitionInvariantViolation';

const STATUS_BY_KIND: Record<SilErrorKind, number> = {
  MissingRate: 422,
  InvalidParameter: 422,
  InvalidBeta: 422,
  InvalidRatio: 422,
  ModeMismatch: 422,
  DuplicateIdentifier: 422,
  PartitionInvariantViolation: 500,
};

export class SilValidationError extends AppError {
  readonly kind: SilErrorKind;
  readonly componentId?: string;

  constructor(kind: SilErrorKind, message: string, componentId?: string) {
    const prefix = componentId ? `${componentId}: ` : '';
    super(kind, `${prefix}${message}`, STATUS_BY_KIND[kind], componentId ? { componentId } : undefined);
    this.name = 'SilValidationError';
    this.kind = kind;
    this.componentId = componentId;
  }
}

export function isSilValidationError(err: unknown): err is SilValidationError {
  return err instanceof SilValidationError;
}
