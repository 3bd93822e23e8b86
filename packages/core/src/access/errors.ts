import type { AccessOperation } from '../types';

/**
 * Why a permission check failed.
 * Field-level denials name the offending field.
 */
export type AccessDenial =
  | { kind: 'object'; operation: AccessOperation; objectType: string }
  | { kind: 'field'; operation: AccessOperation; objectType: string; field: string };

export interface DenialLabels {
  object?: string;
  field?: string;
}

/**
 * Render a denial as a user-facing message, preferring labels over API names
 */
export function formatDenial(denial: AccessDenial, labels: DenialLabels = {}): string {
  const verb = denial.operation;
  const objectName = labels.object ?? denial.objectType;

  if (denial.kind === 'field') {
    const fieldName = labels.field ?? denial.field;
    return `Insufficient access to ${verb} field ${fieldName} on ${objectName}`;
  }

  return `Insufficient access to ${verb} ${objectName}`;
}

export class AccessDeniedError extends Error {
  readonly denial: AccessDenial;

  constructor(denial: AccessDenial, message: string = formatDenial(denial)) {
    super(message);
    this.name = 'AccessDeniedError';
    this.denial = denial;
  }
}

export function isAccessDeniedError(error: unknown): error is AccessDeniedError {
  return error instanceof AccessDeniedError;
}
