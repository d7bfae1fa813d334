import { createHash } from 'node:crypto';

/**
 * Identity of one encrypted slot. Only ever turned into the derivation
 * string below; it is never persisted.
 */
export interface DerivationContext {
  modelType: string;
  field: string;
  identifier: string | null | undefined;
  /** Overrides the configured personalization for this derivation. */
  personalization?: string | null;
}

export type ContextInput = DerivationContext | string;

export function formatDerivationContext(context: ContextInput): string {
  if (typeof context === 'string') {
    return context;
  }
  return `${context.modelType}:${context.field}:${context.identifier ?? ''}`;
}

export function contextPersonalization(context: ContextInput): string | null {
  return typeof context === 'string' ? null : (context.personalization ?? null);
}

export type AadValue = string | number | boolean | null | undefined;

/**
 * Additional authenticated data for a record.
 *
 * - no identifier: `null`, AAD is not enforced for unsaved records
 * - no AAD fields: the identifier itself
 * - otherwise: SHA-256 hex of the identifier and the non-null field values,
 *   in declaration order, joined with ':'
 *
 * The result is recomputed from current values at reveal time, so editing a
 * bound field after encryption makes the stored envelope undecryptable.
 */
export function buildAad(
  identifier: string | null | undefined,
  aadValues: readonly AadValue[] = []
): Buffer | null {
  if (identifier === null || identifier === undefined || identifier === '') {
    return null;
  }

  if (aadValues.length === 0) {
    return Buffer.from(identifier, 'utf-8');
  }

  const parts = [identifier, ...aadValues]
    .filter((value): value is string | number | boolean => value !== null && value !== undefined)
    .map(value => String(value));

  return Buffer.from(createHash('sha256').update(parts.join(':')).digest('hex'), 'utf-8');
}
