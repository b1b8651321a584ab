import { z } from 'zod';
import type { CanonicalValue, IdentityState } from '../domain/index.js';
import { InvalidEventError } from '../domain/index.js';

/**
 * Zod schema for a non-empty identifier (event name, user id, group id...).
 * Whitespace-only strings count as empty.
 */
export const identifierSchema = z
  .string({ invalid_type_error: 'must be a string' })
  .refine((value) => value.trim().length > 0, { message: 'must not be empty' });

/**
 * Validates an identifier and returns it unchanged.
 * Throws `InvalidEventError` naming the field on failure.
 */
export function requireIdentifier(field: string, value: unknown): string {
  const parsed = identifierSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidEventError(field, parsed.error.issues[0]?.message ?? 'invalid value');
  }
  return parsed.data;
}

/** Recursive schema matching the canonical value tree. */
export const canonicalValueSchema: z.ZodType<CanonicalValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(canonicalValueSchema),
    z.record(z.string(), canonicalValueSchema),
  ]),
);

/** Renders a zod issue path as a JSON path, e.g. `$.items[2].price`. */
export function formatIssuePath(path: readonly (string | number)[]): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : `${acc}.${segment}`),
    '$',
  );
}

/** Shape of a persisted identity record. */
export const identityStateSchema = z.object({
  anonymousId: identifierSchema,
  userId: identifierSchema.optional(),
  traits: z.record(z.string(), canonicalValueSchema).optional(),
});

/**
 * Parses untrusted persisted data into an `IdentityState`.
 * Returns `null` when the data does not match the schema.
 */
export function parseIdentityState(raw: unknown): IdentityState | null {
  const parsed = identityStateSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { anonymousId, userId, traits } = parsed.data;
  return {
    anonymousId,
    ...(userId !== undefined ? { userId } : {}),
    ...(traits !== undefined ? { traits } : {}),
  };
}
