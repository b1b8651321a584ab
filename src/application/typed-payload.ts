import type { z } from 'zod';

/**
 * A statically-typed payload: a value bundled with the zod schema that
 * describes it.
 *
 * The gateway validates the value against the schema before serializing it.
 * Any failure on this path is fatal for the call: the event is not sent.
 *
 * @example
 * ```typescript
 * const Purchase = z.object({ sku: z.string(), revenue: z.number() });
 * analytics.track('Order Completed', typed(Purchase, { sku: 'tee-01', revenue: 19 }));
 * ```
 */
export class TypedPayload<T> {
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  readonly value: T;

  constructor(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: T) {
    this.schema = schema;
    this.value = value;
  }
}

export function typed<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: T): TypedPayload<T> {
  return new TypedPayload(schema, value);
}
