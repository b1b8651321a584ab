import type { CanonicalMap, CanonicalValue, Serializer, SerializeResult } from '../../domain/index.js';
import { SerializationError, freezeCanonical } from '../../domain/index.js';

export interface JsonSerializerOptions {
  /** Maximum nesting depth before serialization fails. */
  readonly maxDepth?: number;
}

const DEFAULT_MAX_DEPTH = 32;

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

/** Defines `key` as an own data property, so `__proto__` is kept as a member. */
function setMember(out: Record<string, CanonicalValue>, key: string, value: CanonicalValue): void {
  Object.defineProperty(out, key, { value, enumerable: true, writable: true, configurable: true });
}

function keyPath(path: string, key: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

/**
 * Default serialization engine: converts arbitrary values into canonical
 * trees following JSON rules, but strictly.
 *
 * - `undefined` members are omitted; `undefined` list items become `null`
 * - `Date` → ISO string, `toJSON()` results are used in place of the object
 * - `Map` (string keys) → map, `Set` → list
 * - NaN/Infinity, bigint, symbols, functions, cycles and nesting deeper than
 *   `maxDepth` fail with a `SerializationError` naming the path
 *
 * The returned tree is deep-frozen.
 */
export function createJsonSerializer(options: JsonSerializerOptions = {}): Serializer {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  function convert(value: unknown, path: string, depth: number, seen: Set<object>): CanonicalValue {
    switch (typeof value) {
      case 'string':
      case 'boolean':
        return value;
      case 'number':
        if (!Number.isFinite(value)) {
          throw new SerializationError(`Non-finite number ${String(value)}`, path);
        }
        return value;
      case 'undefined':
        return null;
      case 'bigint':
      case 'symbol':
      case 'function':
        throw new SerializationError(`Unsupported value of type ${typeof value}`, path);
    }

    if (typeof value !== 'object' || value === null) return null;
    if (depth > maxDepth) {
      throw new SerializationError(`Nesting deeper than ${maxDepth} levels`, path);
    }
    if (seen.has(value)) {
      throw new SerializationError('Circular reference', path);
    }

    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) throw new SerializationError('Invalid date', path);
      return value.toISOString();
    }

    seen.add(value);
    try {
      if (Array.isArray(value) || value instanceof Set) {
        return Array.from<unknown, CanonicalValue>(value, (item, i) =>
          convert(item, `${path}[${i}]`, depth + 1, seen),
        );
      }

      if (value instanceof Map) {
        const out: Record<string, CanonicalValue> = {};
        for (const [key, item] of value) {
          if (typeof key !== 'string') {
            throw new SerializationError(`Map key of type ${typeof key}`, path);
          }
          if (item === undefined) continue;
          setMember(out, key, convert(item, keyPath(path, key), depth + 1, seen));
        }
        return out;
      }

      if (hasToJSON(value)) {
        return convert(value.toJSON(), path, depth, seen);
      }

      const out: Record<string, CanonicalValue> = {};
      for (const [key, item] of Object.entries(value)) {
        if (item === undefined) continue;
        setMember(out, key, convert(item, keyPath(path, key), depth + 1, seen));
      }
      return out satisfies CanonicalMap;
    } finally {
      seen.delete(value);
    }
  }

  return {
    serialize(value: unknown): SerializeResult {
      try {
        return { ok: true, value: freezeCanonical(convert(value, '$', 0, new Set())) };
      } catch (err: unknown) {
        if (err instanceof SerializationError) return { ok: false, error: err };
        return {
          ok: false,
          error: new SerializationError('Value could not be read', '$', { cause: err }),
        };
      }
    },
  };
}
