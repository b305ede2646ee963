import { z } from 'zod';

/**
 * Build an enum-like constant, its Zod schema and its literal union type
 * from one list of values.
 *
 * Keys are the values upper-cased, with dashes turned into underscores
 * (`'per-item'` becomes `PER_ITEM`).
 *
 * @example
 * ```ts
 * const runMode = createEnum(['per-item', 'playlist'] as const);
 *
 * runMode.object.PER_ITEM === 'per-item';
 * runMode.schema.parse('playlist');
 * type RunMode = typeof runMode.type; // 'per-item' | 'playlist'
 * ```
 */
export function createEnum<const T extends readonly [string, ...string[]]>(values: T) {
  const object = Object.fromEntries(values.map((value) => [toKey(value), value])) as {
    [V in T[number] as KeyOf<V>]: V;
  };

  return {
    values,
    object,
    schema: z.enum(values),
    type: null as unknown as T[number],
  };
}

type KeyOf<V extends string> = Uppercase<ReplaceDashes<V>>;

type ReplaceDashes<V extends string> = V extends `${infer Head}-${infer Tail}` ? `${Head}_${ReplaceDashes<Tail>}` : V;

function toKey(value: string): string {
  return value.replace(/-/g, '_').toUpperCase();
}
