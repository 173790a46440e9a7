import { z } from 'zod';

/**
 * Helper to create enum-like object with Zod schema
 * - Creates object with uppercase keys: 'episode_downloaded' -> EPISODE_DOWNLOADED
 * - Creates Zod schema for validation
 * - Infers TypeScript type as string literals
 *
 * @example
 * ```ts
 * const level = createEnum(['debug', 'info'] as const);
 *
 * // level.object.DEBUG === 'debug'
 * // level.schema - Zod schema
 * // typeof level.type === 'debug' | 'info'
 * ```
 */
export function createEnum<const T extends readonly [string, ...string[]]>(values: T) {
  const object = Object.fromEntries(values.map((v) => [v.toUpperCase(), v])) as {
    readonly [K in T[number] as Uppercase<K>]: K;
  };

  return {
    values,
    object,
    schema: z.enum(values),
    type: undefined as unknown as T[number],
  };
}
