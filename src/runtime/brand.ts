/**
 * Brand helper for "parse, don't validate".
 *
 * A branded value proves that normalization or validation already happened at a
 * boundary (config parsing, relative path normalization).
 *
 * Uses a string-keyed marker rather than a `unique symbol` so that zod schemas
 * transforming into branded types stay nameable when exported.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
