/**
 * How a value is rendered on a protocol line:
 * - `structured`: arrays, plain objects and maps, as compact JSON
 * - `boolean`: the tokens `TRUE` / `FALSE`
 * - `scalar`: anything else, as its natural string form
 */
export type StreamValueKind = 'structured' | 'boolean' | 'scalar';

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function classifyValue(value: unknown): StreamValueKind {
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'object' && value !== null) {
    if (Array.isArray(value) || value instanceof Map || isPlainObject(value)) return 'structured';
  }
  return 'scalar';
}
