const TRUTHY_TOKENS = new Set(['on', 'true', '1']);

/**
 * Coerce a flag from a JSON body or a form field. `true`, `1` and the
 * tokens "on" / "true" / "1" (any case, no surrounding whitespace) are
 * true; everything else, including absence, is false.
 */
export function coerceFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value === 1;
  if (typeof value === 'string') {
    return TRUTHY_TOKENS.has(value.toLowerCase());
  }
  return false;
}
