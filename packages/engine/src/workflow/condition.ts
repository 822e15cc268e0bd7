/**
 * Condition parsing
 *
 * @module @flowgraph/engine/workflow/condition
 */

const TRUE_LITERALS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_LITERALS = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

/**
 * Parse a condition node's output as a boolean literal.
 *
 * Case-sensitive: `TRUE`, `True` and `true` parse, `tRuE` does not.
 * Returns undefined for anything outside the literal set.
 */
export function parseBoolean(text: string): boolean | undefined {
  if (TRUE_LITERALS.has(text)) return true;
  if (FALSE_LITERALS.has(text)) return false;
  return undefined;
}
