/**
 * Tells property lines apart from transition-rule lines.
 *
 * @module
 */
export const PROPERTY_SEPARATOR = ":";

/** A property line is any line carrying the `key : value` separator. */
export function isProperty(line: string): boolean {
  return line.includes(PROPERTY_SEPARATOR);
}
