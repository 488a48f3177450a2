/**
 * Machine definition error definitions.
 *
 * Raised by the config and transition parsers; execution never throws.
 *
 * @module
 */
export class ConfigError extends Error {
  override name = "ConfigError";
}
