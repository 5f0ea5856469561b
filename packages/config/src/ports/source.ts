/**
 * A source of raw configuration values.
 *
 * Sources only load; zod coerces and validates downstream. Sources are applied
 * in order and later ones override earlier ones. A key mapped to `undefined`
 * counts as not provided.
 */
export interface ConfigSource {
  /** Name used for provenance, e.g. "env" or "object:overrides". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
