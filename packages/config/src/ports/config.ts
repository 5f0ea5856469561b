/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ MAX_LENGTH: z.coerce.number().default(100) }),
 *   sources: [new EnvSource({ prefix: "IDPACK_" })],
 * })
 *
 * config.get("MAX_LENGTH")     // 100
 * config.explain("MAX_LENGTH") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that supplied the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys supplied by sources that the schema does not define. */
  extras(): string[]
}
