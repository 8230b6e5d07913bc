/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     REDIS_HOST: z.string().default("localhost"),
 *     REDIS_PORT: z.coerce.number().default(6379),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("REDIS_PORT")      // 6379
 * config.explain("REDIS_PORT")  // "default"
 * config.explain("REDIS_HOST")  // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that supplied the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that supplied at least one value, first use first. */
  sourcesUsed(): string[]

  /**
   * Keys supplied by a source that the schema does not know about. Usually a
   * typo or a leftover variable.
   */
  unknownKeys(): string[]
}
