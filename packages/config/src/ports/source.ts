/**
 * Loads raw configuration values. Validation and coercion happen later, in
 * `loadConfig`, against the schema.
 *
 * Sources are applied in order; a later source wins on the same key.
 */
export interface ConfigSource {
  /** Shown by `IConfig.explain()`, e.g. `env` or `dotenv:.env`. */
  readonly name: string

  /** An `undefined` value means the source does not provide that key. */
  load(): Promise<Record<string, unknown>>
}
