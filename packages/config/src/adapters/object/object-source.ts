import type { ConfigSource } from "../../ports/source"

/** Fixed values, typically programmatic overrides applied last. */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Record<string, unknown>,
    name = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
