import type { ConfigSource } from "../../ports/config-source"

/**
 * Fixed values, typically overrides passed by the caller or a test.
 */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name = "object",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
