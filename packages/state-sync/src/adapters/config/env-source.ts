import type { ConfigSource } from "../../ports/config-source"

export type EnvSourceOptions = {
  /** Only variables starting with `prefix` are read, with the prefix stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>

  constructor(private readonly opts: EnvSourceOptions = {}) {
    this.env = opts.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return stripPrefix(this.env, this.opts.prefix)
  }
}

export function stripPrefix(
  values: Record<string, string | undefined>,
  prefix: string | undefined,
): Record<string, string | undefined> {
  if (!prefix) return { ...values }

  const filtered: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) filtered[key.slice(prefix.length)] = value
  }

  return filtered
}
