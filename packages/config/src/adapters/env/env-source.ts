import type { ConfigSource } from "../../ports/source"
import { stripPrefix } from "../shared/strip-prefix"

export type EnvSourceOptions = {
  /** Only read keys with this prefix, e.g. `"LOUNGE_"`; it is stripped. */
  prefix?: string
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    return stripPrefix(this.options.env ?? process.env, this.options.prefix)
  }
}
