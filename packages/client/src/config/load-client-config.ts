import { type ConfigSource, DotenvSource, EnvSource, loadConfig, ObjectSource } from "@loungekit/config"
import { type ClientConfig, type EnvConfig, envSchema, mapEnvToConfig } from "./schema"

export const ENV_PREFIX = "LOUNGE_"

/**
 * Unprefixed keys with values as the environment would hold them, e.g.
 * `{ TIMEOUT_MS: 500, LOG_PRETTY: "true" }`.
 */
export type ConfigOverrides = Partial<Record<keyof EnvConfig, string | number>>

/**
 * Reads `.env` (when present) and then `env`, both restricted to `LOUNGE_`
 * keys, then `overrides`. Later sources win.
 */
export async function loadClientConfig(
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd(),
): Promise<ClientConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd, prefix: ENV_PREFIX }),
    new EnvSource({ env, prefix: ENV_PREFIX }),
    new ObjectSource(overrides),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
