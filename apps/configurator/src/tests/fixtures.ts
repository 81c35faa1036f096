import { mapEnvToConfig } from "../app/config/resolve-configuration"
import { type ConfigurationBag, envSchema } from "../app/config/schema"

/** Default configuration with `overrides` applied; touches neither env nor disk. */
export function makeConfig(overrides: Partial<ConfigurationBag> = {}): ConfigurationBag {
  return { ...mapEnvToConfig(envSchema.parse({}), "/"), ...overrides }
}
