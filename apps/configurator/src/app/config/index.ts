export { buildEngineSettings } from "./engine-settings"
export { type CliOverrides, resolveConfiguration } from "./resolve-configuration"
export {
  type ConfigStoreKind,
  type ConfigurationBag,
  isSubcommand,
  SUBCOMMANDS,
  type Subcommand,
} from "./schema"
export { validateConfiguration } from "./validate-configuration"
