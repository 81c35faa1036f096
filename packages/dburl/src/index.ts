export { InsufficientSafeCharactersError, UnknownSchemeError } from "./core/dburl-error"
export type { UrlComponents } from "./core/parse-url"
export {
  type DatabaseScheme,
  parseDatabaseUrl,
  toDialectUrl,
} from "./core/to-dialect-url"
