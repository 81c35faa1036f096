import { type Logger, NullLogger } from "@configurator/logger"
import { UnknownSchemeError } from "./dburl-error"
import { formatUrl, parseUrl, type UrlComponents } from "./parse-url"
import { substitute } from "./substitution"

export type DatabaseScheme = "mysql" | "postgresql" | "db2" | "sqlite3" | "mssql"

type Template = (p: UrlComponents) => string

const TEMPLATES: Record<DatabaseScheme, Template> = {
  mysql: (p) => `mysql://${p.username}:${p.password}@${p.host}:${p.port}/?schema=${p.schema}`,
  postgresql: (p) =>
    `postgresql://${p.username}:${p.password}@${p.host}:${p.port}:${p.schema}/`,
  db2: (p) => `db2://${p.username}:${p.password}@${p.schema}`,
  sqlite3: (p) => `sqlite3://${p.netloc}${p.path}`,
  mssql: (p) => `mssql://${p.username}:${p.password}@${p.schema}`,
}

function isDatabaseScheme(scheme: string): scheme is DatabaseScheme {
  return Object.hasOwn(TEMPLATES, scheme)
}

/**
 * Splits a canonical database URL into components. Credentials may contain
 * characters a URL parser would misread; they come back unchanged. The host
 * is lowercased, like the scheme.
 */
export function parseDatabaseUrl(url: string, logger: Logger = new NullLogger()): UrlComponents {
  const { masked, restore } = substitute(url)
  const raw = parseUrl(masked)

  const parts: UrlComponents = {
    scheme: restore(raw.scheme),
    netloc: restore(raw.netloc),
    username: restore(raw.username),
    password: restore(raw.password),
    host: restore(raw.host).toLowerCase(),
    port: restore(raw.port),
    path: restore(raw.path),
    ...(raw.query !== undefined && { query: restore(raw.query) }),
    ...(raw.fragment !== undefined && { fragment: restore(raw.fragment) }),
    schema: restore(raw.schema),
  }

  if (formatUrl(parts) !== url) {
    logger.warn("Rebuilt database URL differs from the input", { scheme: parts.scheme })
  }

  return parts
}

/** Rewrites a canonical database URL into the engine's per-dialect form. */
export function toDialectUrl(url: string, logger: Logger = new NullLogger()): string {
  const parts = parseDatabaseUrl(url, logger)

  if (!isDatabaseScheme(parts.scheme)) throw new UnknownSchemeError(parts.scheme)

  return TEMPLATES[parts.scheme](parts)
}
