/** RFC 3986 Appendix B. Matches every string. */
const URI_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/

export interface UrlComponents {
  /** Lowercased. */
  scheme: string
  netloc: string
  username: string
  password: string
  /** Case preserved here; `parseDatabaseUrl` lowercases it. IPv6 brackets removed. */
  host: string
  port: string
  path: string
  query?: string
  fragment?: string
  /** `path` without leading or trailing slashes. */
  schema: string
}

export function parseUrl(url: string): UrlComponents {
  const match = URI_PATTERN.exec(url)
  const netloc = match?.[2] ?? ""
  const path = match?.[3] ?? ""

  const at = netloc.lastIndexOf("@")
  const userinfo = at === -1 ? "" : netloc.slice(0, at)
  const hostport = at === -1 ? netloc : netloc.slice(at + 1)

  const colon = userinfo.indexOf(":")
  const username = colon === -1 ? userinfo : userinfo.slice(0, colon)
  const password = colon === -1 ? "" : userinfo.slice(colon + 1)

  return {
    scheme: (match?.[1] ?? "").toLowerCase(),
    netloc,
    username,
    password,
    ...splitHostPort(hostport),
    path,
    ...(match?.[4] !== undefined && { query: match[4] }),
    ...(match?.[5] !== undefined && { fragment: match[5] }),
    schema: path.replace(/^\/+|\/+$/g, ""),
  }
}

function splitHostPort(hostport: string): { host: string; port: string } {
  const bracketed = /^\[([^\]]*)\](?::(\d*))?$/.exec(hostport)
  if (bracketed) return { host: bracketed[1] ?? "", port: bracketed[2] ?? "" }

  const withPort = /^(.*):(\d*)$/.exec(hostport)
  if (withPort) return { host: withPort[1] ?? "", port: withPort[2] ?? "" }

  return { host: hostport, port: "" }
}

export function formatUrl(parts: UrlComponents): string {
  let out = parts.scheme ? `${parts.scheme}:` : ""

  if (parts.netloc || parts.scheme) out += `//${parts.netloc}`
  out += parts.path
  if (parts.query !== undefined) out += `?${parts.query}`
  if (parts.fragment !== undefined) out += `#${parts.fragment}`

  return out
}
