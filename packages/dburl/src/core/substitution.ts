import { InsufficientSafeCharactersError } from "./dburl-error"

const SAFE_PUNCTUATION = ["$", "-", "_", ".", "+", "!", "*", "(", ")", ",", '"']
const LOWER = Array.from({ length: 26 }, (_, i) => String.fromCharCode(0x61 + i))
const UPPER = Array.from({ length: 26 }, (_, i) => String.fromCharCode(0x41 + i))

/** Substitute candidates, in priority order. */
export const SAFE_CHARACTERS: readonly string[] = [...SAFE_PUNCTUATION, ...LOWER, ...UPPER]

/** Characters a generic URL parser would misread (RFC 1738 "unsafe"). */
export const UNSAFE_CHARACTERS: ReadonlySet<string> = new Set([
  '"', "<", ">", "#", "%", "{", "}", "|", "\\", "^", "~", "[", "]", "`",
])

export interface Substitution {
  /** The input with every unsafe character replaced. */
  masked: string
  /** Puts the original characters back into any substring of `masked`. */
  restore: (value: string) => string
}

/**
 * Swaps each distinct unsafe character for a safe one that does not occur
 * in `url`. Unsafe characters are assigned in order of first appearance.
 */
export function substitute(url: string): Substitution {
  const unsafe: string[] = []

  for (const ch of url) {
    if (UNSAFE_CHARACTERS.has(ch) && !unsafe.includes(ch)) unsafe.push(ch)
  }

  const free = SAFE_CHARACTERS.filter((ch) => !url.includes(ch))

  if (unsafe.length > free.length) {
    throw new InsufficientSafeCharactersError(unsafe, free.length)
  }

  const forward = new Map(unsafe.map((ch, i) => [ch, free[i] ?? ch]))
  const backward = new Map(unsafe.map((ch, i) => [free[i] ?? ch, ch]))

  const swap = (value: string, table: Map<string, string>) =>
    Array.from(value, (ch) => table.get(ch) ?? ch).join("")

  return {
    masked: swap(url, forward),
    restore: (value) => swap(value, backward),
  }
}
