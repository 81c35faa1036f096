export type Milliseconds = number
export type Seconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = number

export function secondsToMs(seconds: Seconds): Milliseconds {
  return seconds * 1000
}
