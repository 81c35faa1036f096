export const VERSION = "0.1.0"

export const UPDATED = "2026-10-19"
