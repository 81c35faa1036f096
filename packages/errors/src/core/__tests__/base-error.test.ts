import { BaseError } from "../base-error"

class StoreOfflineError extends BaseError<"config_store_unavailable"> {}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2026-03-02T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("keeps message and code", () => {
    const err = new BaseError("Snapshot 7 is not valid JSON", { code: "malformed_snapshot" })

    expect(err.message).toBe("Snapshot 7 is not valid JSON")
    expect(err.code).toBe("malformed_snapshot")
  })

  it("uses the subclass name", () => {
    const err = new StoreOfflineError("offline", { code: "config_store_unavailable" })

    expect(err.name).toBe("StoreOfflineError")
    expect(err).toBeInstanceOf(BaseError)
    expect(err).toBeInstanceOf(Error)
  })

  it("applies defaults", () => {
    const err = new BaseError("x", { code: "x" })

    expect(err.context).toEqual({})
    expect(err.isRetryable).toBe(false)
    expect(err.isOperational).toBe(true)
    expect(err.timestamp).toEqual(new Date("2026-03-02T08:00:00.000Z"))
    expect(err.cause).toBeUndefined()
  })

  it("freezes a copy of the context", () => {
    const context = { configId: 3 }
    const err = new BaseError("x", { code: "x", context })

    context.configId = 4

    expect(err.context).toEqual({ configId: 3 })
    expect(Object.isFrozen(err.context)).toBe(true)
  })

  it("keeps the cause", () => {
    const cause = new Error("connection refused")
    const err = new StoreOfflineError("offline", {
      code: "config_store_unavailable",
      cause,
      isRetryable: true,
    })

    expect(err.cause).toBe(cause)
    expect(err.isRetryable).toBe(true)
  })

  it("toJSON returns the serialized shape", () => {
    const err = new BaseError("rejected", {
      code: "config_store_unavailable",
      context: { configId: 12 },
    })

    expect(err.toJSON()).toEqual({
      name: "BaseError",
      code: "config_store_unavailable",
      message: "rejected",
      context: { configId: 12 },
      isOperational: true,
      isRetryable: false,
      timestamp: "2026-03-02T08:00:00.000Z",
    })
  })
})
