import { FakeClock } from "@configurator/clock"
import { BaseError } from "@configurator/errors"
import { NullLogger } from "@configurator/logger"
import { createServer } from "../../server/server"
import type { ErrorMappingsConfig } from "../errors"

class StoreError extends BaseError<"config_store_unavailable" | "config_not_found"> {}

function appWith(config: ErrorMappingsConfig, thrown: () => unknown) {
  const server = createServer(
    { clock: new FakeClock(0), logger: new NullLogger() },
    {
      port: 0,
      requestId: { enabled: true, generate: () => "generated-id" },
      errorHandling: { kind: "mappings", config },
      routes: (app) => {
        app.get("/boom", () => {
          throw thrown()
        })
      },
    },
  )

  return server.build()
}

describe("error handler from mappings", () => {
  const config: ErrorMappingsConfig = {
    mappings: {
      config_store_unavailable: { status: 503, message: "Config store unavailable" },
    },
  }

  it("maps a known code to its status and message", async () => {
    const app = appWith(
      config,
      () => new StoreError("pool exhausted", { code: "config_store_unavailable" }),
    )

    const res = await app.request("/boom", { headers: { "x-request-id": "req-1" } })

    expect(res.status).toBe(503)
    expect(await res.json()).toStrictEqual({
      error: {
        code: "config_store_unavailable",
        status: 503,
        message: "Config store unavailable",
        requestId: "req-1",
      },
    })
  })

  it("keeps the code of an unmapped AppError but hides its message", async () => {
    const app = appWith(
      config,
      () => new StoreError("id 7 missing", { code: "config_not_found" }),
    )

    const res = await app.request("/boom")

    expect(res.status).toBe(500)
    expect(await res.json()).toStrictEqual({
      error: {
        code: "config_not_found",
        status: 500,
        message: "An unexpected error occurred",
        requestId: "generated-id",
      },
    })
  })

  it("uses the fallback for plain errors", async () => {
    const app = appWith(config, () => new Error("secret detail"))

    const res = await app.request("/boom")

    expect(res.status).toBe(500)
    expect(await res.json()).toStrictEqual({
      error: {
        code: "internal_error",
        status: 500,
        message: "An unexpected error occurred",
        requestId: "generated-id",
      },
    })
  })

  it("adds fields from transformContext", async () => {
    const app = appWith(
      { ...config, transformContext: (e) => ({ details: e.context }) },
      () =>
        new StoreError("pool exhausted", {
          code: "config_store_unavailable",
          context: { attempt: 2 },
        }),
    )

    const body = await (await app.request("/boom")).json()

    expect(body).toMatchObject({ error: { details: { attempt: 2 } } })
  })
})
