import { Hono } from "hono"
import { requestIdMiddleware } from "../request-id"

describe("requestIdMiddleware", () => {
  function app() {
    const a = new Hono()
    a.use(
      "*",
      requestIdMiddleware({ enabled: true, header: "X-Request-Id", generate: () => "gen-1" }),
    )
    a.get("/", (c) => c.text(c.get("requestId")))
    return a
  }

  it("reuses the incoming header", async () => {
    const res = await app().request("/", { headers: { "x-request-id": "abc" } })

    expect(await res.text()).toBe("abc")
    expect(res.headers.get("x-request-id")).toBe("abc")
  })

  it("generates an id when the header is missing or blank", async () => {
    const res = await app().request("/", { headers: { "x-request-id": "  " } })

    expect(await res.text()).toBe("gen-1")
    expect(res.headers.get("x-request-id")).toBe("gen-1")
  })
})
