import { FakeClock } from "@configurator/clock"
import { NullLogger } from "@configurator/logger"
import type { Mock } from "vitest"
import { createErrorHandler } from "../../errors/create-error-handler"
import { ServerError } from "../../errors/server-error"
import { buildApp } from "../../lifecycle/build-app"
import { createStopper } from "../../lifecycle/create-stopper"
import type { LifecycleHook } from "../../lifecycle/lifecycle-hook"
import type { Closeable } from "../../lifecycle/shutdown"
import { shutdown } from "../../lifecycle/shutdown"
import { startup } from "../../lifecycle/startup"
import { createDefaultMiddleware } from "../../middleware/create-default-middleware"
import { Server, type ServerCollaborators } from "../server"
import { resolveOptions } from "../server-options"

describe("Server", () => {
  let closed: number
  let listen: Mock<ServerCollaborators["listen"]>
  let setupProcessHandlers: Mock<ServerCollaborators["setupProcessHandlers"]>

  beforeEach(() => {
    closed = 0
    const closeable: Closeable = {
      close: (cb) => {
        closed++
        cb?.()
      },
    }
    listen = vi.fn<ServerCollaborators["listen"]>(() => closeable)
    setupProcessHandlers = vi.fn<ServerCollaborators["setupProcessHandlers"]>(() => ({
      unregister: () => {},
    }))
  })

  function makeServer(startHooks: LifecycleHook[] = []): Server {
    const options = resolveOptions({
      port: 8253,
      errorHandling: { kind: "mappings", config: { mappings: {} } },
      routes: (app) => {
        app.get("/ping", (c) => c.text("pong"))
      },
      startHooks,
    })

    return new Server({ clock: new FakeClock(0), logger: new NullLogger() }, options, {
      onStartup: startup,
      onShutdown: shutdown,
      listen,
      buildApp,
      createStopper,
      setupProcessHandlers,
      createDefaultMiddleware,
      createErrorHandler,
    })
  }

  it("serves routes from build() without starting", async () => {
    const server = makeServer()
    const app = server.build()

    const res = await app.request("/ping")

    expect(res.status).toBe(200)
    expect(await res.text()).toBe("pong")
    expect(server.getState()).toBe("idle")
  })

  it("reports not ready until started", async () => {
    const server = makeServer()
    const app = server.build()

    const res = await app.request("/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toStrictEqual({ ok: false, reason: "starting" })
  })

  it("listens after the start hooks succeed", async () => {
    const ran: string[] = []
    const server = makeServer([{ name: "bootstrap", fn: async () => void ran.push("hook") }])

    const handle = await server.start()

    expect(ran).toStrictEqual(["hook"])
    expect(listen).toHaveBeenCalledTimes(1)
    expect(server.getState()).toBe("started")
    expect(server.isReady()).toBe(true)
    expect(handle.address).toStrictEqual({ host: "0.0.0.0", port: 8253 })
  })

  it("does not listen when a start hook fails", async () => {
    const server = makeServer([
      {
        name: "bootstrap",
        fn: async () => {
          throw new Error("store offline")
        },
      },
    ])

    const err = await server.start().catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ServerError)
    expect(err).toMatchObject({
      code: "startup_failed",
      message: "Startup hook failed: bootstrap",
      context: { hooks: ["bootstrap"], timedOut: false },
    })
    expect(listen).not.toHaveBeenCalled()
    expect(server.getState()).toBe("idle")
  })

  it("refuses to start twice", async () => {
    const server = makeServer()
    await server.start()

    await expect(server.start()).rejects.toMatchObject({ code: "server_already_started" })
  })

  it("stops through the handle and drops readiness", async () => {
    const server = makeServer()
    const handle = await server.start()

    const res = await handle.stop()

    expect(res.ok).toBe(true)
    expect(closed).toBe(1)
    expect(server.isReady()).toBe(false)
  })

  it("registers process handlers once", () => {
    const server = makeServer()

    server.setupProcessHandlers().setupProcessHandlers()

    expect(setupProcessHandlers).toHaveBeenCalledTimes(1)
  })
})
