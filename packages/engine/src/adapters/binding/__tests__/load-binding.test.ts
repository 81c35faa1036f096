import { mock } from "vitest-mock-extended"
import type { EngineHandleV3 } from "../../../ports/engine-binding"
import { loadEngineBinding } from "../load-binding"

describe("loadEngineBinding", () => {
  const binding = { sdkVersionMajor: 3, createEngine: () => mock<EngineHandleV3>() }

  it("takes the default export", async () => {
    const loaded = await loadEngineBinding("engine-module", async () => ({ default: binding }))

    expect(loaded).toBe(binding)
  })

  it("falls back to a named binding export", async () => {
    const loaded = await loadEngineBinding("engine-module", async () => ({ binding }))

    expect(loaded).toBe(binding)
  })

  it("rejects a module without a usable binding", async () => {
    await expect(
      loadEngineBinding("engine-module", async () => ({
        default: { sdkVersionMajor: 4, createEngine: () => ({}) },
      })),
    ).rejects.toMatchObject({
      code: "engine_binding_invalid",
      context: { specifier: "engine-module" },
    })
  })

  it("reports an import failure", async () => {
    await expect(
      loadEngineBinding("missing-module", async () => {
        throw new Error("Cannot find module")
      }),
    ).rejects.toMatchObject({ code: "engine_error", context: { operation: "import" } })
  })
})
