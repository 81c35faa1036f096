import type { Engine, EngineFactory } from "../../ports/engine"
import type { EngineBinding } from "../../ports/engine-binding"
import { V2Engine } from "./v2-engine"
import { V3Engine } from "./v3-engine"

/** Picks the adapter for `binding` once; each call of the result makes a new engine. */
export function createEngineFactory(binding: EngineBinding): EngineFactory {
  switch (binding.sdkVersionMajor) {
    case 2:
      return () => new V2Engine(binding.createEngine())
    case 3:
      return () => new V3Engine(binding.createEngine())
  }
}

export function createEngine(binding: EngineBinding): Engine {
  return createEngineFactory(binding)()
}
