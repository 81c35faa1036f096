import { EngineError } from "../../core/errors"
import type { EngineBinding } from "../../ports/engine-binding"

export type ModuleImporter = (specifier: string) => Promise<unknown>

const importModule: ModuleImporter = (specifier) => import(specifier)

/**
 * Imports `specifier` and returns its binding: the default export, or a
 * named `binding` export.
 */
export async function loadEngineBinding(
  specifier: string,
  importer: ModuleImporter = importModule,
): Promise<EngineBinding> {
  let mod: unknown

  try {
    mod = await importer(specifier)
  } catch (err) {
    throw EngineError.failed("import", err)
  }

  const candidate = pick(mod, "default") ?? pick(mod, "binding")

  if (!isEngineBinding(candidate)) {
    throw EngineError.bindingInvalid(
      specifier,
      "expected { sdkVersionMajor: 2 | 3, createEngine() } as the default or `binding` export",
    )
  }

  return candidate
}

function pick(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined

  return Reflect.get(value, key)
}

function isEngineBinding(value: unknown): value is EngineBinding {
  const major = pick(value, "sdkVersionMajor")

  return (major === 2 || major === 3) && typeof pick(value, "createEngine") === "function"
}
