import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: () =>
    new EnvSource({
      prefix: "CONFIGURATOR_",
      env: { CONFIGURATOR_PORT: "8253", HOME: "/root" },
    }),
  expected: { PORT: "8253" },
})
