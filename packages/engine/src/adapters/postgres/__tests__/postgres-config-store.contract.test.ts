import { describeConfigStoreContract } from "../../../ports/__tests__/config-store.contract"
import { PostgresConfigStore } from "../postgres-config-store"
import { FakePg } from "./fake-pg"

describeConfigStoreContract({
  name: "PostgresConfigStore",
  make: async () => {
    const store = new PostgresConfigStore(new FakePg())
    await store.ensureSchema()
    return store
  },
})
