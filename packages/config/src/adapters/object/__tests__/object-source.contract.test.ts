import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: () => new ObjectSource({ DEBUG: true, PORT: "9000", HOST: undefined }, "cli"),
  expected: { DEBUG: true, PORT: "9000" },
})

describe("ObjectSource", () => {
  it("leaves out undefined entries so they cannot mask earlier sources", async () => {
    const loaded = await new ObjectSource({ PORT: "9000", HOST: undefined }).load()

    expect(Object.keys(loaded)).toEqual(["PORT"])
  })
})
