import { Config } from "../config"

describe("Config", () => {
  const data = { MAX_LENGTH: 100, LOG_PRETTY: false, SERVICE_NAME: "idpack" }
  const provenance = { MAX_LENGTH: "env", LOG_PRETTY: "default", SERVICE_NAME: "object:overrides" }
  const providedKeys = new Set(["MAX_LENGTH", "SERVICE_NAME", "STALE_KEY"])

  const config = new Config(data, provenance, providedKeys)

  it("get() returns typed values", () => {
    const maxLength: number = config.get("MAX_LENGTH")

    expect(maxLength).toBe(100)
    expect(config.get("SERVICE_NAME")).toBe("idpack")
  })

  it("keys() lists schema keys only", () => {
    expect(config.keys()).toEqual(["MAX_LENGTH", "LOG_PRETTY", "SERVICE_NAME"])
  })

  it("explain() reports the source of a value", () => {
    expect(config.explain("MAX_LENGTH")).toBe("env")
    expect(config.explain("LOG_PRETTY")).toBe("default")
  })

  it("sourcesUsed() returns unique source names", () => {
    expect(config.sourcesUsed()).toEqual(["env", "default", "object:overrides"])
  })

  it("extras() returns provided keys the schema does not define", () => {
    expect(config.extras()).toEqual(["STALE_KEY"])
  })

  it("freezes the data", () => {
    expect(Object.isFrozen(config.value)).toBe(true)
  })
})
