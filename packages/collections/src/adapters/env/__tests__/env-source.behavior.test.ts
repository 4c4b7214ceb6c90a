import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("keeps TESSERA_ keys by default and strips the prefix", async () => {
    const source = new EnvSource({
      env: { TESSERA_LOG_PRETTY: "true", PATH: "/usr/bin", LOG_LEVEL: "ignored" },
    })

    expect(await source.load()).toEqual({ LOG_PRETTY: "true" })
  })

  it("uses a custom prefix", async () => {
    const source = new EnvSource({ prefix: "APP_", env: { APP_LOG_LEVEL: "warn", TESSERA_LOG_LEVEL: "x" } })

    expect(await source.load()).toEqual({ LOG_LEVEL: "warn" })
  })

  it("returns every variable with an empty prefix", async () => {
    const source = new EnvSource({ prefix: "", env: { A: "1", B: "2" } })

    expect(await source.load()).toEqual({ A: "1", B: "2" })
  })

  it("reads process.env when no env is given", async () => {
    vi.stubEnv("TESSERA_SQUARED_MIN_CAPACITY", "32")

    expect(await new EnvSource().load()).toMatchObject({ SQUARED_MIN_CAPACITY: "32" })

    vi.unstubAllEnvs()
  })
})
