import { RecordEnvStore } from "../record-env-store"

describe("RecordEnvStore", () => {
  it("returns set variables, the empty string included", () => {
    const env = new RecordEnvStore({ HOST: "abc", EMPTY: "" })

    expect(env.get("HOST")).toBe("abc")
    expect(env.get("EMPTY")).toBe("")
  })

  it("returns undefined for unset variables", () => {
    expect(new RecordEnvStore({ HOST: undefined }).get("HOST")).toBeUndefined()
    expect(new RecordEnvStore({}).get("PORT")).toBeUndefined()
  })

  it("ignores inherited properties", () => {
    expect(new RecordEnvStore({}).get("toString")).toBeUndefined()
  })

  it("sees later changes to the record", () => {
    const record: Record<string, string | undefined> = {}
    const env = new RecordEnvStore(record)

    record.PORT = "8000"

    expect(env.get("PORT")).toBe("8000")
  })

  it("reads process.env by default", () => {
    vi.stubEnv("BINDERY_TEST_PORT", "9000")

    expect(new RecordEnvStore().get("BINDERY_TEST_PORT")).toBe("9000")
  })
})
