import { CoercionError } from "../errors"
import { coerceBoolean, coerceInteger } from "../coerce"

describe("coerceInteger", () => {
  it.each([
    ["8080", 8080],
    ["-42", -42],
    ["+7", 7],
    ["007", 7],
    ["0", 0],
  ])("parses %j as %d", (raw, expected) => {
    expect(coerceInteger(raw, "env", "PORT")).toBe(expected)
  })

  it("normalizes negative zero", () => {
    expect(Object.is(coerceInteger("-0", "env", "PORT"), 0)).toBe(true)
  })

  it.each(["text", "", " 8080", "8080\n", "1.5", "1e3", "0x1f", "9007199254740993"])(
    "rejects %j",
    (raw) => {
      expect(() => coerceInteger(raw, "env", "PORT")).toThrow(CoercionError)
    },
  )

  it("names the source kind and key in the error", () => {
    expect(() => coerceInteger("text", "env", "PORT")).toThrow(
      "environment variable PORT must be an integer - instead it is: text",
    )
    expect(() => coerceInteger("text", "flag", "port")).toThrow(
      "command line flag port must be an integer - instead it is: text",
    )
    expect(() => coerceInteger("text", "file", "port")).toThrow(
      "file port must be an integer - instead it is: text",
    )
  })
})

describe("coerceBoolean", () => {
  it.each(["0", "f", "F", "false", "FALSE", "False", "n", "N", "no", "NO", "No"])(
    "maps %j to false",
    (raw) => {
      expect(coerceBoolean(raw)).toBe(false)
    },
  )

  it.each(["1", "t", "true", "TRUE", "y", "yes", "on", "off", "anything", ""])(
    "maps %j to true",
    (raw) => {
      expect(coerceBoolean(raw)).toBe(true)
    },
  )
})
