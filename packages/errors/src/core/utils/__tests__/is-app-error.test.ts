import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

function appErrorShape(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: "ShapeError",
    message: "port must be an integer",
    code: "coercion_failed",
    context: { key: "PORT" },
    isRetryable: false,
    isOperational: true,
    timestamp: new Date(),
    ...overrides,
  }
}

describe("isAppError", () => {
  describe("returns true", () => {
    it("for BaseError instance", () => {
      expect(isAppError(new BaseError("test", { code: "test" }))).toBe(true)
    })

    it("for subclass of BaseError", () => {
      class SettingError extends BaseError<"setting_invalid"> {
        constructor(message: string) {
          super(message, { code: "setting_invalid" })
        }
      }

      expect(isAppError(new SettingError("bad setting"))).toBe(true)
    })

    it("for a structurally matching object", () => {
      expect(isAppError(appErrorShape())).toBe(true)
    })
  })

  describe("returns false", () => {
    it.each([null, undefined, "error", 500])("for %s", (value) => {
      expect(isAppError(value)).toBe(false)
    })

    it("for standard Error", () => {
      expect(isAppError(new Error("standard"))).toBe(false)
    })

    it.each(["code", "context", "isRetryable", "isOperational", "timestamp", "message", "name"])(
      "for object missing %s",
      (field) => {
        const shape = appErrorShape()
        delete shape[field]

        expect(isAppError(shape)).toBe(false)
      },
    )

    it("for object with invalid timestamp", () => {
      expect(isAppError(appErrorShape({ timestamp: new Date("invalid") }))).toBe(false)
    })
  })
})
