import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "binder" })
      const child = parent.child({ field: "port" })

      child.info("field resolved")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ module: "binder", field: "port" })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ field: "port" }).child({ field: "host" })

      child.info("field resolved")

      expect(read()[0]?.payload.field).toBe("host")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ module: "binder" })
      const child = parent.child({ field: "port" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("field")
      expect(logs[1]?.payload).toMatchObject({ module: "binder", field: "port" })

      clear()
      expect(read()).toEqual([])
    })

    it("per-call meta merges with context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "binder" }).info("field resolved", { source: "env", key: "PORT" })

      expect(read()[0]?.payload).toMatchObject({ module: "binder", source: "env", key: "PORT" })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")
      logger.fatal("fatal")

      expect(read().map((l) => l.level)).toEqual(["warn", "error", "fatal"])
    })
  })
}
