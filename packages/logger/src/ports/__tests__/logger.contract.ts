import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ cookie: "btn" }).child({ field: "count" }).info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ cookie: "btn", field: "count" })
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ cookie: "a" }).child({ cookie: "b" }).info("hello")

      expect(read()[0]?.payload.cookie).toBe("b")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ cookie: "btn" })
      const child = parent.child({ field: "count" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("field")
      expect(logs[1]?.payload).toMatchObject({ cookie: "btn", field: "count" })

      clear()
    })

    it("per-call meta is included", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ cookie: "btn" }).debug("encoded", { length: 12 })

      expect(read()[0]?.payload).toMatchObject({ cookie: "btn", length: 12 })
    })

    it("suppresses entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })
  })
}
