import { Writable } from "node:stream"
import { BaseError } from "@rotolog/errors"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { instance: "app1" })

    logger.info("registered", { file: "/logs/app1.log" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload).toMatchObject({
      msg: "registered",
      level: 30,
      instance: "app1",
      file: "/logs/app1.log",
    })
    expect(typeof payload.time).toBe("number")
  })

  it("defaults to info level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination })

    logger.debug("ignored")
    logger.info("included")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "").msg).toBe("included")
  })

  it("child() inherits the parent sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const parent = new PinoLogger({ destination }, { level: "warn" }, { instance: "app1" })
    const child = parent.child({ operation: "rotate" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      msg: "logged",
      instance: "app1",
      operation: "rotate",
    })
  })

  it("serializes err with its code and cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })

    const cause = new Error("EACCES")
    const err = new BaseError("rotation failed", { code: "rotation_failed", cause })

    logger.error("rotation failed", { err })

    const payload = JSON.parse(lines[0] ?? "")

    expect(payload.err).toMatchObject({
      type: "BaseError",
      message: "rotation failed",
      code: "rotation_failed",
      cause: { type: "Error", message: "EACCES" },
    })
    expect(typeof payload.err.stack).toBe("string")
  })
})
