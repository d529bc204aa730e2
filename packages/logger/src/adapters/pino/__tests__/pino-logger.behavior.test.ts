import { Writable } from "node:stream"
import { describe, expect, it } from "vitest"
import { describeLoggerContract } from "../../../ports/__tests__/logger.contract"
import { PinoLogger } from "../pino-logger"
import { pinoHarness } from "./pino-harness"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describeLoggerContract(pinoHarness())

describe("PinoLogger behavior", () => {
  it("emits JSON with context and meta to the destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { service: "mailer" })

    logger.info("sent", { messageId: "<m-1@example.com>", accepted: 2 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0])

    expect(payload).toMatchObject({
      msg: "sent",
      service: "mailer",
      messageId: "<m-1@example.com>",
      accepted: 2,
      level: 30,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "trace" })

    const err = new Error("seal failed", { cause: new Error("bad passphrase") })
    logger.error("send aborted", { err })

    const payload = JSON.parse(lines[0])

    expect(payload.err.type).toBe("Error")
    expect(payload.err.message).toBe("seal failed")
    expect(payload.err.cause.message).toBe("bad passphrase")
  })

  it("child() shares the parent's destination and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "mailer" })
    const child = base.child({ module: "smime-mailer" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0])).toMatchObject({
      msg: "logged",
      service: "mailer",
      module: "smime-mailer",
    })
  })
})
