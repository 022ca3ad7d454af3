import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

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

function parse(line: string | undefined): Record<string, unknown> {
  if (line === undefined) throw new Error("no line logged")

  return JSON.parse(line)
}

describe("PinoLogger behavior", () => {
  it("emits JSON lines with bindings and meta", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { service: "kvrest-server" },
    )

    logger.info("Command dispatched", { command: "GET", requestId: "r-1" })

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      msg: "Command dispatched",
      service: "kvrest-server",
      command: "GET",
      requestId: "r-1",
      level: 30,
    })
  })

  it("honors the minimum level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "warn" })

    logger.debug("dropped")
    logger.info("dropped")
    logger.warn("kept")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({ msg: "kept", level: 40 })
  })

  it("child() inherits sink and level and adds context", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "info" }, { service: "svc" })
    const child = base.child({ requestId: "r-2" })

    child.debug("dropped")
    child.info("kept")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({ msg: "kept", service: "svc", requestId: "r-2" })
  })

  it("serializes errors with their cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "info" })
    const err = new Error("close failed", { cause: new Error("socket closed") })

    logger.error("Connection close failed", { err })

    const payload = parse(lines[0])
    expect(payload.err).toMatchObject({ type: "Error" })
    expect(String((payload.err as { message?: unknown }).message)).toContain("close failed")
  })
})
