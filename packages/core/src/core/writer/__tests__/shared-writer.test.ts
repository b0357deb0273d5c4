import { mock } from "vitest-mock-extended"
import { HandleReleasedError } from "../../../errors/errors"
import type { FileWriter } from "../../../ports/file-writer"
import { SharedWriter } from "../shared-writer"

describe("SharedWriter", () => {
  function makeWriter() {
    const writer = mock<FileWriter>({ activePath: "/logs/app.log" })
    writer.close.mockResolvedValue(undefined)
    return writer
  }

  it("counts every clone as an owner", () => {
    const handle = SharedWriter.wrap(makeWriter())
    const a = handle.clone()
    const b = a.clone()

    expect(handle.refCount).toBe(3)
    expect(b.refCount).toBe(3)
  })

  it("closes the writer on the last release only", async () => {
    const writer = makeWriter()
    const handle = SharedWriter.wrap(writer)
    const clone = handle.clone()

    await handle.release()

    expect(clone.refCount).toBe(1)
    expect(writer.close).not.toHaveBeenCalled()

    await clone.release()

    expect(clone.refCount).toBe(0)
    expect(writer.close).toHaveBeenCalledTimes(1)
  })

  it("release is idempotent per handle", async () => {
    const writer = makeWriter()
    const handle = SharedWriter.wrap(writer)
    const clone = handle.clone()

    await clone.release()
    await clone.release()

    expect(handle.refCount).toBe(1)
    expect(clone.isReleased).toBe(true)
    expect(writer.close).not.toHaveBeenCalled()
  })

  it("forwards writes, flushes and rotations", async () => {
    const writer = makeWriter()
    writer.write.mockResolvedValue(5)
    writer.writeAll.mockResolvedValue(undefined)
    writer.flush.mockResolvedValue(undefined)
    writer.rotate.mockResolvedValue(true)

    const handle = SharedWriter.wrap(writer).clone()
    const line = Buffer.from("hello")

    expect(await handle.write(line)).toBe(5)
    await handle.writeAll(line)
    await handle.flush()
    expect(await handle.rotate()).toBe(true)

    expect(writer.write).toHaveBeenCalledWith(line)
    expect(writer.writeAll).toHaveBeenCalledWith(line)
    expect(writer.flush).toHaveBeenCalledTimes(1)
    expect(handle.activePath).toBe("/logs/app.log")
  })

  it("refuses to be used after release", async () => {
    const writer = makeWriter()
    const handle = SharedWriter.wrap(writer)
    const keep = handle.clone()

    await handle.release()

    await expect(handle.write(Buffer.from("x"))).rejects.toBeInstanceOf(HandleReleasedError)
    await expect(handle.writeAll(Buffer.from("x"))).rejects.toMatchObject({
      code: "handle_released",
    })
    expect(() => handle.clone()).toThrow(HandleReleasedError)
    expect(writer.write).not.toHaveBeenCalled()
    expect(keep.refCount).toBe(1)
  })
})
