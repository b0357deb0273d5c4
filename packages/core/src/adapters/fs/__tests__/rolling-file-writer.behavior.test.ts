import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { WriteError } from "../../../errors/errors"
import { captureDiagnostics } from "../../../tests/capture-diagnostics"
import { backupIndex, RollingFileWriter, type RollingFileWriterOptions } from "../rolling-file-writer"

const bytes = (s: string) => Buffer.from(s, "utf8")

describe("RollingFileWriter", () => {
  let dir: string
  let basePath: string
  let writer: RollingFileWriter | undefined

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rotolog-writer-"))
    basePath = path.join(dir, "app")
  })

  afterEach(async () => {
    await writer?.close()
    writer = undefined
    await fs.rm(dir, { recursive: true, force: true })
  })

  async function open(opts: Partial<RollingFileWriterOptions> = {}) {
    const diagnostics = captureDiagnostics()
    writer = await RollingFileWriter.open(
      { basePath, maxSizeBytes: 100, maxFiles: 3, ...opts },
      { logger: diagnostics.logger },
    )
    return { writer, entries: diagnostics.entries }
  }

  const read = (name: string) => fs.readFile(path.join(dir, name), "utf8")

  async function backups(): Promise<number[]> {
    const names = await fs.readdir(dir)

    return names
      .map((name) => backupIndex("app", name))
      .filter((i): i is number => i !== null)
      .sort((a, b) => a - b)
  }

  describe("open", () => {
    it("creates an empty active file", async () => {
      const { writer } = await open()

      expect(writer.activePath).toBe(`${basePath}.log`)
      expect(writer.size).toBe(0)
      expect(writer.rotationState).toBe("idle")
      expect(await read("app.log")).toBe("")
    })

    it("continues counting from an existing file", async () => {
      await fs.writeFile(`${basePath}.log`, "x".repeat(80))

      const { writer } = await open()

      expect(writer.size).toBe(80)
    })

    it("fails with FileOpenError when the directory is missing", async () => {
      const diagnostics = captureDiagnostics()

      await expect(
        RollingFileWriter.open(
          { basePath: path.join(dir, "missing", "app"), maxSizeBytes: 100, maxFiles: 3 },
          { logger: diagnostics.logger },
        ),
      ).rejects.toMatchObject({ code: "file_open_failed" })
    })
  })

  describe("write", () => {
    it("does not rotate while the total stays within the limit", async () => {
      const { writer } = await open()

      expect(await writer.write(bytes("a".repeat(60)))).toBe(60)
      expect(await writer.write(bytes("b".repeat(40)))).toBe(40)

      expect(writer.size).toBe(100)
      expect(await read("app.log")).toBe(`${"a".repeat(60)}${"b".repeat(40)}`)
      expect(await backups()).toEqual([])
    })

    it("rotates once, before the write that would overflow", async () => {
      const { writer } = await open()

      await writer.write(bytes("a".repeat(60)))
      await writer.write(bytes("b".repeat(50)))

      expect(await read("app.1.log")).toBe("a".repeat(60))
      expect(await read("app.log")).toBe("b".repeat(50))
      expect(await backups()).toEqual([1])
      expect(writer.size).toBe(50)
    })

    it("rotates an empty file when a single write exceeds the limit", async () => {
      const { writer } = await open({ maxSizeBytes: 100, maxFiles: 3 })

      await writer.write(bytes("z".repeat(120)))

      expect(await read("app.log")).toBe("z".repeat(120))
      expect(await read("app.1.log")).toBe("")
      expect(writer.size).toBe(120)
    })

    it("rotates a restarted file whose remaining budget is too small", async () => {
      await fs.writeFile(`${basePath}.log`, "o".repeat(80))
      const { writer } = await open()

      await writer.write(bytes("n".repeat(30)))

      expect(await read("app.1.log")).toBe("o".repeat(80))
      expect(await read("app.log")).toBe("n".repeat(30))
    })

    it("writes through when instantFlush is on", async () => {
      const { writer } = await open({ instantFlush: true })

      await writer.writeAll(bytes("synced\n"))

      expect(await read("app.log")).toBe("synced\n")
    })
  })

  describe("rotation window", () => {
    it("keeps min(k, maxFiles - 1) backups, newest first", async () => {
      const { writer } = await open({ maxFiles: 3, maxSizeBytes: 1_000 })

      const expected = [[1], [1, 2], [1, 2], [1, 2], [1, 2]]

      for (let k = 1; k <= 5; k++) {
        await writer.writeAll(bytes(`line ${k}\n`))
        expect(await writer.rotate()).toBe(true)
        expect(await backups()).toEqual(expected[k - 1])
      }

      expect(await read("app.1.log")).toBe("line 5\n")
      expect(await read("app.2.log")).toBe("line 4\n")
      expect(await read("app.log")).toBe("")
    })

    it("keeps no backups when maxFiles is 1", async () => {
      const { writer } = await open({ maxFiles: 1 })

      await writer.writeAll(bytes("first\n"))
      await writer.rotate()
      await writer.writeAll(bytes("second\n"))

      expect(await backups()).toEqual([])
      expect(await read("app.log")).toBe("second\n")
    })

    it("deletes numbered files beyond the window and nothing else", async () => {
      await fs.writeFile(`${basePath}.3.log`, "stale")
      await fs.writeFile(`${basePath}.7.log`, "stale")
      await fs.writeFile(`${basePath}.old.log`, "keep")
      await fs.writeFile(path.join(dir, "other.9.log"), "keep")

      const { writer } = await open({ maxFiles: 3 })
      await writer.rotate()

      const names = (await fs.readdir(dir)).sort()

      expect(names).toEqual(["app.1.log", "app.log", "app.old.log", "other.9.log"])
    })

    it("treats a rotation requested during a rotation as a no-op", async () => {
      const { writer } = await open()

      const results = await Promise.all([writer.rotate(), writer.rotate()])

      expect(results).toEqual([true, false])
      expect(await backups()).toEqual([1])
      expect(writer.rotationState).toBe("idle")
    })
  })

  describe("rotation failure", () => {
    it("reports RotationError, keeps writing and re-reads the size", async () => {
      const { writer, entries } = await open({ maxFiles: 1, maxSizeBytes: 10 })

      await writer.write(bytes("0123456789"))

      // a non-empty directory cannot be replaced by the active file
      await fs.mkdir(`${basePath}.1.log`)
      await fs.writeFile(path.join(`${basePath}.1.log`, "blocker"), "")

      await writer.write(bytes("abc"))

      expect(await read("app.log")).toBe("0123456789abc")
      expect(writer.size).toBe(13)
      expect(writer.rotationState).toBe("idle")

      const failures = entries.filter((e) => e.message === "rotation failed")

      expect(failures).toHaveLength(1)
      expect(failures[0]?.level).toBe("error")
      expect(failures[0]?.payload).toMatchObject({
        operation: "rotate",
        file: `${basePath}.log`,
        err: { code: "rotation_failed", context: { step: "rotate" } },
      })
    })
  })

  describe("concurrency", () => {
    it("never tears lines written concurrently", async () => {
      const { writer } = await open({ maxSizeBytes: 1_000, maxFiles: 20 })

      const lines = Array.from({ length: 200 }, (_, i) => `line-${String(i).padStart(3, "0")}\n`)
      await Promise.all(lines.map((line) => writer.writeAll(bytes(line))))

      const files = await fs.readdir(dir)
      const contents = await Promise.all(files.map((name) => read(name)))
      const written = contents.join("").split("\n").filter(Boolean)

      expect(written).toHaveLength(200)
      expect(new Set(written)).toEqual(new Set(lines.map((l) => l.trimEnd())))
    })

    it("writes lines in lock order", async () => {
      const { writer } = await open({ maxSizeBytes: 10_000 })

      await Promise.all(["1\n", "2\n", "3\n"].map((line) => writer.writeAll(bytes(line))))

      expect(await read("app.log")).toBe("1\n2\n3\n")
    })
  })

  describe("close", () => {
    it("rejects writes after close and is idempotent", async () => {
      const { writer } = await open()

      await writer.close()
      await writer.close()

      expect(writer.isClosed).toBe(true)
      await expect(writer.write(bytes("late"))).rejects.toBeInstanceOf(WriteError)
      expect(await writer.rotate()).toBe(false)
    })

    it("keeps what was written before closing", async () => {
      const { writer } = await open()

      await writer.writeAll(bytes("kept\n"))
      await writer.flush()
      await writer.close()

      expect(await read("app.log")).toBe("kept\n")
    })
  })
})

describe("backupIndex", () => {
  it.each([
    ["app.1.log", 1],
    ["app.12.log", 12],
    ["app.log", null],
    ["app.x.log", null],
    ["app.1.log.gz", null],
    ["other.1.log", null],
    ["app.1.2.log", null],
  ])("%s → %s", (name, expected) => {
    expect(backupIndex("app", name)).toBe(expected)
  })
})
