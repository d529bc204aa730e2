import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { SmimeError } from "../../../core/errors/smime-error"
import { FsKeyMaterialReader } from "../fs-key-material-reader"

describe("FsKeyMaterialReader", () => {
  let dir: string
  const reader = new FsKeyMaterialReader()

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "smime-keys-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true })
  })

  it("reads a path", async () => {
    const file = path.join(dir, "cert.pem")
    await fs.writeFile(file, "-----BEGIN CERTIFICATE-----\n")

    const bytes = await reader.read(file)

    expect(Buffer.from(bytes).toString("utf8")).toBe("-----BEGIN CERTIFICATE-----\n")
  })

  it("reads the file again on every call", async () => {
    const file = path.join(dir, "cert.pem")
    await fs.writeFile(file, "first")
    await reader.read(file)
    await fs.writeFile(file, "second")

    expect(Buffer.from(await reader.read(file)).toString("utf8")).toBe("second")
  })

  it("returns in-memory material as is", async () => {
    const bytes = new Uint8Array([1, 2, 3])

    expect(await reader.read(bytes)).toBe(bytes)
  })

  it("wraps read failures with the path in context", async () => {
    const file = path.join(dir, "missing.pem")

    const error = await reader.read(file).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(SmimeError)
    expect(error).toMatchObject({ code: "key_material_unreadable", context: { path: file } })
    expect(error).toHaveProperty("cause.code", "ENOENT")
  })
})
