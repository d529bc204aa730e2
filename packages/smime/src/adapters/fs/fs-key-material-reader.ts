import { readFile } from "node:fs/promises"
import { SmimeError } from "../../core/errors/smime-error"
import type { KeyMaterial, KeyMaterialReader } from "../../ports/key-material"

export class FsKeyMaterialReader implements KeyMaterialReader {
  async read(material: KeyMaterial): Promise<Uint8Array> {
    if (typeof material !== "string") return material

    try {
      return await readFile(material)
    } catch (err) {
      throw new SmimeError("key_material_unreadable", `Could not read key material from ${material}`, {
        context: { path: material },
        cause: err,
      })
    }
  }
}
