/**
 * Certificate or key input: a filesystem path, or the PEM/DER bytes themselves.
 */
export type KeyMaterial = string | Uint8Array

export interface KeyMaterialReader {
  /**
   * Resolves material to bytes. Paths are read on every call and no handle
   * outlives the returned promise.
   */
  read(material: KeyMaterial): Promise<Uint8Array>
}
