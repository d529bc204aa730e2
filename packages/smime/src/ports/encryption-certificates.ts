import type { KeyMaterial } from "./key-material"

export type EncryptionCertificates =
  | Readonly<{ kind: "single"; certificate: KeyMaterial }>
  | Readonly<{ kind: "list"; certificates: readonly KeyMaterial[] }>
  | Readonly<{ kind: "by-recipient"; certificates: ReadonlyMap<string, KeyMaterial> }>

/**
 * Accepted configuration shapes: one certificate, a list, or a record keyed
 * by recipient address.
 */
export type EncryptingCertsInput =
  | KeyMaterial
  | KeyMaterial[]
  | Readonly<Record<string, KeyMaterial>>
