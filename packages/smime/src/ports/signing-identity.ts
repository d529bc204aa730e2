import type { KeyMaterial } from "./key-material"

/**
 * Sender identity as configured. Either half may be missing here; the signer
 * refuses an incomplete identity when it seals.
 */
export type SigningIdentity = Readonly<{
  certificate?: KeyMaterial
  privateKey?: KeyMaterial
  passphrase: string
}>

export type LoadedSigningIdentity = Readonly<{
  certificate: Uint8Array
  privateKey: Uint8Array
  passphrase: string
}>
