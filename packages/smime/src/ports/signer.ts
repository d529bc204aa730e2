import type { EncryptionCertificates } from "./encryption-certificates"
import type { SignerOptions } from "./signer-options"
import type { SigningIdentity } from "./signing-identity"

/**
 * One sealed serialization of a message and the envelope recipients it is
 * meant for.
 */
export type SealedCopy = {
  raw: Uint8Array
  recipients: string[]
}

/**
 * Per-send signing/encryption context. Never reused across sends.
 */
export interface SmimeSigner {
  setSignCertificate(identity: SigningIdentity): void
  setEncryptCertificates(certificates: EncryptionCertificates): void

  /**
   * Seals an RFC 5322 message. With nothing bound the message comes back
   * unchanged as a single copy.
   */
  seal(raw: Uint8Array, recipients: readonly string[]): Promise<SealedCopy[]>
}

export type SmimeSignerFactory = (options: SignerOptions) => SmimeSigner
