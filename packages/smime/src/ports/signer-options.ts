export type DigestAlgorithm = "sha1" | "sha256" | "sha384" | "sha512"

export type ContentCipher = "aes128" | "aes192" | "aes256" | "des-ede3"

/**
 * Options handed verbatim to the signer. Keys it does not recognize are
 * carried along and ignored.
 */
export type SignerOptions = Readonly<{
  /** multipart/signed when true, opaque signed-data when false. @default true */
  detached?: boolean
  /** @default "sha256" */
  digestAlgorithm?: DigestAlgorithm
  /** @default "aes256" */
  cipher?: ContentCipher
  /** Embed the signing certificate in the SignedData. @default true */
  includeCertificate?: boolean
  [option: string]: unknown
}>

export type SignerSettings = Readonly<{
  detached: boolean
  digestAlgorithm: DigestAlgorithm
  cipher: ContentCipher
  includeCertificate: boolean
}>
