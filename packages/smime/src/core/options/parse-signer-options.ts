import { z } from "zod"
import type { SignerOptions, SignerSettings } from "../../ports/signer-options"
import { SmimeError } from "../errors/smime-error"

export const digestAlgorithms = ["sha1", "sha256", "sha384", "sha512"] as const
export const contentCiphers = ["aes128", "aes192", "aes256", "des-ede3"] as const

export const signerOptionsSchema = z.looseObject({
  detached: z.boolean().optional(),
  digestAlgorithm: z.enum(digestAlgorithms).optional(),
  cipher: z.enum(contentCiphers).optional(),
  includeCertificate: z.boolean().optional(),
})

export function parseSignerOptions(options: SignerOptions): SignerSettings {
  const result = signerOptionsSchema.safeParse(options)

  if (!result.success) {
    throw new SmimeError(
      "invalid_signer_options",
      `Invalid signer options:\n${z.prettifyError(result.error)}`,
      { context: { keys: Object.keys(options) } },
    )
  }

  const { detached, digestAlgorithm, cipher, includeCertificate } = result.data

  return {
    detached: detached ?? true,
    digestAlgorithm: digestAlgorithm ?? "sha256",
    cipher: cipher ?? "aes256",
    includeCertificate: includeCertificate ?? true,
  }
}
