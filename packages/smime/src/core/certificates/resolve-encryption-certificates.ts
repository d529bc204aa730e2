import { normalizeAddress } from "@sealpost/email"
import type {
  EncryptingCertsInput,
  EncryptionCertificates,
} from "../../ports/encryption-certificates"

/**
 * Resolves configuration input to a certificate set, or `null` when nothing
 * usable was given (absent, empty string, empty list or empty record).
 *
 * Record keys are normalized the same way envelope recipients are.
 */
export function resolveEncryptionCertificates(
  input: EncryptingCertsInput | null | undefined,
): EncryptionCertificates | null {
  if (input === null || input === undefined) return null

  if (typeof input === "string" || input instanceof Uint8Array) {
    return input.length === 0 ? null : { kind: "single", certificate: input }
  }

  if (Array.isArray(input)) {
    return input.length === 0 ? null : { kind: "list", certificates: [...input] }
  }

  const entries = Object.entries(input)
  if (entries.length === 0) return null

  return {
    kind: "by-recipient",
    certificates: new Map(entries.map(([address, cert]) => [normalizeAddress(address), cert])),
  }
}
