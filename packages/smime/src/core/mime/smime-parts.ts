import type { DigestAlgorithm } from "../../ports/signer-options"
import { CRLF } from "./mime-entity"

const LINE_LENGTH = 76

const micalgs: Record<DigestAlgorithm, string> = {
  sha1: "sha-1",
  sha256: "sha-256",
  sha384: "sha-384",
  sha512: "sha-512",
}

export function micalgOf(algorithm: DigestAlgorithm): string {
  return micalgs[algorithm]
}

export function wrapBase64(der: Uint8Array): string {
  const encoded = Buffer.from(der).toString("base64")
  const lines: string[] = []

  for (let i = 0; i < encoded.length; i += LINE_LENGTH) {
    lines.push(encoded.slice(i, i + LINE_LENGTH))
  }

  return lines.join(CRLF)
}

/**
 * RFC 8551 clear-signed entity. The first part is `entity` byte for byte,
 * which is what the detached signature covers.
 */
export function signedMultipart(
  entity: Uint8Array,
  signature: Uint8Array,
  algorithm: DigestAlgorithm,
  boundary: string,
): Buffer {
  const head = [
    'Content-Type: multipart/signed; protocol="application/pkcs7-signature";',
    ` micalg=${micalgOf(algorithm)}; boundary="${boundary}"`,
    "",
    "This is an S/MIME signed message",
    "",
    `--${boundary}`,
    "",
  ].join(CRLF)

  const tail = [
    "",
    `--${boundary}`,
    'Content-Type: application/pkcs7-signature; name="smime.p7s"',
    "Content-Transfer-Encoding: base64",
    'Content-Disposition: attachment; filename="smime.p7s"',
    "",
    wrapBase64(signature),
    `--${boundary}--`,
    "",
  ].join(CRLF)

  return Buffer.concat([Buffer.from(head, "latin1"), entity, Buffer.from(tail, "latin1")])
}

export function pkcs7MimeEntity(der: Uint8Array, smimeType: "signed-data" | "enveloped-data"): Buffer {
  const text = [
    `Content-Type: application/pkcs7-mime; smime-type=${smimeType};`,
    ' name="smime.p7m"',
    "Content-Transfer-Encoding: base64",
    'Content-Disposition: attachment; filename="smime.p7m"',
    "",
    wrapBase64(der),
    "",
  ].join(CRLF)

  return Buffer.from(text, "latin1")
}
