import { randomBytes } from "node:crypto"
import { normalizeAddress } from "@sealpost/email"
import type { CmsEngine } from "../../ports/cms-engine"
import type { EncryptionCertificates } from "../../ports/encryption-certificates"
import type { KeyMaterial, KeyMaterialReader } from "../../ports/key-material"
import type { SealedCopy, SmimeSigner } from "../../ports/signer"
import type { SignerOptions, SignerSettings } from "../../ports/signer-options"
import type { SigningIdentity } from "../../ports/signing-identity"
import { SmimeError } from "../errors/smime-error"
import { joinMessage, splitMessage } from "../mime/mime-entity"
import { pkcs7MimeEntity, signedMultipart } from "../mime/smime-parts"
import { parseSignerOptions } from "../options/parse-signer-options"

export type SmimeSignerDeps = {
  cms: CmsEngine
  reader: KeyMaterialReader
  boundary?: () => string
}

type RecipientGroup = {
  recipients: string[]
  certificates: Uint8Array[]
}

export class SmimeSignerContext implements SmimeSigner {
  private identity: SigningIdentity | null = null
  private encryption: EncryptionCertificates | null = null

  constructor(
    private readonly deps: SmimeSignerDeps,
    private readonly options: SignerOptions = {},
  ) {}

  setSignCertificate(identity: SigningIdentity): void {
    this.identity = identity
  }

  setEncryptCertificates(certificates: EncryptionCertificates): void {
    this.encryption = certificates
  }

  async seal(raw: Uint8Array, recipients: readonly string[]): Promise<SealedCopy[]> {
    if (!this.identity && !this.encryption) {
      return [{ raw, recipients: [...recipients] }]
    }

    const settings = parseSignerOptions(this.options)
    const { outer, entity } = splitMessage(raw)

    const content = this.identity ? await this.sign(entity, this.identity, settings) : entity

    if (!this.encryption) {
      return [{ raw: joinMessage(outer, content), recipients: [...recipients] }]
    }

    // Every certificate is resolved before anything is encrypted, so a missing
    // recipient fails the whole send.
    const groups = await this.groupRecipients(this.encryption, recipients)
    const copies: SealedCopy[] = []

    for (const group of groups) {
      const der = await this.deps.cms.envelope(content, group.certificates, settings)

      copies.push({
        raw: joinMessage(outer, pkcs7MimeEntity(der, "enveloped-data")),
        recipients: group.recipients,
      })
    }

    return copies
  }

  private async sign(
    entity: Buffer,
    identity: SigningIdentity,
    settings: SignerSettings,
  ): Promise<Buffer> {
    if (!identity.certificate || !identity.privateKey) {
      throw new SmimeError(
        "signing_identity_incomplete",
        "Signing requires both a certificate and a private key",
        {
          context: {
            hasCertificate: Boolean(identity.certificate),
            hasPrivateKey: Boolean(identity.privateKey),
          },
        },
      )
    }

    const [certificate, privateKey] = await Promise.all([
      this.deps.reader.read(identity.certificate),
      this.deps.reader.read(identity.privateKey),
    ])

    const der = await this.deps.cms.sign(
      entity,
      { certificate, privateKey, passphrase: identity.passphrase },
      settings,
    )

    if (!settings.detached) return pkcs7MimeEntity(der, "signed-data")

    return signedMultipart(entity, der, settings.digestAlgorithm, this.nextBoundary())
  }

  private async groupRecipients(
    encryption: EncryptionCertificates,
    recipients: readonly string[],
  ): Promise<RecipientGroup[]> {
    const read = (material: KeyMaterial) => this.deps.reader.read(material)

    switch (encryption.kind) {
      case "single":
        return [{ recipients: [...recipients], certificates: [await read(encryption.certificate)] }]

      case "list":
        return [
          {
            recipients: [...recipients],
            certificates: await Promise.all(encryption.certificates.map(read)),
          },
        ]

      case "by-recipient": {
        const groups: RecipientGroup[] = []

        for (const recipient of recipients) {
          const material = encryption.certificates.get(normalizeAddress(recipient))

          if (material === undefined) {
            throw new SmimeError(
              "recipient_certificate_missing",
              `No encryption certificate configured for ${recipient}`,
              { context: { recipient } },
            )
          }

          groups.push({ recipients: [recipient], certificates: [await read(material)] })
        }

        return groups
      }
    }
  }

  private nextBoundary(): string {
    return this.deps.boundary?.() ?? `----=_smime_${randomBytes(12).toString("hex")}`
  }
}
