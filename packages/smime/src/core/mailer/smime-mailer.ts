import {
  composeMessage,
  normalizeAddress,
  type RawEmail,
  type RawEmailTransport,
} from "@sealpost/email"
import { createNullLogger, type Logger } from "@sealpost/logger"
import type {
  EncryptingCertsInput,
  EncryptionCertificates,
} from "../../ports/encryption-certificates"
import type { KeyMaterial } from "../../ports/key-material"
import type { SealableEmail } from "../../ports/sealable-email"
import type { SealedCopy, SmimeSignerFactory } from "../../ports/signer"
import type { SignerOptions } from "../../ports/signer-options"
import type { SigningIdentity } from "../../ports/signing-identity"
import { resolveEncryptionCertificates } from "../certificates/resolve-encryption-certificates"
import { SmimeError } from "../errors/smime-error"

export type SmimeMailerDeps = {
  transport: RawEmailTransport
  createSigner: SmimeSignerFactory
  logger?: Logger
}

export type SmimeMailerOptions = {
  encryptingCerts?: EncryptingCertsInput | null
  signingCert?: KeyMaterial | null
  signingKey?: KeyMaterial | null
  signingKeyPassphrase?: string | null
  /** Per-mailer signer options; empty or absent falls back to `defaultOptions`. */
  options?: SignerOptions | null
  defaultOptions?: SignerOptions
}

export type DeliveryOutcome = {
  ok: boolean
  accepted: number
  failedRecipients: string[]
}

type CopyOutcome = {
  accepted: number
  failed: string[]
}

/**
 * Signs and/or encrypts outgoing mail, then hands each sealed copy to a raw
 * transport. Configuration is stored as given; certificates and keys are not
 * read until a send.
 */
export class SmimeMailer {
  private readonly logger: Logger
  private readonly defaultOptions: SignerOptions

  private encryptingCerts: EncryptionCertificates | null = null
  private signingCert: KeyMaterial | null = null
  private signingKey: KeyMaterial | null = null
  private passphrase = ""
  private options: SignerOptions = {}

  constructor(
    private readonly deps: SmimeMailerDeps,
    options: SmimeMailerOptions = {},
  ) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "smime-mailer" })
    this.defaultOptions = options.defaultOptions ?? {}

    this.setEncryptingCerts(options.encryptingCerts)
    this.setSigningCert(options.signingCert)
    this.setSigningKey(options.signingKey, options.signingKeyPassphrase)
    this.setSignerOptions(options.options)
  }

  get signingIdentity(): SigningIdentity | null {
    if (this.signingCert === null && this.signingKey === null) return null

    return {
      ...(this.signingCert !== null && { certificate: this.signingCert }),
      ...(this.signingKey !== null && { privateKey: this.signingKey }),
      passphrase: this.passphrase,
    }
  }

  get encryptionCertificates(): EncryptionCertificates | null {
    return this.encryptingCerts
  }

  get signerOptions(): SignerOptions {
    return this.options
  }

  setEncryptingCerts(certs?: EncryptingCertsInput | null): void {
    this.encryptingCerts = resolveEncryptionCertificates(certs)
  }

  setSigningCert(cert?: KeyMaterial | null): void {
    this.signingCert = cert ?? null
  }

  setSigningKey(key?: KeyMaterial | null, passphrase?: string | null): void {
    this.signingKey = key ?? null
    this.passphrase = passphrase ?? ""
  }

  setSignerOptions(options?: SignerOptions | null): void {
    this.options = options && Object.keys(options).length > 0 ? options : this.defaultOptions
  }

  /**
   * Single attempt, no retries. True when at least one recipient was accepted.
   */
  async send(email: SealableEmail): Promise<boolean> {
    const outcome = await this.deliver(email)

    return outcome.ok
  }

  async deliver(email: SealableEmail): Promise<DeliveryOutcome> {
    const startedAt = Date.now()
    const signer = this.deps.createSigner(this.options)
    const identity = this.signingIdentity

    if (identity) signer.setSignCertificate(identity)
    if (this.encryptingCerts) signer.setEncryptCertificates(this.encryptingCerts)

    const composed = await this.compose(email)
    const copies = await signer.seal(composed.raw, composed.envelope.to)

    this.logger.debug("message sealed", {
      messageId: composed.messageId,
      signed: identity !== null,
      encrypted: this.encryptingCerts !== null,
      copies: copies.length,
    })

    let accepted = 0
    const failed = new Set<string>()

    for (const copy of copies) {
      if (copy.recipients.length === 0) continue

      const outcome = await this.deliverCopy(copy, composed)
      accepted += outcome.accepted
      for (const address of outcome.failed) failed.add(address)
    }

    const failedRecipients = [...failed]
    email.setFailedRecipients(failedRecipients)

    const ok = accepted > 0

    this.logger.info(ok ? "message delivered" : "message not delivered", {
      messageId: composed.messageId,
      recipients: composed.envelope.to,
      accepted,
      failedRecipients,
      durationMs: Date.now() - startedAt,
    })

    return { ok, accepted, failedRecipients }
  }

  private async compose(email: SealableEmail): Promise<RawEmail> {
    try {
      return await composeMessage(email.message)
    } catch (err) {
      const reason = err instanceof Error ? err.message : "Message could not be composed"

      throw new SmimeError("invalid_message", reason, { cause: err })
    }
  }

  private async deliverCopy(copy: SealedCopy, composed: RawEmail): Promise<CopyOutcome> {
    try {
      const result = await this.deps.transport.sendRaw({
        raw: copy.raw,
        messageId: composed.messageId,
        envelope: { from: composed.envelope.from, to: copy.recipients },
      })

      const rejected = (result.rejected ?? []).map(normalizeAddress)
      const refused = new Set(rejected)

      return {
        accepted: result.accepted
          ? result.accepted.length
          : copy.recipients.filter((r) => !refused.has(normalizeAddress(r))).length,
        failed: rejected,
      }
    } catch (err) {
      this.logger.warn("sealed copy not sent", {
        messageId: composed.messageId,
        failedRecipients: copy.recipients,
        err,
      })

      return { accepted: 0, failed: [...copy.recipients] }
    }
  }
}
