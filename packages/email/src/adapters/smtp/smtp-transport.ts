import type { Transporter } from "nodemailer"
import type SMTPTransport from "nodemailer/lib/smtp-transport"
import type { RawEmail, RawEmailTransport, SendResult } from "../../ports/transport"

export type SmtpTransportDeps = {
  client: Transporter
}

export class SmtpTransport implements RawEmailTransport {
  constructor(private readonly deps: SmtpTransportDeps) {}

  /**
   * Sends pre-serialized bytes untouched. nodemailer invents a fresh
   * Message-ID for raw input, so the one baked into `raw` is reported instead.
   */
  async sendRaw(email: RawEmail): Promise<SendResult> {
    if (email.envelope.to.length === 0) {
      throw new Error("Raw email requires at least one envelope recipient")
    }

    const response: SMTPTransport.SentMessageInfo = await this.deps.client.sendMail({
      raw: Buffer.from(email.raw),
      envelope: { from: email.envelope.from, to: [...email.envelope.to] },
    })

    return this.toSendResult(email.messageId, response)
  }

  private toSendResult(messageId: string, response: SMTPTransport.SentMessageInfo): SendResult {
    const accepted = this.toStringArray(response.accepted)
    const rejected = this.toStringArray(response.rejected)

    return {
      provider: "smtp",
      messageId,
      ...(accepted && { accepted }),
      ...(rejected && { rejected }),
    }
  }

  private toStringArray(addresses: unknown): string[] | undefined {
    if (!Array.isArray(addresses)) return undefined

    return addresses
      .map((a: unknown) => {
        if (typeof a === "string") return a
        if (typeof a === "object" && a && "address" in a && typeof a.address === "string") {
          return a.address
        }

        return null
      })
      .filter((a): a is string => a !== null)
  }
}
