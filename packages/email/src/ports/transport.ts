export type SendResult = {
  provider: string
  messageId: string

  accepted?: string[]
  rejected?: string[]
}

/**
 * SMTP envelope. Recipients listed here receive the message regardless of
 * what the To/Cc headers inside `raw` say.
 */
export type MailEnvelope = {
  from: string
  to: string[]
}

/**
 * A fully serialized RFC 5322 message, ready for the wire.
 */
export type RawEmail = {
  raw: Uint8Array
  messageId: string
  envelope: MailEnvelope
}

export interface RawEmailTransport {
  sendRaw(email: RawEmail): Promise<SendResult>
}
