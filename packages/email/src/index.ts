export type { EmailAddress, EmailRecipient, EmailRecipients } from "./ports/address"
export type { Attachment, EmailContent, EmailMessage } from "./ports/message"
export type { MailEnvelope, RawEmail, RawEmailTransport, SendResult } from "./ports/transport"

export { composeMessage } from "./core/compose/compose-message"
export { formatAddress, toMailOptions } from "./core/compose/to-mail-options"
export { addressOf, listRecipients, normalizeAddress } from "./core/recipients/recipients"
export { validateMessage } from "./core/validation/validate-message"

export { SmtpTransport, type SmtpTransportDeps } from "./adapters/smtp/smtp-transport"
