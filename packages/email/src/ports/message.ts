import type { EmailRecipient, EmailRecipients } from "./address"

export type Attachment = {
  filename: string
  content: Uint8Array
  contentType?: string
  disposition?: "attachment" | "inline"
  contentId?: string
}

export type EmailContent =
  | { text: string; html?: string }
  | { text?: string; html: string }

export type EmailMessage = EmailContent & {
  to: EmailRecipients
  from: EmailRecipient

  cc?: EmailRecipients
  bcc?: EmailRecipients

  replyTo?: EmailRecipient

  subject: string

  headers?: Record<string, string>
  attachments?: Attachment[]

  /** Generated by the composer when absent. */
  messageId?: string
  date?: Date
}
