import type Mail from "nodemailer/lib/mailer"
import type { EmailRecipient, EmailRecipients } from "../../ports/address"
import type { Attachment, EmailMessage } from "../../ports/message"

export function toMailOptions(message: EmailMessage): Mail.Options {
  return {
    from: formatAddress(message.from),
    to: toAddressList(message.to),
    ...(message.cc && { cc: toAddressList(message.cc) }),
    ...(message.bcc && { bcc: toAddressList(message.bcc) }),
    ...(message.replyTo && { replyTo: formatAddress(message.replyTo) }),
    subject: message.subject,
    ...(message.text && { text: message.text }),
    ...(message.html && { html: message.html }),
    ...(message.headers && { headers: message.headers }),
    ...(message.attachments && {
      attachments: message.attachments.map((a) => toNodemailerAttachment(a)),
    }),
    ...(message.messageId && { messageId: message.messageId }),
    ...(message.date && { date: message.date }),
  }
}

export function formatAddress(recipient: EmailRecipient): string {
  const address = typeof recipient === "string" ? { email: recipient } : recipient
  return address.name ? `${address.name} <${address.email}>` : address.email
}

function toAddressList(recipients: EmailRecipients): string[] {
  const list = Array.isArray(recipients) ? recipients : [recipients]
  return list.map((r) => formatAddress(r))
}

function toNodemailerAttachment(attachment: Attachment): Mail.Attachment {
  return {
    filename: attachment.filename,
    content: Buffer.from(attachment.content),
    ...(attachment.contentType && { contentType: attachment.contentType }),
    ...(attachment.disposition && { contentDisposition: attachment.disposition }),
    ...(attachment.contentId && { cid: attachment.contentId }),
  }
}
