import type { EmailRecipient, EmailRecipients } from "../../ports/address"
import type { EmailMessage } from "../../ports/message"

export function normalizeAddress(address: string): string {
  return address.trim().toLowerCase()
}

export function addressOf(recipient: EmailRecipient): string {
  return normalizeAddress(typeof recipient === "string" ? recipient : recipient.email)
}

/**
 * Every envelope recipient of a message (to, cc, bcc), normalized and
 * de-duplicated in first-seen order.
 */
export function listRecipients(message: EmailMessage): string[] {
  const seen = new Set<string>()

  for (const group of [message.to, message.cc, message.bcc]) {
    for (const r of toArray(group)) {
      const address = addressOf(r)
      if (address) seen.add(address)
    }
  }

  return [...seen]
}

function toArray(recipients: EmailRecipients | undefined): EmailRecipient[] {
  if (recipients === undefined) return []

  return Array.isArray(recipients) ? recipients : [recipients]
}
