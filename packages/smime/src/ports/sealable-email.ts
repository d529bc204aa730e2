import type { EmailMessage } from "@sealpost/email"

export interface SealableEmail {
  readonly message: EmailMessage

  setFailedRecipients(recipients: string[]): void
}
