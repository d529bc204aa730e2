import type { EmailMessage } from "@sealpost/email"
import type { SealableEmail } from "../../ports/sealable-email"

export class OutgoingEmail implements SealableEmail {
  private failed: string[] = []

  constructor(readonly message: EmailMessage) {}

  get failedRecipients(): readonly string[] {
    return this.failed
  }

  setFailedRecipients(recipients: string[]): void {
    this.failed = [...recipients]
  }
}
