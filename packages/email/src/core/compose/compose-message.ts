import MailComposer from "nodemailer/lib/mail-composer"
import type MimeNode from "nodemailer/lib/mime-node"
import type { EmailMessage } from "../../ports/message"
import type { RawEmail } from "../../ports/transport"
import { addressOf, listRecipients } from "../recipients/recipients"
import { validateMessage } from "../validation/validate-message"
import { toMailOptions } from "./to-mail-options"

/**
 * Serializes a message to RFC 5322 bytes (CRLF line endings) together with
 * the SMTP envelope derived from its from/to/cc/bcc fields.
 *
 * Bcc recipients appear in the envelope only, never in the headers.
 */
export async function composeMessage(message: EmailMessage): Promise<RawEmail> {
  validateMessage(message)

  const root = new MailComposer(toMailOptions(message)).compile()
  const messageId = root.messageId()
  const raw = await build(root)

  return {
    raw,
    messageId,
    envelope: {
      from: addressOf(message.from),
      to: listRecipients(message),
    },
  }
}

function build(node: MimeNode): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    node.build((err, buf) => {
      if (err) reject(err)
      else resolve(buf)
    })
  })
}
