import type { EmailMessage } from "../../../ports/message"
import { composeMessage } from "../compose-message"

function message(overrides: Partial<EmailMessage> = {}): EmailMessage {
  return {
    from: { email: "sender@example.com", name: "Sender" },
    to: { email: "alice@example.com", name: "Alice" },
    subject: "Quarterly report",
    text: "Numbers attached.",
    messageId: "<fixed-1@example.com>",
    date: new Date("2024-01-15T10:30:00.000Z"),
    ...overrides,
  }
}

describe("composeMessage", () => {
  it("serializes headers with CRLF line endings", async () => {
    const composed = await composeMessage(message())
    const raw = Buffer.from(composed.raw).toString("utf8")

    expect(raw).toContain("Subject: Quarterly report\r\n")
    expect(raw).toContain("From: Sender <sender@example.com>\r\n")
    expect(raw).toContain("To: Alice <alice@example.com>\r\n")
    expect(raw).toContain("Message-ID: <fixed-1@example.com>\r\n")
    expect(raw).toContain("MIME-Version: 1.0\r\n")
  })

  it("returns the Message-ID it serialized", async () => {
    const composed = await composeMessage(message())

    expect(composed.messageId).toBe("<fixed-1@example.com>")
  })

  it("generates a Message-ID when none is given", async () => {
    const composed = await composeMessage(message({ messageId: undefined }))
    const raw = Buffer.from(composed.raw).toString("utf8")

    expect(composed.messageId).toMatch(/^<.+@.+>$/)
    expect(raw).toContain(`Message-ID: ${composed.messageId}\r\n`)
  })

  it("builds the envelope from from/to/cc/bcc", async () => {
    const composed = await composeMessage(
      message({
        cc: { email: "Carol@example.com" },
        bcc: [{ email: "dave@example.com" }],
      }),
    )

    expect(composed.envelope).toEqual({
      from: "sender@example.com",
      to: ["alice@example.com", "carol@example.com", "dave@example.com"],
    })
  })

  it("keeps bcc recipients out of the headers", async () => {
    const composed = await composeMessage(message({ bcc: "dave@example.com" }))
    const raw = Buffer.from(composed.raw).toString("utf8")

    expect(raw).not.toContain("Bcc:")
  })

  it("rejects invalid messages before composing", async () => {
    await expect(composeMessage(message({ subject: "" }))).rejects.toThrow(/subject/)
  })
})
