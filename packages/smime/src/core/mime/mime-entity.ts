import { SmimeError } from "../errors/smime-error"

export const CRLF = "\r\n"

/**
 * A header field as it appears on the wire, continuation lines included.
 */
export type HeaderField = {
  name: string
  lines: string[]
}

export type SplitMessage = {
  /** Headers that stay readable outside the envelope. */
  outer: HeaderField[]
  /** The Content-* headers plus body: the part that gets signed or encrypted. */
  entity: Buffer
}

/**
 * Splits a CRLF-terminated message at its first empty line. Header bytes are
 * 7-bit after composition, so latin1 round-trips them exactly.
 */
export function splitMessage(raw: Uint8Array): SplitMessage {
  const buf = Buffer.from(raw)
  const end = buf.indexOf(CRLF + CRLF)

  if (end < 0) {
    throw new SmimeError("invalid_message", "Message has no empty line between header and body")
  }

  const headers = parseHeaders(buf.subarray(0, end).toString("latin1"))
  const body = buf.subarray(end + 4)

  const outer = headers.filter((h) => !isContentHeader(h))
  const content = headers.filter(isContentHeader)

  return { outer, entity: Buffer.concat([serializeHeaders(content, true), body]) }
}

export function joinMessage(outer: HeaderField[], entity: Uint8Array): Buffer {
  return Buffer.concat([serializeHeaders(outer, false), entity])
}

function parseHeaders(block: string): HeaderField[] {
  const fields: HeaderField[] = []

  for (const line of block.split(CRLF)) {
    const last = fields.at(-1)

    if ((line.startsWith(" ") || line.startsWith("\t")) && last) {
      last.lines.push(line)
      continue
    }

    const colon = line.indexOf(":")
    if (colon <= 0) {
      throw new SmimeError("invalid_message", "Malformed header line", {
        context: { line: line.slice(0, 40) },
      })
    }

    fields.push({ name: line.slice(0, colon).trim(), lines: [line] })
  }

  return fields
}

function isContentHeader(field: HeaderField): boolean {
  return field.name.toLowerCase().startsWith("content-")
}

function serializeHeaders(fields: HeaderField[], terminate: boolean): Buffer {
  const text = fields.flatMap((f) => f.lines.map((l) => l + CRLF)).join("")

  return Buffer.from(terminate ? text + CRLF : text, "latin1")
}
