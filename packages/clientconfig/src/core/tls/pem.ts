export type PemBlock = {
  /** Text after BEGIN, e.g. "CERTIFICATE", "RSA PRIVATE KEY" */
  type: string
  headers: Readonly<Record<string, string>>
  der: Buffer
  /** The block as it appeared in the input, armor lines included */
  text: string
}

const PEM_BLOCK = /-----BEGIN ([^\r\n-]+)-----[ \t]*\r?\n([\s\S]*?)-----END \1-----/g
const TRAILING_BLANKS = /[ \t]+(?=\r?\n|$)/g
const BASE64_BODY = /^[A-Za-z0-9+/=\s]*$/

function splitHeaders(body: string): { headers: Record<string, string>; base64: string } {
  const lines = body.split(/\r?\n/)
  const headers: Record<string, string> = {}

  if (!lines[0]?.includes(":")) return { headers, base64: body }

  let i = 0
  for (; i < lines.length; i++) {
    const line = lines[i] ?? ""
    const sep = line.indexOf(":")
    if (sep === -1) break

    headers[line.slice(0, sep).trim()] = line.slice(sep + 1).trim()
  }

  return { headers, base64: lines.slice(i).join("\n") }
}

/**
 * Decode every well-formed PEM block in `input`, in order.
 *
 * Text between blocks is ignored, as are blocks whose body is not base64.
 * Trailing spaces and tabs on each line are dropped from `text`.
 */
export function decodePemBlocks(input: string): PemBlock[] {
  const blocks: PemBlock[] = []

  for (const match of input.matchAll(PEM_BLOCK)) {
    const [text, type, body] = match
    if (type === undefined || body === undefined) continue

    const { headers, base64 } = splitHeaders(body)
    if (!BASE64_BODY.test(base64)) continue

    blocks.push({
      type,
      headers,
      der: Buffer.from(base64.replace(/\s+/g, ""), "base64"),
      text: text.replace(TRAILING_BLANKS, ""),
    })
  }

  return blocks
}

export function isPrivateKeyBlock(block: PemBlock): boolean {
  return block.type === "PRIVATE KEY" || block.type.endsWith(" PRIVATE KEY")
}
