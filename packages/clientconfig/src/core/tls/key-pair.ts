import { createPrivateKey, type KeyObject, X509Certificate } from "node:crypto"
import { decodePemBlocks, isPrivateKeyBlock, type PemBlock } from "./pem"
import { TlsMaterialError } from "./tls-material-error"

/**
 * A client certificate chain and the private key for its leaf.
 */
export type ClientCertificate = {
  readonly leaf: X509Certificate
  /** DER of every certificate block, leaf first; only the leaf is parsed */
  readonly chain: readonly Buffer[]
  readonly privateKey: KeyObject

  /** Inputs as given, for consumers that take PEM text */
  readonly certificatePem: string
  readonly keyPem: string
}

function skippedTypes(blocks: PemBlock[]): string {
  return `[${blocks.map((b) => b.type).join(" ")}]`
}

function certificateBlocks(certPem: string): PemBlock[] {
  const blocks = decodePemBlocks(certPem)
  const certs = blocks.filter((b) => b.type === "CERTIFICATE")

  if (certs.length > 0) return certs

  if (blocks.length === 0) {
    throw new TlsMaterialError("failed to find any PEM data in certificate input")
  }
  if (blocks.some(isPrivateKeyBlock)) {
    throw new TlsMaterialError(
      "failed to find certificate PEM data in certificate input, but did find a private key; PEM inputs may have been switched",
    )
  }
  throw new TlsMaterialError(
    `failed to find "CERTIFICATE" PEM block in certificate input after skipping PEM blocks of the following types: ${skippedTypes(blocks)}`,
  )
}

function keyBlock(keyPem: string): PemBlock {
  const blocks = decodePemBlocks(keyPem)
  const key = blocks.find(isPrivateKeyBlock)

  if (key) return key

  if (blocks.length === 0) {
    throw new TlsMaterialError("failed to find any PEM data in key input")
  }
  if (blocks.some((b) => b.type === "CERTIFICATE")) {
    throw new TlsMaterialError("found a certificate rather than a key in the PEM for the private key")
  }
  throw new TlsMaterialError(
    `failed to find PEM block with type ending in "PRIVATE KEY" in key input after skipping PEM blocks of the following types: ${skippedTypes(blocks)}`,
  )
}

function toCertificate(block: PemBlock): X509Certificate {
  try {
    return new X509Certificate(block.der)
  } catch (err) {
    throw new TlsMaterialError("failed to parse certificate", err)
  }
}

function toPrivateKey(block: PemBlock): KeyObject {
  try {
    return createPrivateKey(block.text)
  } catch (err) {
    throw new TlsMaterialError("failed to parse private key", err)
  }
}

function belongsTo(leaf: X509Certificate, privateKey: KeyObject): boolean {
  try {
    return leaf.checkPrivateKey(privateKey)
  } catch (err) {
    throw new TlsMaterialError("private key does not match public key", err)
  }
}

/**
 * Parses a PEM certificate chain and a PEM private key and checks that the
 * key belongs to the leaf certificate.
 *
 * @throws TlsMaterialError when either input has no usable block or the key
 * does not match.
 */
export function parseKeyPair(certPem: string, keyPem: string): ClientCertificate {
  const blocks = certificateBlocks(certPem)
  const [first] = blocks
  const leaf = first && toCertificate(first)
  const privateKey = toPrivateKey(keyBlock(keyPem))

  if (!leaf || !belongsTo(leaf, privateKey)) {
    throw new TlsMaterialError("private key does not match public key")
  }

  return { leaf, chain: blocks.map((b) => b.der), privateKey, certificatePem: certPem, keyPem }
}
