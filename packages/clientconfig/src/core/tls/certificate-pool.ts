import { X509Certificate } from "node:crypto"
import { decodePemBlocks } from "./pem"

function parseCertificate(der: Buffer): X509Certificate | null {
  try {
    return new X509Certificate(der)
  } catch {
    return null
  }
}

/**
 * An ordered set of trusted certificates, deduplicated by SHA-256
 * fingerprint.
 */
export class CertificatePool {
  private readonly byFingerprint = new Map<string, X509Certificate>()

  /**
   * Builds a pool from PEM text. Returns null when no certificate could be
   * read from it.
   */
  static fromPem(pem: string): CertificatePool | null {
    const pool = new CertificatePool()

    return pool.appendFromPem(pem) ? pool : null
  }

  /**
   * Adds every CERTIFICATE block of `pem`. Blocks of other types, blocks with
   * PEM headers and blocks that fail to parse are skipped.
   *
   * @returns true if at least one certificate was read.
   */
  appendFromPem(pem: string): boolean {
    let ok = false

    for (const block of decodePemBlocks(pem)) {
      if (block.type !== "CERTIFICATE" || Object.keys(block.headers).length > 0) continue

      const certificate = parseCertificate(block.der)
      if (!certificate) continue

      this.add(certificate)
      ok = true
    }

    return ok
  }

  add(certificate: X509Certificate): void {
    if (!this.byFingerprint.has(certificate.fingerprint256)) {
      this.byFingerprint.set(certificate.fingerprint256, certificate)
    }
  }

  get size(): number {
    return this.byFingerprint.size
  }

  certificates(): X509Certificate[] {
    return [...this.byFingerprint.values()]
  }

  subjects(): string[] {
    return this.certificates().map((c) => c.subject)
  }

  /** One PEM string per certificate, in insertion order */
  toPem(): string[] {
    return this.certificates().map((c) => c.toString())
  }

  clone(): CertificatePool {
    const copy = new CertificatePool()
    for (const certificate of this.byFingerprint.values()) copy.add(certificate)

    return copy
  }
}
