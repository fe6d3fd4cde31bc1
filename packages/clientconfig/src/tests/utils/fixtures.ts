import { readFileSync } from "node:fs"

function fixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), "utf-8")
}

/** Self-signed CA, CN=test-ca */
export const CA_PEM = fixture("ca.pem")

/** Issued by test-ca, CN=test-client */
export const CLIENT_CERT_PEM = fixture("client.pem")

/** PKCS#8 key for CLIENT_CERT_PEM */
export const CLIENT_KEY_PEM = fixture("client-key.pem")

/** PKCS#8 key unrelated to any fixture certificate */
export const OTHER_KEY_PEM = fixture("other-key.pem")
