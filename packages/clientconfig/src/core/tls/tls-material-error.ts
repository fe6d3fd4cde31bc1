import { BaseError } from "@etcd-env/errors"

export class TlsMaterialError extends BaseError<"tls_material_invalid"> {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "tls_material_invalid", cause })
  }
}
