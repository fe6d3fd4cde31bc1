import { BaseError } from "../base-error"

class FileMissingError extends BaseError<"file_missing"> {
  constructor(path: string, cause?: unknown) {
    super(`missing ${path}`, { code: "file_missing", context: { path }, cause })
  }
}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("keeps message and code", () => {
      const err = new BaseError("bad input", { code: "bad_input" })

      expect(err.message).toBe("bad input")
      expect(err.code).toBe("bad_input")
    })

    it("defaults to an operational, non-retryable error", () => {
      const err = new BaseError("x", { code: "x" })

      expect(err.isOperational).toBe(true)
      expect(err.isRetryable).toBe(false)
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("x", { code: "x" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("copies and freezes the given context", () => {
      const context = { variable: "ETCD_ENDPOINTS" }
      const err = new BaseError("x", { code: "x", context })

      expect(err.context).toEqual({ variable: "ETCD_ENDPOINTS" })
      expect(err.context).not.toBe(context)
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("stamps the current time", () => {
      const err = new BaseError("x", { code: "x" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("keeps the cause", () => {
      const cause = new Error("root")
      const err = new BaseError("wrapped", { code: "x", cause })

      expect(err.cause).toBe(cause)
    })

    it("has no cause property when none is given", () => {
      const err = new BaseError("x", { code: "x" })

      expect("cause" in err).toBe(false)
    })
  })

  describe("subclasses", () => {
    it("take the subclass name", () => {
      const err = new FileMissingError("/tmp/ca.pem")

      expect(err.name).toBe("FileMissingError")
      expect(err.code).toBe("file_missing")
      expect(err.context).toEqual({ path: "/tmp/ca.pem" })
    })

    it("are instances of Error and BaseError", () => {
      const err = new FileMissingError("/tmp/ca.pem")

      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(FileMissingError)
    })

    it("have a stack trace", () => {
      const err = new FileMissingError("/tmp/ca.pem")

      expect(err.stack).toContain("FileMissingError")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("bad input", { code: "bad_input", context: { id: 1 } })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "bad_input",
        message: "bad input",
        context: { id: 1 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is used by JSON.stringify", () => {
      const err = new BaseError("bad input", { code: "bad_input" })

      expect(JSON.parse(JSON.stringify(err))).toMatchObject({
        name: "BaseError",
        code: "bad_input",
      })
    })
  })
})
