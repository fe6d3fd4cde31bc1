import { envOf } from "../../tests/utils/env"
import { ClientConfigError } from "../errors"
import { loadSettings } from "../settings"

describe("loadSettings behavior", () => {
  it("leaves out names set in neither form", () => {
    const settings = loadSettings({ source: envOf({ UNRELATED: "x" }) })

    expect(settings.names()).toEqual([])
    expect(settings.has("ETCD_ENDPOINTS")).toBe(false)
    expect(settings.get("ETCD_ENDPOINTS")).toBeUndefined()
    expect(settings.explain("ETCD_ENDPOINTS")).toBeUndefined()
  })

  it("keeps direct values verbatim", () => {
    const settings = loadSettings({ source: envOf({ ETCD_ENDPOINTS: " a:2379 ,b " }) })

    expect(settings.get("ETCD_ENDPOINTS")).toBe(" a:2379 ,b ")
    expect(settings.explain("ETCD_ENDPOINTS")).toBe("env")
  })

  it("keeps file contents verbatim, trailing newline included", () => {
    const readFile = vi.fn().mockReturnValue("root\n")

    const settings = loadSettings({
      source: envOf({ ETCD_USERNAME_FILE: "/run/secrets/user" }),
      readFile,
    })

    expect(readFile).toHaveBeenCalledTimes(1)
    expect(settings.get("ETCD_USERNAME")).toBe("root\n")
    expect(settings.explain("ETCD_USERNAME")).toBe("file:/run/secrets/user")
  })

  it("leaves out a name whose file is empty", () => {
    const settings = loadSettings({
      source: envOf({ ETCD_USERNAME_FILE: "/run/secrets/user" }),
      readFile: () => "",
    })

    expect(settings.names()).toEqual([])
    expect(settings.has("ETCD_USERNAME")).toBe(false)
  })

  it("lists names in a fixed order", () => {
    const settings = loadSettings({
      source: envOf({
        ETCD_CLIENT_KEY: "k",
        ETCD_ENDPOINTS: "a",
        ETCD_PASSWORD: "p",
      }),
    })

    expect(settings.names()).toEqual(["ETCD_ENDPOINTS", "ETCD_PASSWORD", "ETCD_CLIENT_KEY"])
  })

  it("stops at the first conflict without reading files", () => {
    const readFile = vi.fn().mockReturnValue("x")

    expect(() =>
      loadSettings({
        source: envOf({
          ETCD_ENDPOINTS: "a",
          ETCD_ENDPOINTS_FILE: "/run/endpoints",
          ETCD_SERVER_CA_FILE: "/run/ca.pem",
        }),
        readFile,
      }),
    ).toThrow(ClientConfigError)
    expect(readFile).not.toHaveBeenCalled()
  })

  it("wraps errors from a custom reader", () => {
    const cause = new Error("permission denied")

    const load = () =>
      loadSettings({
        source: envOf({ ETCD_CLIENT_KEY_FILE: "/run/key.pem" }),
        readFile: () => {
          throw cause
        },
      })

    expect(load).toThrow(ClientConfigError)
    expect(load).toThrow(
      'error reading "/run/key.pem" (for ETCD_CLIENT_KEY_FILE): permission denied',
    )

    try {
      load()
    } catch (err) {
      expect(err).toMatchObject({ code: "file_read_failed", cause })
    }
  })
})
