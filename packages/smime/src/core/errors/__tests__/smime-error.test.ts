import { isSmimeError, SmimeError } from "../smime-error"

describe("SmimeError", () => {
  it("carries code, context and defaults", () => {
    const error = new SmimeError("recipient_certificate_missing", "No certificate for carol", {
      context: { recipient: "carol@example.com" },
    })

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe("SmimeError")
    expect(error.code).toBe("recipient_certificate_missing")
    expect(error.context).toEqual({ recipient: "carol@example.com" })
    expect(error.isOperational).toBe(true)
    expect(error.timestamp).toBeInstanceOf(Date)
  })

  it("freezes its context", () => {
    const context = { path: "/keys/a.pem" }
    const error = new SmimeError("key_material_unreadable", "unreadable", { context })

    context.path = "/keys/b.pem"

    expect(error.context).toEqual({ path: "/keys/a.pem" })
    expect(Object.isFrozen(error.context)).toBe(true)
  })

  it("chains the cause", () => {
    const cause = new Error("ENOENT")
    const error = new SmimeError("key_material_unreadable", "unreadable", { cause })

    expect(error.cause).toBe(cause)
  })

  it("serializes to JSON with the cause summarized", () => {
    const error = new SmimeError("invalid_private_key", "bad key", {
      cause: new TypeError("Invalid PEM"),
      isOperational: false,
    })

    expect(error.toJSON()).toEqual({
      name: "SmimeError",
      code: "invalid_private_key",
      message: "bad key",
      context: {},
      isOperational: false,
      timestamp: error.timestamp.toISOString(),
      cause: { name: "TypeError", message: "Invalid PEM" },
    })
  })

  it("omits a non-Error cause from JSON", () => {
    const error = new SmimeError("invalid_message", "bad message", { cause: "text" })

    expect(error.toJSON()).not.toHaveProperty("cause")
  })

  it("is recognized by isSmimeError", () => {
    expect(isSmimeError(new SmimeError("invalid_config", "bad"))).toBe(true)
    expect(isSmimeError(new Error("bad"))).toBe(false)
    expect(isSmimeError({ code: "invalid_config" })).toBe(false)
  })
})
