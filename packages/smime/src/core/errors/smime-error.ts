export type SmimeErrorCode =
  | "signing_identity_incomplete"
  | "key_material_unreadable"
  | "invalid_certificate"
  | "invalid_private_key"
  | "signing_key_mismatch"
  | "recipient_certificate_missing"
  | "invalid_signer_options"
  | "invalid_message"
  | "invalid_config"

/**
 * Structured metadata. Paths and addresses only: key bytes and passphrases
 * never go in here.
 */
export type SmimeErrorContext = Readonly<Record<string, unknown>>

export type SmimeErrorOptions = Readonly<{
  context?: SmimeErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export type SerializedSmimeError = Readonly<{
  name: string
  code: SmimeErrorCode
  message: string
  context: Record<string, unknown>
  isOperational: boolean
  timestamp: string
  cause?: Readonly<{ name: string; message: string }>
}>

export class SmimeError extends Error {
  readonly code: SmimeErrorCode
  readonly context: SmimeErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(code: SmimeErrorCode, message: string, options: SmimeErrorOptions = {}) {
    super(message, { cause: options.cause })

    this.name = "SmimeError"
    this.code = code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedSmimeError {
    const cause = this.cause

    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      isOperational: this.isOperational,
      timestamp: this.timestamp.toISOString(),
      ...(cause instanceof Error && { cause: { name: cause.name, message: cause.message } }),
    }
  }
}

export function isSmimeError(err: unknown): err is SmimeError {
  return err instanceof SmimeError
}
