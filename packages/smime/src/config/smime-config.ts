import { z } from "zod"
import { signerOptionsSchema } from "../core/options/parse-signer-options"

const path = z.string().trim().min(1)

/**
 * Env values arrive as strings; a leading `[` or `{` marks JSON.
 */
function fromJson(value: unknown, ctx: z.RefinementCtx): unknown {
  if (typeof value !== "string") return value

  const trimmed = value.trim()
  if (!trimmed.startsWith("[") && !trimmed.startsWith("{")) return value

  try {
    return JSON.parse(trimmed)
  } catch (err) {
    ctx.addIssue({
      code: "custom",
      message: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    })

    return z.NEVER
  }
}

export const smimeConfigSchema = z.object({
  SIGNING_CERT: path.optional(),
  SIGNING_KEY: path.optional(),
  SIGNING_KEY_PASSPHRASE: z.string().optional(),
  ENCRYPTING_CERTS: z
    .preprocess(fromJson, z.union([path, z.array(path), z.record(z.string(), path)]))
    .optional(),
  DEFAULT_OPTIONS: z.preprocess(fromJson, signerOptionsSchema).optional(),
})

export type SmimeConfig = z.infer<typeof smimeConfigSchema>

export type SmimeConfigKey = keyof SmimeConfig & string
