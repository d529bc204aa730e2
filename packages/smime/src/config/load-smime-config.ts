import { z } from "zod"
import { SmimeError } from "../core/errors/smime-error"
import type { SmimeMailerOptions } from "../core/mailer/smime-mailer"
import type { ConfigSource } from "./ports/config-source"
import { type SmimeConfig, type SmimeConfigKey, smimeConfigSchema } from "./smime-config"
import { EnvSource } from "./sources/env-source"

export type LoadSmimeConfigOptions = {
  sources?: ConfigSource[]
}

export class LoadedSmimeConfig {
  constructor(
    private readonly data: Readonly<SmimeConfig>,
    private readonly provenance: Readonly<Record<string, string>>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<SmimeConfig> {
    return this.data
  }

  /** Name of the source that supplied `key`, or "default". */
  explain(key: SmimeConfigKey): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }
}

export async function loadSmimeConfig({
  sources,
}: LoadSmimeConfigOptions = {}): Promise<LoadedSmimeConfig> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = smimeConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new SmimeError(
      "invalid_config",
      `S/MIME configuration validation failed:\n${z.prettifyError(result.error)}`,
      { context: { keys: Object.keys(merged) } },
    )
  }

  return new LoadedSmimeConfig(result.data, provenance)
}

export function toMailerOptions(config: LoadedSmimeConfig): SmimeMailerOptions {
  const value = config.value

  return {
    signingCert: value.SIGNING_CERT ?? null,
    signingKey: value.SIGNING_KEY ?? null,
    signingKeyPassphrase: value.SIGNING_KEY_PASSPHRASE ?? null,
    encryptingCerts: value.ENCRYPTING_CERTS ?? null,
    defaultOptions: value.DEFAULT_OPTIONS ?? {},
  }
}
