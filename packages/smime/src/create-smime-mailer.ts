import type { RawEmailTransport } from "@sealpost/email"
import type { Logger } from "@sealpost/logger"
import { ForgeCmsEngine } from "./adapters/forge/forge-cms-engine"
import { FsKeyMaterialReader } from "./adapters/fs/fs-key-material-reader"
import { SmimeMailer, type SmimeMailerOptions } from "./core/mailer/smime-mailer"
import { SmimeSignerContext } from "./core/signer/smime-signer-context"
import type { CmsEngine } from "./ports/cms-engine"
import type { KeyMaterialReader } from "./ports/key-material"

export type CreateSmimeMailerDeps = {
  transport: RawEmailTransport
  logger?: Logger
  reader?: KeyMaterialReader
  cms?: CmsEngine
}

/**
 * Wires a mailer to the node-forge CMS engine and the filesystem reader
 * unless replacements are given.
 */
export function createSmimeMailer(
  deps: CreateSmimeMailerDeps,
  options: SmimeMailerOptions = {},
): SmimeMailer {
  const cms = deps.cms ?? new ForgeCmsEngine()
  const reader = deps.reader ?? new FsKeyMaterialReader()

  return new SmimeMailer(
    {
      transport: deps.transport,
      logger: deps.logger,
      createSigner: (signerOptions) => new SmimeSignerContext({ cms, reader }, signerOptions),
    },
    options,
  )
}
