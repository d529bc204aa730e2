export type { CmsEngine } from "./ports/cms-engine"
export type {
  EncryptingCertsInput,
  EncryptionCertificates,
} from "./ports/encryption-certificates"
export type { KeyMaterial, KeyMaterialReader } from "./ports/key-material"
export type { SealableEmail } from "./ports/sealable-email"
export type { SealedCopy, SmimeSigner, SmimeSignerFactory } from "./ports/signer"
export type {
  ContentCipher,
  DigestAlgorithm,
  SignerOptions,
  SignerSettings,
} from "./ports/signer-options"
export type { LoadedSigningIdentity, SigningIdentity } from "./ports/signing-identity"

export { resolveEncryptionCertificates } from "./core/certificates/resolve-encryption-certificates"
export {
  isSmimeError,
  type SerializedSmimeError,
  SmimeError,
  type SmimeErrorCode,
  type SmimeErrorContext,
  type SmimeErrorOptions,
} from "./core/errors/smime-error"
export { OutgoingEmail } from "./core/mailer/outgoing-email"
export {
  type DeliveryOutcome,
  SmimeMailer,
  type SmimeMailerDeps,
  type SmimeMailerOptions,
} from "./core/mailer/smime-mailer"
export { parseSignerOptions, signerOptionsSchema } from "./core/options/parse-signer-options"
export { SmimeSignerContext, type SmimeSignerDeps } from "./core/signer/smime-signer-context"

export { ForgeCmsEngine, type ForgeCmsEngineDeps } from "./adapters/forge/forge-cms-engine"
export { FsKeyMaterialReader } from "./adapters/fs/fs-key-material-reader"

export {
  type LoadSmimeConfigOptions,
  LoadedSmimeConfig,
  loadSmimeConfig,
  toMailerOptions,
} from "./config/load-smime-config"
export type { ConfigSource } from "./config/ports/config-source"
export { type SmimeConfig, type SmimeConfigKey, smimeConfigSchema } from "./config/smime-config"
export { EnvSource, type EnvSourceOptions } from "./config/sources/env-source"
export { ObjectSource } from "./config/sources/object-source"

export { type CreateSmimeMailerDeps, createSmimeMailer } from "./create-smime-mailer"
