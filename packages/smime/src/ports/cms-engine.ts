import type { SignerSettings } from "./signer-options"
import type { LoadedSigningIdentity } from "./signing-identity"

/**
 * Produces DER-encoded CMS structures. MIME packaging is not its concern.
 */
export interface CmsEngine {
  /** SignedData over `content`; content is embedded unless `settings.detached`. */
  sign(
    content: Uint8Array,
    identity: LoadedSigningIdentity,
    settings: SignerSettings,
  ): Promise<Uint8Array>

  /** EnvelopedData over `content`, readable by every certificate's key. */
  envelope(
    content: Uint8Array,
    certificates: readonly Uint8Array[],
    settings: SignerSettings,
  ): Promise<Uint8Array>
}
