/**
 * Loads raw configuration values. No validation or coercion happens here.
 *
 * Sources are applied in order; later sources override earlier ones, and an
 * `undefined` value means "not provided".
 */
export interface ConfigSource {
  /** Shown by `explain()`, e.g. "env" or "object:overrides". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
