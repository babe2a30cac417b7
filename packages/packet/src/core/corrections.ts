import { InvalidBuilderStateError } from '../errors'

export type Correction = 'length' | 'checksum'

/**
 * Capability flags a builder embeds to derive fields at build time instead of
 * taking the caller's values. A builder declares which corrections it
 * supports; enabling anything else is a builder state error.
 */
export class CorrectionPolicy {
  readonly #supported: ReadonlySet<Correction>
  readonly #enabled = new Set<Correction>()

  constructor(supported: readonly Correction[] = []) {
    this.#supported = new Set(supported)
  }

  get lengthAtBuild(): boolean {
    return this.#enabled.has('length')
  }

  get checksumAtBuild(): boolean {
    return this.#enabled.has('checksum')
  }

  supports(correction: Correction): boolean {
    return this.#supported.has(correction)
  }

  set(correction: Correction, enabled: boolean): void {
    if (!enabled) {
      this.#enabled.delete(correction)
      return
    }
    if (!this.#supported.has(correction)) {
      throw new InvalidBuilderStateError(
        `This builder cannot correct ${correction} at build time`,
      )
    }
    this.#enabled.add(correction)
  }

  disableAll(): void {
    this.#enabled.clear()
  }
}
