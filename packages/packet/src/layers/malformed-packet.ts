import { CorrectionPolicy } from '../core/corrections'
import { AbstractPacket, describeBytes, type PacketBuilder } from '../core/packet'
import { InvalidBuilderStateError, type PacketError } from '../errors'
import { cloneBytes } from '../internal/binary/bytes'

export const MALFORMED_KIND = 'malformed'

/**
 * Stands in for a nested layer that failed validation. It keeps exactly the
 * bytes handed to the failing decoder so the enclosing layer still
 * serializes to its original input.
 */
export class MalformedPacket extends AbstractPacket {
  readonly kind = MALFORMED_KIND
  readonly header = undefined
  readonly payload = undefined
  readonly #rawData: Uint8Array
  readonly cause: PacketError | undefined

  constructor(rawData: Uint8Array, cause?: PacketError) {
    super()
    this.#rawData = cloneBytes(rawData)
    this.cause = cause
  }

  override get malformed(): boolean {
    return true
  }

  get rawData(): Uint8Array {
    return cloneBytes(this.#rawData)
  }

  override get byteLength(): number {
    return this.#rawData.length
  }

  override serialize(): Uint8Array {
    return cloneBytes(this.#rawData)
  }

  override toString(): string {
    const lines = [
      `[Malformed Packet (${this.byteLength} bytes)]`,
      `  data: ${describeBytes(this.#rawData)}`,
    ]
    if (this.cause) {
      lines.push(`  cause: ${this.cause.name}: ${this.cause.message}`)
    }
    return lines.join('\n')
  }

  toBuilder(): MalformedPacketBuilder {
    return new MalformedPacketBuilder().rawData(this.#rawData).cause(this.cause)
  }
}

export class MalformedPacketBuilder implements PacketBuilder<MalformedPacket> {
  readonly kind = MALFORMED_KIND
  readonly malformed = true
  readonly corrections = new CorrectionPolicy()
  #rawData: Uint8Array = new Uint8Array(0)
  #cause: PacketError | undefined

  rawData(rawData: Uint8Array): this {
    this.#rawData = cloneBytes(rawData)
    return this
  }

  cause(cause: PacketError | undefined): this {
    this.#cause = cause
    return this
  }

  getPayloadBuilder(): undefined {
    return undefined
  }

  payloadBuilder(builder: PacketBuilder | undefined): this {
    if (builder) {
      throw new InvalidBuilderStateError('A malformed layer cannot carry a nested layer')
    }
    return this
  }

  build(): MalformedPacket {
    return new MalformedPacket(this.#rawData, this.#cause)
  }
}
