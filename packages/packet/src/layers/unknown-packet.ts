import { CorrectionPolicy } from '../core/corrections'
import { AbstractPacket, describeBytes, type PacketBuilder } from '../core/packet'
import { InvalidBuilderStateError, MalformedInputError } from '../errors'
import { cloneBytes } from '../internal/binary/bytes'

export const UNKNOWN_KIND = 'unknown'

/**
 * Opaque terminal layer: bytes no registered decoder claimed.
 */
export class UnknownPacket extends AbstractPacket {
  readonly kind = UNKNOWN_KIND
  readonly header = undefined
  readonly payload = undefined
  readonly #rawData: Uint8Array

  private constructor(rawData: Uint8Array) {
    super()
    this.#rawData = cloneBytes(rawData)
  }

  static decode(raw: Uint8Array): UnknownPacket {
    if (raw.length === 0) {
      throw new MalformedInputError('An unknown payload needs at least one byte')
    }
    return new UnknownPacket(raw)
  }

  static fromBuilder(builder: UnknownPacketBuilder): UnknownPacket {
    return new UnknownPacket(builder.getRawData())
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
    return `[Unknown Packet (${this.byteLength} bytes)]\n  data: ${describeBytes(this.#rawData)}`
  }

  toBuilder(): UnknownPacketBuilder {
    return new UnknownPacketBuilder().rawData(this.#rawData)
  }
}

export class UnknownPacketBuilder implements PacketBuilder<UnknownPacket> {
  readonly kind = UNKNOWN_KIND
  readonly malformed = false
  readonly corrections = new CorrectionPolicy()
  #rawData: Uint8Array = new Uint8Array(0)

  rawData(rawData: Uint8Array): this {
    this.#rawData = cloneBytes(rawData)
    return this
  }

  getRawData(): Uint8Array {
    return cloneBytes(this.#rawData)
  }

  getPayloadBuilder(): undefined {
    return undefined
  }

  payloadBuilder(builder: PacketBuilder | undefined): this {
    if (builder) {
      throw new InvalidBuilderStateError('An unknown payload cannot carry a nested layer')
    }
    return this
  }

  build(): UnknownPacket {
    return UnknownPacket.fromBuilder(this)
  }
}
