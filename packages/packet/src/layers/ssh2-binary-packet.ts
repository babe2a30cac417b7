import { CorrectionPolicy } from '../core/corrections'
import { SSH_MESSAGE_NUMBER } from '../core/numbers'
import {
  AbstractHeader,
  AbstractPacket,
  describeBytes,
  type Packet,
  type PacketBuilder,
  requireBytes,
  requireUnsigned,
} from '../core/packet'
import type { DecodeContext } from '../core/registry'
import { getDefaultRegistry } from '../default-registry'
import {
  InconsistentLengthError,
  InvalidBuilderStateError,
  MalformedInputError,
} from '../errors'
import { BinaryReader } from '../internal/binary/binary-reader'
import { toHexString, uint32ToBytes, uint8ToBytes } from '../internal/binary/bytes'

export const SSH2_BINARY_PACKET_KIND = 'ssh2-binary-packet'
export const SSH2_BINARY_HEADER_SIZE = 5
export const DEFAULT_CIPHER_BLOCK_SIZE = 8
/** packet_length values above this are rejected on decode and build. */
export const MAX_PACKET_LENGTH = 0x7fffffff

/*
 * RFC 4253 §6
 *
 *   uint32    packet_length
 *   byte      padding_length
 *   byte[n1]  payload; n1 = packet_length - padding_length - 1
 *   byte[n2]  random padding; n2 = padding_length
 *   byte[m]   mac; m = mac_length
 *
 * packet_length excludes the MAC and itself. The MAC length comes from the
 * negotiated algorithm, which this layer does not know, so every byte after
 * the padding is taken as MAC.
 */

export class Ssh2BinaryHeader extends AbstractHeader {
  readonly packetLength: number
  readonly paddingLength: number

  constructor(packetLength: number, paddingLength: number) {
    super()
    this.packetLength = packetLength
    this.paddingLength = paddingLength
  }

  static decode(raw: Uint8Array): Ssh2BinaryHeader {
    if (raw.length < SSH2_BINARY_HEADER_SIZE) {
      throw new MalformedInputError(
        `The data is too short to build an SSH2 binary packet header (${SSH2_BINARY_HEADER_SIZE} bytes). data: ${toHexString(raw, ' ')}`,
      )
    }
    const reader = new BinaryReader(raw)
    const packetLength = reader.readUint32()
    if (packetLength > MAX_PACKET_LENGTH) {
      throw new InconsistentLengthError(
        `A packet length above ${MAX_PACKET_LENGTH} is not supported, got ${packetLength}`,
      )
    }
    return new Ssh2BinaryHeader(packetLength, reader.readUint8())
  }

  protected get title(): string {
    return 'SSH2 Binary Packet Header'
  }

  rawFields(): Uint8Array[] {
    return [uint32ToBytes(this.packetLength), uint8ToBytes(this.paddingLength)]
  }

  protected describeFields(): Array<[string, string | number]> {
    return [
      ['packet_length', this.packetLength],
      ['padding_length', this.paddingLength],
    ]
  }
}

export class Ssh2BinaryPacket extends AbstractPacket {
  readonly kind = SSH2_BINARY_PACKET_KIND
  readonly header: Ssh2BinaryHeader
  readonly payload: Packet
  readonly #randomPadding: Uint8Array
  readonly #mac: Uint8Array

  private constructor(
    header: Ssh2BinaryHeader,
    payload: Packet,
    randomPadding: Uint8Array,
    mac: Uint8Array,
  ) {
    super()
    this.header = header
    this.payload = payload
    this.#randomPadding = randomPadding.slice()
    this.#mac = mac.slice()
  }

  /**
   * Slices payload, padding and MAC using the header's lengths. The payload
   * is decoded by message number (its first byte).
   */
  static decode(
    raw: Uint8Array,
    context: DecodeContext = getDefaultRegistry(),
  ): Ssh2BinaryPacket {
    const header = Ssh2BinaryHeader.decode(raw)
    const payloadLength = header.packetLength - header.paddingLength - 1
    if (payloadLength === 0) {
      throw new MalformedInputError(
        `Payload is required for an SSH2 binary packet. data: ${toHexString(raw, ' ')}`,
      )
    }
    if (payloadLength < 0) {
      throw new InconsistentLengthError(
        `The padding length ${header.paddingLength} does not fit in packet length ${header.packetLength}. data: ${toHexString(raw, ' ')}`,
      )
    }
    const needed = SSH2_BINARY_HEADER_SIZE + payloadLength + header.paddingLength
    if (needed > raw.length) {
      throw new InconsistentLengthError(
        `The packet length ${header.packetLength} needs ${needed} bytes, got ${raw.length}. data: ${toHexString(raw, ' ')}`,
      )
    }

    const reader = new BinaryReader(raw)
    reader.skip(SSH2_BINARY_HEADER_SIZE)
    const rawPayload = reader.readBytes(payloadLength)
    const messageNumber = rawPayload[0] ?? 0
    const payload = context.decodeNested(SSH_MESSAGE_NUMBER, rawPayload, messageNumber)
    const randomPadding = reader.readBytes(header.paddingLength)
    const mac = reader.readRemaining()
    return new Ssh2BinaryPacket(header, payload, randomPadding, mac)
  }

  static fromBuilder(builder: Ssh2BinaryPacketBuilder): Ssh2BinaryPacket {
    const fields = builder.snapshot()
    const payloadBuilder = builder.getPayloadBuilder()
    if (!payloadBuilder) {
      throw new InvalidBuilderStateError('payloadBuilder is required')
    }
    const mac = requireBytes('mac', fields.mac)
    const payload = payloadBuilder.build()

    let randomPadding: Uint8Array
    if (fields.paddingAtBuild) {
      const blockSize = Math.max(
        requireUnsigned('cipherBlockSize', fields.cipherBlockSize, MAX_PACKET_LENGTH),
        DEFAULT_CIPHER_BLOCK_SIZE,
      )
      randomPadding = new Uint8Array(payload.byteLength % blockSize)
    } else {
      if (fields.randomPadding === undefined) {
        throw new InvalidBuilderStateError(
          'randomPadding is required unless padding is computed at build',
        )
      }
      randomPadding = fields.randomPadding.slice()
    }

    let packetLength = fields.packetLength
    let paddingLength = fields.paddingLength
    if (builder.corrections.lengthAtBuild) {
      if (randomPadding.length > 0xff) {
        throw new InconsistentLengthError(
          `A padding of ${randomPadding.length} bytes does not fit the padding_length byte`,
        )
      }
      packetLength = 1 + payload.byteLength + randomPadding.length
      paddingLength = randomPadding.length
    }
    if (
      !Number.isInteger(packetLength) ||
      packetLength < 0 ||
      packetLength > MAX_PACKET_LENGTH
    ) {
      throw new InconsistentLengthError(
        `A packet length outside 0..${MAX_PACKET_LENGTH} is not supported, got ${packetLength}`,
      )
    }

    return new Ssh2BinaryPacket(
      new Ssh2BinaryHeader(packetLength, requireUnsigned('paddingLength', paddingLength, 0xff)),
      payload,
      randomPadding,
      mac,
    )
  }

  get randomPadding(): Uint8Array {
    return this.#randomPadding.slice()
  }

  get mac(): Uint8Array {
    return this.#mac.slice()
  }

  toBuilder(): Ssh2BinaryPacketBuilder {
    return new Ssh2BinaryPacketBuilder()
      .packetLength(this.header.packetLength)
      .paddingLength(this.header.paddingLength)
      .payloadBuilder(this.payload.toBuilder())
      .randomPadding(this.#randomPadding)
      .mac(this.#mac)
  }

  protected override trailingFields(): Uint8Array[] {
    return [this.#randomPadding.slice(), this.#mac.slice()]
  }

  protected override describeTrailer(): string {
    return [
      `  random padding: ${describeBytes(this.#randomPadding)}`,
      `  mac: ${describeBytes(this.#mac)}`,
    ].join('\n')
  }
}

interface Ssh2BinaryBuilderFields {
  readonly packetLength: number
  readonly paddingLength: number
  readonly randomPadding: Uint8Array | undefined
  readonly mac: Uint8Array | undefined
  readonly cipherBlockSize: number
  readonly paddingAtBuild: boolean
}

export class Ssh2BinaryPacketBuilder implements PacketBuilder<Ssh2BinaryPacket> {
  readonly kind = SSH2_BINARY_PACKET_KIND
  readonly malformed = false
  readonly corrections = new CorrectionPolicy(['length'])
  #packetLength = 0
  #paddingLength = 0
  #randomPadding: Uint8Array | undefined
  #mac: Uint8Array | undefined
  #cipherBlockSize = 0
  #paddingAtBuild = false
  #payloadBuilder: PacketBuilder | undefined

  packetLength(packetLength: number): this {
    this.#packetLength = packetLength
    return this
  }

  paddingLength(paddingLength: number): this {
    this.#paddingLength = paddingLength
    return this
  }

  randomPadding(randomPadding: Uint8Array): this {
    this.#randomPadding = randomPadding.slice()
    return this
  }

  mac(mac: Uint8Array): this {
    this.#mac = mac.slice()
    return this
  }

  /** Values below 8 are treated as 8. */
  cipherBlockSize(cipherBlockSize: number): this {
    this.#cipherBlockSize = cipherBlockSize
    return this
  }

  /**
   * Pads with `payloadLength mod blockSize` zero bytes at build time. RFC 4253
   * asks for at least four bytes of padding and a block-aligned packet; this
   * rule guarantees neither.
   */
  paddingAtBuild(paddingAtBuild: boolean): this {
    this.#paddingAtBuild = paddingAtBuild
    return this
  }

  correctLengthAtBuild(enabled: boolean): this {
    this.corrections.set('length', enabled)
    return this
  }

  getPayloadBuilder(): PacketBuilder | undefined {
    return this.#payloadBuilder
  }

  payloadBuilder(builder: PacketBuilder | undefined): this {
    this.#payloadBuilder = builder
    return this
  }

  snapshot(): Ssh2BinaryBuilderFields {
    return {
      packetLength: this.#packetLength,
      paddingLength: this.#paddingLength,
      randomPadding: this.#randomPadding,
      mac: this.#mac,
      cipherBlockSize: this.#cipherBlockSize,
      paddingAtBuild: this.#paddingAtBuild,
    }
  }

  build(): Ssh2BinaryPacket {
    return Ssh2BinaryPacket.fromBuilder(this)
  }
}
