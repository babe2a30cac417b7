import { quarantineMalformed } from '../core/containment'
import { CorrectionPolicy } from '../core/corrections'
import {
  describeDiscriminator,
  ETHER_TYPE,
  EtherType,
  ND_OPTION_TYPE,
  NdOptionType,
} from '../core/numbers'
import {
  AbstractHeader,
  AbstractPacket,
  describeBytes,
  type Packet,
  type PacketBuilder,
  requireBytes,
  requireUnsigned,
} from '../core/packet'
import type { DecodeContext, PacketRegistry } from '../core/registry'
import { getDefaultRegistry } from '../default-registry'
import {
  InconsistentLengthError,
  InvalidBuilderStateError,
  MalformedInputError,
  TypeMismatchError,
} from '../errors'
import { BinaryReader } from '../internal/binary/binary-reader'
import { toHexString, uint8ToBytes } from '../internal/binary/bytes'
import { IPV6_HEADER_SIZE } from './ipv6-packet'

export const ND_REDIRECTED_HEADER_KIND = 'nd-redirected-header'

const TYPE_SIZE = 1
const LENGTH_SIZE = 1
const RESERVED_SIZE = 6
const LENGTH_UNIT = 8
export const ND_REDIRECTED_HEADER_PREFIX_SIZE = TYPE_SIZE + LENGTH_SIZE + RESERVED_SIZE

/*
 * RFC 4861 §4.6.3
 *
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |     Type      |    Length     |                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+                               +
 *  |                           Reserved                            |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                                                               |
 *  ~                       IP header + data                        ~
 *  |                                                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *
 *  Length counts the whole option in units of 8 octets.
 */

export class NdRedirectedHeaderOptionHeader extends AbstractHeader {
  readonly type: number = NdOptionType.REDIRECTED_HEADER
  readonly length: number
  readonly #reserved: Uint8Array

  constructor(length: number, reserved: Uint8Array) {
    super()
    this.length = length
    this.#reserved = reserved.slice()
  }

  get reserved(): Uint8Array {
    return this.#reserved.slice()
  }

  protected get title(): string {
    return 'IPv6 Neighbor Discovery Redirected Header Option'
  }

  rawFields(): Uint8Array[] {
    return [uint8ToBytes(this.type), uint8ToBytes(this.length), this.#reserved.slice()]
  }

  protected describeFields(): Array<[string, string | number]> {
    return [
      ['Type', describeDiscriminator(ND_OPTION_TYPE, this.type)],
      ['Length', `${this.length} (${this.length * LENGTH_UNIT} bytes)`],
      ['Reserved', describeBytes(this.#reserved)],
    ]
  }
}

/**
 * Neighbor Discovery option that carries as much of a redirected IP packet
 * as fits. The embedded packet is the option's payload layer.
 */
export class NdRedirectedHeaderOption extends AbstractPacket {
  readonly kind = ND_REDIRECTED_HEADER_KIND
  readonly header: NdRedirectedHeaderOptionHeader
  readonly payload: Packet

  private constructor(header: NdRedirectedHeaderOptionHeader, ipPacket: Packet) {
    super()
    this.header = header
    this.payload = ipPacket
  }

  /**
   * Everything after the fixed prefix is decoded as an IPv6 packet. When that
   * packet holds a malformed layer anywhere, the option still decodes and the
   * embedded chain is quarantined so none of its lengths or checksums are
   * recomputed on a later rebuild.
   */
  static decode(
    raw: Uint8Array,
    context: DecodeContext = getDefaultRegistry(),
  ): NdRedirectedHeaderOption {
    const minimum = ND_REDIRECTED_HEADER_PREFIX_SIZE + IPV6_HEADER_SIZE
    if (raw.length < minimum) {
      throw new MalformedInputError(
        `The raw data length must be at least ${minimum}, got ${raw.length}. data: ${toHexString(raw, ' ')}`,
      )
    }
    const reader = new BinaryReader(raw)
    const type = reader.readUint8()
    if (type !== NdOptionType.REDIRECTED_HEADER) {
      throw new TypeMismatchError(
        `The type must be ${describeDiscriminator(ND_OPTION_TYPE, NdOptionType.REDIRECTED_HEADER)}, got ${describeDiscriminator(ND_OPTION_TYPE, type)}. data: ${toHexString(raw, ' ')}`,
      )
    }
    const length = reader.readUint8()
    if (length * LENGTH_UNIT > raw.length) {
      throw new InconsistentLengthError(
        `The raw data is too short to build this option: ${length * LENGTH_UNIT} bytes are needed, got ${raw.length}. data: ${toHexString(raw, ' ')}`,
      )
    }
    const reserved = reader.readBytes(RESERVED_SIZE)

    const ipPacket = context.decodeNested(
      ETHER_TYPE,
      raw.subarray(ND_REDIRECTED_HEADER_PREFIX_SIZE),
      EtherType.IPV6,
    )
    return new NdRedirectedHeaderOption(
      new NdRedirectedHeaderOptionHeader(length, reserved),
      quarantineMalformed(ipPacket),
    )
  }

  static fromBuilder(builder: NdRedirectedHeaderOptionBuilder): NdRedirectedHeaderOption {
    const fields = builder.snapshot()
    const ipPacketBuilder = builder.getPayloadBuilder()
    if (!ipPacketBuilder) {
      throw new InvalidBuilderStateError('ipPacket is required')
    }
    const reserved = requireBytes('reserved', fields.reserved, RESERVED_SIZE)
    const ipPacket = ipPacketBuilder.build()

    let length = fields.length
    if (builder.corrections.lengthAtBuild) {
      const total = ND_REDIRECTED_HEADER_PREFIX_SIZE + ipPacket.byteLength
      if (total % LENGTH_UNIT !== 0) {
        throw new InconsistentLengthError(
          `The option length ${total} is not a multiple of ${LENGTH_UNIT}. ipPacket: ${toHexString(ipPacket.serialize(), ' ')}`,
        )
      }
      length = total / LENGTH_UNIT
      if (length > 0xff) {
        throw new InconsistentLengthError(
          `The option length ${total} exceeds ${0xff * LENGTH_UNIT} bytes`,
        )
      }
    }

    return new NdRedirectedHeaderOption(
      new NdRedirectedHeaderOptionHeader(requireUnsigned('length', length, 0xff), reserved),
      ipPacket,
    )
  }

  get ipPacket(): Packet {
    return this.payload
  }

  toBuilder(): NdRedirectedHeaderOptionBuilder {
    return new NdRedirectedHeaderOptionBuilder()
      .length(this.header.length)
      .reserved(this.header.reserved)
      .payloadBuilder(this.payload.toBuilder())
  }
}

interface NdRedirectedHeaderBuilderFields {
  readonly length: number
  readonly reserved: Uint8Array | undefined
}

export class NdRedirectedHeaderOptionBuilder
  implements PacketBuilder<NdRedirectedHeaderOption>
{
  readonly kind = ND_REDIRECTED_HEADER_KIND
  readonly malformed = false
  readonly corrections = new CorrectionPolicy(['length'])
  #length = 0
  #reserved: Uint8Array | undefined
  #payloadBuilder: PacketBuilder | undefined

  length(length: number): this {
    this.#length = length
    return this
  }

  /** Exactly 6 bytes. */
  reserved(reserved: Uint8Array): this {
    this.#reserved = reserved.slice()
    return this
  }

  ipPacket(ipPacket: Packet): this {
    this.#payloadBuilder = ipPacket.toBuilder()
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

  snapshot(): NdRedirectedHeaderBuilderFields {
    return { length: this.#length, reserved: this.#reserved }
  }

  build(): NdRedirectedHeaderOption {
    return NdRedirectedHeaderOption.fromBuilder(this)
  }
}

export function registerNdRedirectedHeaderOption(registry: PacketRegistry): void {
  registry.register(
    ND_OPTION_TYPE,
    NdOptionType.REDIRECTED_HEADER,
    NdRedirectedHeaderOption.decode,
  )
}
