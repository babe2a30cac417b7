import { CorrectionPolicy } from '../core/corrections'
import {
  describeDiscriminator,
  ETHER_TYPE,
  EtherType,
  IP_NUMBER,
  IpNumber,
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
  MalformedInputError,
  TypeMismatchError,
} from '../errors'
import { BinaryReader } from '../internal/binary/binary-reader'
import {
  toHexString,
  uint16ToBytes,
  uint32ToBytes,
  uint8ToBytes,
} from '../internal/binary/bytes'

export const IPV6_KIND = 'ipv6'
export const IPV6_HEADER_SIZE = 40
export const IPV6_ADDRESS_SIZE = 16
export const IPV6_VERSION = 6

/*
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |Version| Traffic Class |           Flow Label                  |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |         Payload Length        |  Next Header  |   Hop Limit   |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                  Source Address (16 octets)                   |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |               Destination Address (16 octets)                 |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 */

export interface IpV6HeaderFields {
  readonly version: number
  readonly trafficClass: number
  readonly flowLabel: number
  readonly payloadLength: number
  readonly nextHeader: number
  readonly hopLimit: number
  readonly srcAddr: Uint8Array
  readonly dstAddr: Uint8Array
}

export class IpV6Header extends AbstractHeader {
  readonly version: number
  readonly trafficClass: number
  readonly flowLabel: number
  readonly payloadLength: number
  readonly nextHeader: number
  readonly hopLimit: number
  readonly #srcAddr: Uint8Array
  readonly #dstAddr: Uint8Array

  constructor(fields: IpV6HeaderFields) {
    super()
    this.version = fields.version
    this.trafficClass = fields.trafficClass
    this.flowLabel = fields.flowLabel
    this.payloadLength = fields.payloadLength
    this.nextHeader = fields.nextHeader
    this.hopLimit = fields.hopLimit
    this.#srcAddr = fields.srcAddr.slice()
    this.#dstAddr = fields.dstAddr.slice()
  }

  static decode(raw: Uint8Array): IpV6Header {
    if (raw.length < IPV6_HEADER_SIZE) {
      throw new MalformedInputError(
        `The data is too short to build an IPv6 header (${IPV6_HEADER_SIZE} bytes). data: ${toHexString(raw, ' ')}`,
      )
    }
    const reader = new BinaryReader(raw)
    const first = reader.readUint32()
    const version = first >>> 28
    if (version !== IPV6_VERSION) {
      throw new TypeMismatchError(
        `The version must be ${IPV6_VERSION}, got ${version}. data: ${toHexString(raw, ' ')}`,
      )
    }
    return new IpV6Header({
      version,
      trafficClass: (first >>> 20) & 0xff,
      flowLabel: first & 0xfffff,
      payloadLength: reader.readUint16(),
      nextHeader: reader.readUint8(),
      hopLimit: reader.readUint8(),
      srcAddr: reader.readBytes(IPV6_ADDRESS_SIZE),
      dstAddr: reader.readBytes(IPV6_ADDRESS_SIZE),
    })
  }

  get srcAddr(): Uint8Array {
    return this.#srcAddr.slice()
  }

  get dstAddr(): Uint8Array {
    return this.#dstAddr.slice()
  }

  protected get title(): string {
    return 'IPv6 Header'
  }

  rawFields(): Uint8Array[] {
    const first =
      ((this.version & 0x0f) << 28) |
      ((this.trafficClass & 0xff) << 20) |
      (this.flowLabel & 0xfffff)
    return [
      uint32ToBytes(first),
      uint16ToBytes(this.payloadLength),
      uint8ToBytes(this.nextHeader),
      uint8ToBytes(this.hopLimit),
      this.#srcAddr.slice(),
      this.#dstAddr.slice(),
    ]
  }

  protected describeFields(): Array<[string, string | number]> {
    return [
      ['Version', this.version],
      ['Traffic Class', `0x${this.trafficClass.toString(16).padStart(2, '0')}`],
      ['Flow Label', `0x${this.flowLabel.toString(16).padStart(5, '0')}`],
      ['Payload length', `${this.payloadLength} [bytes]`],
      ['Next Header', describeDiscriminator(IP_NUMBER, this.nextHeader)],
      ['Hop Limit', this.hopLimit],
      ['Source address', formatIpV6Address(this.#srcAddr)],
      ['Destination address', formatIpV6Address(this.#dstAddr)],
    ]
  }
}

export class IpV6Packet extends AbstractPacket {
  readonly kind = IPV6_KIND
  readonly header: IpV6Header
  readonly payload: Packet | undefined
  readonly #trailer: Uint8Array

  private constructor(
    header: IpV6Header,
    payload: Packet | undefined,
    trailer: Uint8Array,
  ) {
    super()
    this.header = header
    this.payload = payload
    this.#trailer = trailer.slice()
  }

  /**
   * Decodes a fixed IPv6 header and the layer it carries, selected by the
   * next-header field. A payload length of zero means no payload. Bytes past
   * the declared payload are kept as the trailer.
   */
  static decode(
    raw: Uint8Array,
    context: DecodeContext = getDefaultRegistry(),
  ): IpV6Packet {
    const header = IpV6Header.decode(raw)
    const available = raw.length - IPV6_HEADER_SIZE
    if (header.payloadLength > available) {
      throw new InconsistentLengthError(
        `The payload length ${header.payloadLength} exceeds the ${available} byte(s) after the IPv6 header. data: ${toHexString(raw, ' ')}`,
      )
    }
    const end = IPV6_HEADER_SIZE + header.payloadLength
    const payload =
      header.payloadLength === 0
        ? undefined
        : context.decodeNested(
            IP_NUMBER,
            raw.subarray(IPV6_HEADER_SIZE, end),
            header.nextHeader,
          )
    return new IpV6Packet(header, payload, raw.subarray(end))
  }

  static fromBuilder(builder: IpV6PacketBuilder): IpV6Packet {
    const fields = builder.snapshot()
    const payload = builder.getPayloadBuilder()?.build()

    let payloadLength = fields.payloadLength
    if (builder.corrections.lengthAtBuild) {
      payloadLength = payload?.byteLength ?? 0
      if (payloadLength > 0xffff) {
        throw new InconsistentLengthError(
          `An IPv6 payload of ${payloadLength} bytes does not fit the 16-bit payload length field`,
        )
      }
    }

    const header = new IpV6Header({
      version: requireUnsigned('version', fields.version, 0x0f),
      trafficClass: requireUnsigned('trafficClass', fields.trafficClass, 0xff),
      flowLabel: requireUnsigned('flowLabel', fields.flowLabel, 0xfffff),
      payloadLength: requireUnsigned('payloadLength', payloadLength, 0xffff),
      nextHeader: requireUnsigned('nextHeader', fields.nextHeader, 0xff),
      hopLimit: requireUnsigned('hopLimit', fields.hopLimit, 0xff),
      srcAddr: requireBytes('srcAddr', fields.srcAddr, IPV6_ADDRESS_SIZE),
      dstAddr: requireBytes('dstAddr', fields.dstAddr, IPV6_ADDRESS_SIZE),
    })
    return new IpV6Packet(header, payload, fields.trailer)
  }

  /** Bytes after the declared payload. Not counted by the payload length. */
  get trailer(): Uint8Array {
    return this.#trailer.slice()
  }

  toBuilder(): IpV6PacketBuilder {
    const { header } = this
    return new IpV6PacketBuilder()
      .version(header.version)
      .trafficClass(header.trafficClass)
      .flowLabel(header.flowLabel)
      .payloadLength(header.payloadLength)
      .nextHeader(header.nextHeader)
      .hopLimit(header.hopLimit)
      .srcAddr(header.srcAddr)
      .dstAddr(header.dstAddr)
      .trailer(this.#trailer)
      .payloadBuilder(this.payload?.toBuilder())
  }

  protected override trailingFields(): Uint8Array[] {
    return [this.#trailer.slice()]
  }

  protected override describeTrailer(): string | undefined {
    return this.#trailer.length === 0
      ? undefined
      : `  Trailer: ${describeBytes(this.#trailer)}`
  }
}

type IpV6BuilderFields = Omit<IpV6HeaderFields, 'srcAddr' | 'dstAddr'> & {
  readonly srcAddr: Uint8Array | undefined
  readonly dstAddr: Uint8Array | undefined
  readonly trailer: Uint8Array
}

export class IpV6PacketBuilder implements PacketBuilder<IpV6Packet> {
  readonly kind = IPV6_KIND
  readonly malformed = false
  readonly corrections = new CorrectionPolicy(['length'])
  #version = IPV6_VERSION
  #trafficClass = 0
  #flowLabel = 0
  #payloadLength = 0
  #nextHeader: number = IpNumber.IPV6_NONXT
  #hopLimit = 64
  #srcAddr: Uint8Array | undefined
  #dstAddr: Uint8Array | undefined
  #trailer: Uint8Array = new Uint8Array(0)
  #payloadBuilder: PacketBuilder | undefined

  version(version: number): this {
    this.#version = version
    return this
  }

  trafficClass(trafficClass: number): this {
    this.#trafficClass = trafficClass
    return this
  }

  flowLabel(flowLabel: number): this {
    this.#flowLabel = flowLabel
    return this
  }

  payloadLength(payloadLength: number): this {
    this.#payloadLength = payloadLength
    return this
  }

  nextHeader(nextHeader: number): this {
    this.#nextHeader = nextHeader
    return this
  }

  hopLimit(hopLimit: number): this {
    this.#hopLimit = hopLimit
    return this
  }

  srcAddr(srcAddr: Uint8Array): this {
    this.#srcAddr = srcAddr.slice()
    return this
  }

  dstAddr(dstAddr: Uint8Array): this {
    this.#dstAddr = dstAddr.slice()
    return this
  }

  trailer(trailer: Uint8Array): this {
    this.#trailer = trailer.slice()
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

  snapshot(): IpV6BuilderFields {
    return {
      version: this.#version,
      trafficClass: this.#trafficClass,
      flowLabel: this.#flowLabel,
      payloadLength: this.#payloadLength,
      nextHeader: this.#nextHeader,
      hopLimit: this.#hopLimit,
      srcAddr: this.#srcAddr,
      dstAddr: this.#dstAddr,
      trailer: this.#trailer,
    }
  }

  build(): IpV6Packet {
    return IpV6Packet.fromBuilder(this)
  }
}

/**
 * Full (uncompressed) colon-hex form, e.g. `fe80:0:0:0:0:0:0:1`.
 */
export function formatIpV6Address(address: Uint8Array): string {
  const groups: string[] = []
  for (let i = 0; i + 1 < address.length; i += 2) {
    groups.push((((address[i] ?? 0) << 8) | (address[i + 1] ?? 0)).toString(16))
  }
  return groups.join(':')
}

export function registerIpV6Packet(registry: PacketRegistry): void {
  registry.register(ETHER_TYPE, EtherType.IPV6, IpV6Packet.decode)
}
