import { CorrectionPolicy } from '../core/corrections'
import { IP_NUMBER, IpNumber } from '../core/numbers'
import {
  AbstractHeader,
  AbstractPacket,
  describeBytes,
  type Packet,
  type PacketBuilder,
  requireBytes,
  requireUnsigned,
} from '../core/packet'
import type { PacketRegistry } from '../core/registry'
import {
  InconsistentLengthError,
  InvalidBuilderStateError,
  MalformedInputError,
} from '../errors'
import { BinaryReader } from '../internal/binary/binary-reader'
import { BinaryWriter } from '../internal/binary/binary-writer'
import { toHexString, uint16ToBytes } from '../internal/binary/bytes'
import { calculateChecksum } from '../internal/binary/checksum'
import { IPV6_ADDRESS_SIZE } from './ipv6-packet'
import { UnknownPacket } from './unknown-packet'

export const UDP_KIND = 'udp'
export const UDP_HEADER_SIZE = 8

export interface UdpHeaderFields {
  readonly srcPort: number
  readonly dstPort: number
  readonly length: number
  readonly checksum: number
}

export class UdpHeader extends AbstractHeader implements UdpHeaderFields {
  readonly srcPort: number
  readonly dstPort: number
  readonly length: number
  readonly checksum: number

  constructor(fields: UdpHeaderFields) {
    super()
    this.srcPort = fields.srcPort
    this.dstPort = fields.dstPort
    this.length = fields.length
    this.checksum = fields.checksum
  }

  static decode(raw: Uint8Array): UdpHeader {
    if (raw.length < UDP_HEADER_SIZE) {
      throw new MalformedInputError(
        `The data is too short to build a UDP header (${UDP_HEADER_SIZE} bytes). data: ${toHexString(raw, ' ')}`,
      )
    }
    const reader = new BinaryReader(raw)
    return new UdpHeader({
      srcPort: reader.readUint16(),
      dstPort: reader.readUint16(),
      length: reader.readUint16(),
      checksum: reader.readUint16(),
    })
  }

  protected get title(): string {
    return 'UDP Header'
  }

  rawFields(): Uint8Array[] {
    return [
      uint16ToBytes(this.srcPort),
      uint16ToBytes(this.dstPort),
      uint16ToBytes(this.length),
      uint16ToBytes(this.checksum),
    ]
  }

  protected describeFields(): Array<[string, string | number]> {
    return [
      ['Source port', this.srcPort],
      ['Destination port', this.dstPort],
      ['Length', `${this.length} [bytes]`],
      ['Checksum', `0x${this.checksum.toString(16).padStart(4, '0')}`],
    ]
  }
}

export class UdpPacket extends AbstractPacket {
  readonly kind = UDP_KIND
  readonly header: UdpHeader
  readonly payload: Packet | undefined
  readonly #trailer: Uint8Array

  private constructor(
    header: UdpHeader,
    payload: Packet | undefined,
    trailer: Uint8Array,
  ) {
    super()
    this.header = header
    this.payload = payload
    this.#trailer = trailer.slice()
  }

  /**
   * The payload runs to the end of the datagram as declared by the length
   * field and is kept opaque. Bytes past that end are kept as the trailer.
   */
  static decode(raw: Uint8Array): UdpPacket {
    const header = UdpHeader.decode(raw)
    if (header.length < UDP_HEADER_SIZE || header.length > raw.length) {
      throw new InconsistentLengthError(
        `The UDP length ${header.length} must be between ${UDP_HEADER_SIZE} and ${raw.length}. data: ${toHexString(raw, ' ')}`,
      )
    }
    const payload =
      header.length === UDP_HEADER_SIZE
        ? undefined
        : UnknownPacket.decode(raw.subarray(UDP_HEADER_SIZE, header.length))
    return new UdpPacket(header, payload, raw.subarray(header.length))
  }

  static fromBuilder(builder: UdpPacketBuilder): UdpPacket {
    const fields = builder.snapshot()
    const payload = builder.getPayloadBuilder()?.build()
    const { corrections } = builder

    let length = fields.length
    if (corrections.lengthAtBuild) {
      length = UDP_HEADER_SIZE + (payload?.byteLength ?? 0)
      if (length > 0xffff) {
        throw new InconsistentLengthError(
          `A UDP datagram of ${length} bytes does not fit the 16-bit length field`,
        )
      }
    }

    const headerFields: UdpHeaderFields = {
      srcPort: requireUnsigned('srcPort', fields.srcPort, 0xffff),
      dstPort: requireUnsigned('dstPort', fields.dstPort, 0xffff),
      length: requireUnsigned('length', length, 0xffff),
      checksum: requireUnsigned('checksum', fields.checksum, 0xffff),
    }
    if (!corrections.checksumAtBuild) {
      return new UdpPacket(new UdpHeader(headerFields), payload, fields.trailer)
    }

    if (fields.srcAddr === undefined || fields.dstAddr === undefined) {
      throw new InvalidBuilderStateError(
        'srcAddr and dstAddr are required to correct the UDP checksum',
      )
    }
    const checksum = calculateUdpChecksum(
      requireBytes('srcAddr', fields.srcAddr, IPV6_ADDRESS_SIZE),
      requireBytes('dstAddr', fields.dstAddr, IPV6_ADDRESS_SIZE),
      new UdpHeader({ ...headerFields, checksum: 0 }),
      payload,
    )
    return new UdpPacket(
      new UdpHeader({ ...headerFields, checksum }),
      payload,
      fields.trailer,
    )
  }

  /** Bytes after the datagram end. Not covered by the length or the checksum. */
  get trailer(): Uint8Array {
    return this.#trailer.slice()
  }

  toBuilder(): UdpPacketBuilder {
    const { header } = this
    return new UdpPacketBuilder()
      .srcPort(header.srcPort)
      .dstPort(header.dstPort)
      .length(header.length)
      .checksum(header.checksum)
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

/**
 * Checksum over the IPv6 pseudo-header (RFC 8200 §8.1), the UDP header with
 * a zero checksum field, and the payload. Zero goes on the wire as 0xffff.
 */
export function calculateUdpChecksum(
  srcAddr: Uint8Array,
  dstAddr: Uint8Array,
  header: UdpHeader,
  payload: Packet | undefined,
): number {
  const pseudoHeader = new BinaryWriter()
  pseudoHeader.writeBytes(srcAddr)
  pseudoHeader.writeBytes(dstAddr)
  pseudoHeader.writeUint32(header.length)
  pseudoHeader.writeUint32(IpNumber.UDP)
  const chunks = [pseudoHeader.toUint8Array(), ...header.rawFields()]
  if (payload) {
    chunks.push(payload.serialize())
  }
  return calculateChecksum(chunks) || 0xffff
}

type UdpBuilderFields = UdpHeaderFields & {
  readonly srcAddr: Uint8Array | undefined
  readonly dstAddr: Uint8Array | undefined
  readonly trailer: Uint8Array
}

export class UdpPacketBuilder implements PacketBuilder<UdpPacket> {
  readonly kind = UDP_KIND
  readonly malformed = false
  readonly corrections = new CorrectionPolicy(['length', 'checksum'])
  #srcPort = 0
  #dstPort = 0
  #length = 0
  #checksum = 0
  #srcAddr: Uint8Array | undefined
  #dstAddr: Uint8Array | undefined
  #trailer: Uint8Array = new Uint8Array(0)
  #payloadBuilder: PacketBuilder | undefined

  srcPort(srcPort: number): this {
    this.#srcPort = srcPort
    return this
  }

  dstPort(dstPort: number): this {
    this.#dstPort = dstPort
    return this
  }

  length(length: number): this {
    this.#length = length
    return this
  }

  checksum(checksum: number): this {
    this.#checksum = checksum
    return this
  }

  /** Pseudo-header source address, only read when correcting the checksum. */
  srcAddr(srcAddr: Uint8Array): this {
    this.#srcAddr = srcAddr.slice()
    return this
  }

  /** Pseudo-header destination address, only read when correcting the checksum. */
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

  correctChecksumAtBuild(enabled: boolean): this {
    this.corrections.set('checksum', enabled)
    return this
  }

  getPayloadBuilder(): PacketBuilder | undefined {
    return this.#payloadBuilder
  }

  payloadBuilder(builder: PacketBuilder | undefined): this {
    this.#payloadBuilder = builder
    return this
  }

  snapshot(): UdpBuilderFields {
    return {
      srcPort: this.#srcPort,
      dstPort: this.#dstPort,
      length: this.#length,
      checksum: this.#checksum,
      srcAddr: this.#srcAddr,
      dstAddr: this.#dstAddr,
      trailer: this.#trailer,
    }
  }

  build(): UdpPacket {
    return UdpPacket.fromBuilder(this)
  }
}

export function registerUdpPacket(registry: PacketRegistry): void {
  registry.register(IP_NUMBER, IpNumber.UDP, UdpPacket.decode)
}
