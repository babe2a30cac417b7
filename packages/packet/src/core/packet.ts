import { InvalidBuilderStateError } from '../errors'
import { BinaryWriter } from '../internal/binary/binary-writer'
import { bytesEqual, hashBytes, toHexString } from '../internal/binary/bytes'
import type { CorrectionPolicy } from './corrections'

/**
 * Fixed-layout prefix of a layer. The shape never depends on the data, only
 * the field values do.
 */
export interface Header {
  readonly byteLength: number
  /** Wire fields in order. Each call returns fresh copies. */
  rawFields(): Uint8Array[]
  toString(): string
}

/**
 * One decoded protocol layer: a header, at most one nested payload layer and,
 * for some protocols, trailing fields after the payload.
 */
export interface Packet {
  readonly kind: string
  readonly header: Header | undefined
  readonly payload: Packet | undefined
  readonly byteLength: number
  /** Set on layers whose bytes could not be decoded and must not be corrected. */
  readonly malformed: boolean
  serialize(): Uint8Array
  toBuilder(): PacketBuilder
  equals(other: Packet): boolean
  hashCode(): number
  toString(): string
}

/**
 * Mutable staging object for one layer. Builders form a chain through their
 * payload builder slot, mirroring the payload chain of the built packet.
 */
export interface PacketBuilder<P extends Packet = Packet> {
  readonly kind: string
  readonly malformed: boolean
  readonly corrections: CorrectionPolicy
  getPayloadBuilder(): PacketBuilder | undefined
  payloadBuilder(builder: PacketBuilder | undefined): this
  build(): P
}

export abstract class AbstractHeader implements Header {
  #byteLength: number | undefined

  get byteLength(): number {
    if (this.#byteLength === undefined) {
      let length = 0
      for (const field of this.rawFields()) {
        length += field.length
      }
      this.#byteLength = length
    }
    return this.#byteLength
  }

  abstract rawFields(): Uint8Array[]

  protected abstract describeFields(): Array<[string, string | number]>

  protected abstract get title(): string

  toString(): string {
    const lines = [`[${this.title} (${this.byteLength} bytes)]`]
    for (const [name, value] of this.describeFields()) {
      lines.push(`  ${name}: ${value}`)
    }
    return lines.join('\n')
  }
}

/**
 * Shared serialization, equality and rendering for layers. Subclasses supply
 * the header, the payload and any trailing fields.
 */
export abstract class AbstractPacket implements Packet {
  #raw: Uint8Array | undefined

  abstract readonly kind: string
  abstract readonly header: Header | undefined
  abstract readonly payload: Packet | undefined

  get malformed(): boolean {
    return false
  }

  get byteLength(): number {
    let length = this.header?.byteLength ?? 0
    length += this.payload?.byteLength ?? 0
    for (const field of this.trailingFields()) {
      length += field.length
    }
    return length
  }

  serialize(): Uint8Array {
    if (this.#raw === undefined) {
      const writer = new BinaryWriter()
      for (const field of this.header?.rawFields() ?? []) {
        writer.writeBytes(field)
      }
      if (this.payload) {
        writer.writeBytes(this.payload.serialize())
      }
      for (const field of this.trailingFields()) {
        writer.writeBytes(field)
      }
      this.#raw = writer.toUint8Array()
    }
    return this.#raw.slice()
  }

  equals(other: Packet): boolean {
    if (other === this) {
      return true
    }
    return bytesEqual(this.serialize(), other.serialize())
  }

  hashCode(): number {
    return hashBytes(this.serialize())
  }

  toString(): string {
    const parts: string[] = []
    if (this.header) {
      parts.push(this.header.toString())
    }
    const trailer = this.describeTrailer()
    if (trailer) {
      parts.push(trailer)
    }
    if (this.payload) {
      parts.push(this.payload.toString())
    }
    return parts.join('\n')
  }

  abstract toBuilder(): PacketBuilder

  /** Fields serialized after the payload. Copies, like `rawFields()`. */
  protected trailingFields(): Uint8Array[] {
    return []
  }

  protected describeTrailer(): string | undefined {
    return undefined
  }
}

/**
 * Finds the first layer of `kind` in the payload chain starting at `packet`.
 */
export function findLayer(packet: Packet, kind: string): Packet | undefined {
  for (
    let current: Packet | undefined = packet;
    current;
    current = current.payload
  ) {
    if (current.kind === kind) {
      return current
    }
  }
  return undefined
}

export function containsLayer(packet: Packet, kind: string): boolean {
  return findLayer(packet, kind) !== undefined
}

export function describeBytes(bytes: Uint8Array): string {
  return bytes.length === 0 ? '(none)' : toHexString(bytes, ' ')
}

/**
 * Validates a builder's numeric field before it is written to the wire.
 */
export function requireUnsigned(field: string, value: number, max: number): number {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidBuilderStateError(
      `${field} must be an integer between 0 and ${max}, got ${value}`,
    )
  }
  return value
}

export function requireBytes(
  field: string,
  value: Uint8Array | undefined,
  length?: number,
): Uint8Array {
  if (value === undefined) {
    throw new InvalidBuilderStateError(`${field} is required`)
  }
  if (length !== undefined && value.length !== length) {
    throw new InvalidBuilderStateError(
      `${field} must be ${length} bytes, got ${value.length}: ${describeBytes(value)}`,
    )
  }
  return value.slice()
}
