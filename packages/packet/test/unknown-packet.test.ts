import { describe, expect, it } from 'vitest'

import { InvalidBuilderStateError, MalformedInputError } from '../src/errors'
import {
  MalformedPacket,
  MalformedPacketBuilder,
} from '../src/layers/malformed-packet'
import { UnknownPacket, UnknownPacketBuilder } from '../src/layers/unknown-packet'

describe('UnknownPacket', () => {
  it('keeps its bytes opaque', () => {
    const packet = UnknownPacket.decode(Uint8Array.of(1, 2, 3))
    expect(packet.byteLength).toBe(3)
    expect(packet.malformed).toBe(false)
    expect(packet.toString()).toBe('[Unknown Packet (3 bytes)]\n  data: 01 02 03')
  })

  it('needs at least one byte', () => {
    expect(() => UnknownPacket.decode(new Uint8Array(0))).toThrowError(
      MalformedInputError,
    )
  })

  it('never aliases the caller buffer', () => {
    const raw = Uint8Array.of(1, 2, 3)
    const packet = UnknownPacket.decode(raw)
    raw[0] = 0xff
    packet.rawData[1] = 0xff
    packet.serialize()[2] = 0xff
    expect(Array.from(packet.serialize())).toEqual([1, 2, 3])
  })

  it('rebuilds an equal packet', () => {
    const packet = UnknownPacket.decode(Uint8Array.of(4, 5))
    const rebuilt = packet.toBuilder().build()
    expect(rebuilt.equals(packet)).toBe(true)
    expect(rebuilt.hashCode()).toBe(packet.hashCode())
    expect(rebuilt).not.toBe(packet)
  })

  it('cannot carry a nested layer', () => {
    const builder = new UnknownPacketBuilder().rawData(Uint8Array.of(1))
    expect(builder.getPayloadBuilder()).toBeUndefined()
    expect(() => builder.payloadBuilder(new UnknownPacketBuilder())).toThrowError(
      InvalidBuilderStateError,
    )
    expect(() => builder.payloadBuilder(undefined)).not.toThrow()
  })
})

describe('MalformedPacket', () => {
  it('flags itself and keeps the bytes and the cause', () => {
    const cause = new MalformedInputError('bad')
    const packet = new MalformedPacket(Uint8Array.of(0x0a, 0x0b), cause)
    expect(packet.malformed).toBe(true)
    expect(packet.cause).toBe(cause)
    expect(Array.from(packet.rawData)).toEqual([0x0a, 0x0b])
    expect(packet.toString()).toBe(
      '[Malformed Packet (2 bytes)]\n  data: 0a 0b\n  cause: MalformedInputError: bad',
    )
  })

  it('rebuilds through a builder that is also flagged', () => {
    const packet = new MalformedPacket(Uint8Array.of(1, 2))
    const builder = packet.toBuilder()
    expect(builder).toBeInstanceOf(MalformedPacketBuilder)
    expect(builder.malformed).toBe(true)
    expect(builder.build().equals(packet)).toBe(true)
    expect(packet.toString()).toBe('[Malformed Packet (2 bytes)]\n  data: 01 02')
  })
})
