import { describe, expect, it } from 'vitest'

import {
  describeDiscriminator,
  ETHER_TYPE,
  EtherType,
  IP_NUMBER,
  IpNumber,
  ND_OPTION_TYPE,
  NdOptionType,
  SSH_MESSAGE_NUMBER,
} from '../src/core/numbers'
import { createPacketRegistry, type DecodeFn } from '../src/core/registry'
import { getDefaultRegistry, installDefaultDecoders } from '../src/default-registry'
import { MemoryDiagnosticsSink } from '../src/diagnostics'
import {
  MalformedInputError,
  RegistryConflictError,
  TypeMismatchError,
} from '../src/errors'
import { MALFORMED_KIND, MalformedPacket } from '../src/layers/malformed-packet'
import { registerUdpPacket, UDP_KIND, UdpPacket } from '../src/layers/udp-packet'
import { UNKNOWN_KIND, UnknownPacket } from '../src/layers/unknown-packet'
import { hex } from './helpers/bytes'

const UDP_DATAGRAM = hex('04 d2 00 35 00 0c 00 00 de ad be ef')

describe('describeDiscriminator', () => {
  it('pads to the contract width and appends known names', () => {
    expect(describeDiscriminator(ETHER_TYPE, EtherType.IPV6)).toBe('0x86dd (IPV6)')
    expect(describeDiscriminator(ND_OPTION_TYPE, NdOptionType.REDIRECTED_HEADER)).toBe(
      '0x04 (REDIRECTED_HEADER)',
    )
    expect(describeDiscriminator(IP_NUMBER, 0xfd)).toBe('0xfd')
  })
})

describe('PacketRegistry', () => {
  it('dispatches to the registered decoder', () => {
    const registry = createPacketRegistry()
    registerUdpPacket(registry)

    const packet = registry.decode(IP_NUMBER, UDP_DATAGRAM, IpNumber.UDP)
    expect(packet.kind).toBe(UDP_KIND)
    expect(packet.payload?.kind).toBe(UNKNOWN_KIND)
    expect(packet.serialize()).toEqual(UDP_DATAGRAM)
  })

  it('keeps contracts apart', () => {
    const registry = createPacketRegistry()
    registerUdpPacket(registry)

    expect(registry.has(IP_NUMBER, 17)).toBe(true)
    expect(registry.has(SSH_MESSAGE_NUMBER, 17)).toBe(false)
    expect(registry.decode(SSH_MESSAGE_NUMBER, UDP_DATAGRAM, 17).kind).toBe(UNKNOWN_KIND)
  })

  it('rejects a second registration for the same pair', () => {
    const registry = createPacketRegistry()
    registerUdpPacket(registry)

    expect(() => registerUdpPacket(registry)).toThrowError(RegistryConflictError)
    expect(() => registerUdpPacket(registry)).toThrowError(
      'A decoder for ip-number 0x11 (UDP) is already registered',
    )
  })

  it('replaces an entry when asked to', () => {
    const registry = createPacketRegistry()
    registerUdpPacket(registry)
    const opaque: DecodeFn = (raw) => UnknownPacket.decode(raw)
    registry.register(IP_NUMBER, IpNumber.UDP, opaque, { replace: true })

    expect(registry.decode(IP_NUMBER, UDP_DATAGRAM, IpNumber.UDP).kind).toBe(UNKNOWN_KIND)
  })

  it('unregisters entries', () => {
    const registry = createPacketRegistry()
    registerUdpPacket(registry)

    expect(registry.unregister(IP_NUMBER, IpNumber.UDP)).toBe(true)
    expect(registry.unregister(IP_NUMBER, IpNumber.UDP)).toBe(false)
    expect(registry.has(IP_NUMBER, IpNumber.UDP)).toBe(false)
  })

  it('lists registered values per contract in ascending order', () => {
    const registry = installDefaultDecoders(createPacketRegistry())
    const opaque: DecodeFn = (raw) => UnknownPacket.decode(raw)
    registry.register(IP_NUMBER, IpNumber.TCP, opaque)

    expect(registry.values(IP_NUMBER)).toEqual([IpNumber.TCP, IpNumber.UDP])
    expect(registry.values(ETHER_TYPE)).toEqual([EtherType.IPV6])
    expect(registry.values(ND_OPTION_TYPE)).toEqual([NdOptionType.REDIRECTED_HEADER])
    expect(registry.values(SSH_MESSAGE_NUMBER)).toEqual([])
  })

  it('falls back to an unknown payload for unregistered values', () => {
    const registry = createPacketRegistry()
    const packet = registry.decode(IP_NUMBER, Uint8Array.of(1, 2, 3), IpNumber.TCP)

    expect(packet).toBeInstanceOf(UnknownPacket)
    expect(packet.header).toBeUndefined()
    expect(packet.payload).toBeUndefined()
    expect(Array.from(packet.serialize())).toEqual([1, 2, 3])
  })

  it('lets validation failures of an outermost layer reach the caller', () => {
    const registry = createPacketRegistry()
    registerUdpPacket(registry)

    expect(() => registry.decode(IP_NUMBER, hex('04 d2 00'), IpNumber.UDP)).toThrowError(
      MalformedInputError,
    )
  })

  it('contains validation failures of a nested layer', () => {
    const registry = createPacketRegistry()
    const failing: DecodeFn = () => {
      throw new TypeMismatchError('not this protocol')
    }
    registry.register(IP_NUMBER, IpNumber.TCP, failing)

    const raw = Uint8Array.of(9, 8, 7)
    const packet = registry.decodeNested(IP_NUMBER, raw, IpNumber.TCP)
    expect(packet.kind).toBe(MALFORMED_KIND)
    expect(packet.malformed).toBe(true)
    expect(packet.byteLength).toBe(3)
    expect(packet.serialize()).toEqual(raw)
  })

  it('keeps the cause on the malformed layer', () => {
    const registry = createPacketRegistry()
    registerUdpPacket(registry)

    const packet = registry.decodeNested(IP_NUMBER, hex('04 d2 00 35 00 20 00 00'), 17)
    expect(packet.toString()).toBe(
      [
        '[Malformed Packet (8 bytes)]',
        '  data: 04 d2 00 35 00 20 00 00',
        '  cause: InconsistentLengthError: The UDP length 32 must be between 8 and 8. data: 04 d2 00 35 00 20 00 00',
      ].join('\n'),
    )
  })

  it('does not contain faults that are not packet errors', () => {
    const registry = createPacketRegistry()
    const broken: DecodeFn = () => {
      throw new RangeError('decoder bug')
    }
    registry.register(IP_NUMBER, IpNumber.TCP, broken)

    expect(() =>
      registry.decodeNested(IP_NUMBER, Uint8Array.of(1), IpNumber.TCP),
    ).toThrowError(RangeError)
  })

  it('keeps an empty nested payload as a malformed layer', () => {
    const registry = createPacketRegistry()
    const packet = registry.decodeNested(IP_NUMBER, new Uint8Array(0), 0xfd)
    expect(packet.malformed).toBe(true)
    expect(packet.byteLength).toBe(0)
  })

  it('passes itself as the context for nested layers', () => {
    const registry = createPacketRegistry()
    registerUdpPacket(registry)
    const wrapper: DecodeFn = (raw, context) =>
      context.decodeNested(IP_NUMBER, raw, IpNumber.UDP)
    registry.register(ETHER_TYPE, 0x88b5, wrapper)

    expect(registry.decode(ETHER_TYPE, UDP_DATAGRAM, 0x88b5)).toBeInstanceOf(UdpPacket)
  })
})

describe('PacketRegistry diagnostics', () => {
  it('records registrations with the configured clock', () => {
    const diagnostics = new MemoryDiagnosticsSink()
    const registry = createPacketRegistry({ diagnostics, clock: () => 42 })
    registerUdpPacket(registry)
    registry.unregister(IP_NUMBER, IpNumber.UDP)

    expect(diagnostics.records).toEqual([
      {
        timestamp: 42,
        level: 'debug',
        code: 'decoder-registered',
        message: 'Registered decoder for ip-number 0x11 (UDP)',
        detail: undefined,
      },
      {
        timestamp: 42,
        level: 'debug',
        code: 'decoder-unregistered',
        message: 'Removed decoder for ip-number 0x11 (UDP)',
        detail: undefined,
      },
    ])
  })

  it('records fallbacks and contained failures', () => {
    const diagnostics = new MemoryDiagnosticsSink()
    const registry = createPacketRegistry({ diagnostics, clock: () => 7 })
    registerUdpPacket(registry)
    diagnostics.clear()

    registry.lookup(IP_NUMBER, IpNumber.TCP)
    const packet = registry.decodeNested(IP_NUMBER, hex('00 01 00 02 00 04 00 00'), 17)

    const [fallback, malformed] = diagnostics.records
    expect(diagnostics.records).toHaveLength(2)
    expect(fallback?.code).toBe('decoder-fallback')
    expect(fallback?.message).toBe(
      'No decoder for ip-number 0x06 (TCP); treating as unknown payload',
    )
    expect(malformed?.level).toBe('warn')
    expect(malformed?.code).toBe('malformed-layer')
    expect(malformed?.timestamp).toBe(7)
    expect(malformed?.message).toBe(
      'Kept 8 undecodable byte(s) for ip-number 0x11 (UDP): The UDP length 4 must be between 8 and 8. data: 00 01 00 02 00 04 00 00',
    )
    expect(malformed?.detail).toMatchObject({
      contract: 'ip-number',
      value: 17,
      data: '00 01 00 02 00 04 00 00',
    })
    expect(packet).toBeInstanceOf(MalformedPacket)
    if (packet instanceof MalformedPacket) {
      expect(packet.cause?.name).toBe('InconsistentLengthError')
    }
  })

  it('hands out a copy of its records', () => {
    const diagnostics = new MemoryDiagnosticsSink()
    const registry = createPacketRegistry({ diagnostics })
    registerUdpPacket(registry)

    const snapshot = diagnostics.records
    diagnostics.clear()
    expect(snapshot).toHaveLength(1)
    expect(diagnostics.records).toHaveLength(0)
  })
})

describe('getDefaultRegistry', () => {
  it('is created once with the built-in decoders', () => {
    const registry = getDefaultRegistry()
    expect(getDefaultRegistry()).toBe(registry)
    expect(registry.has(ETHER_TYPE, EtherType.IPV6)).toBe(true)
    expect(registry.has(IP_NUMBER, IpNumber.UDP)).toBe(true)
    expect(registry.has(ND_OPTION_TYPE, NdOptionType.REDIRECTED_HEADER)).toBe(true)
  })
})
