import { describe, expect, it } from 'vitest'

import {
  bytesEqual,
  hashBytes,
  toHexString,
  uint16ToBytes,
  uint32ToBytes,
} from '../src/internal/binary/bytes'
import { calculateChecksum } from '../src/internal/binary/checksum'
import { hex } from './helpers/bytes'

describe('byte helpers', () => {
  it('renders lowercase hex with an optional separator', () => {
    expect(toHexString(Uint8Array.of(0x0a, 0xff, 0x00))).toBe('0aff00')
    expect(toHexString(Uint8Array.of(0x0a, 0xff, 0x00), ' ')).toBe('0a ff 00')
    expect(toHexString(new Uint8Array(0), ' ')).toBe('')
  })

  it('encodes integers big-endian', () => {
    expect(Array.from(uint16ToBytes(0x86dd))).toEqual([0x86, 0xdd])
    expect(Array.from(uint32ToBytes(0x80000001))).toEqual([0x80, 0x00, 0x00, 0x01])
  })

  it('compares buffers by content', () => {
    expect(bytesEqual(Uint8Array.of(1, 2), Uint8Array.of(1, 2))).toBe(true)
    expect(bytesEqual(Uint8Array.of(1, 2), Uint8Array.of(1, 3))).toBe(false)
    expect(bytesEqual(Uint8Array.of(1), Uint8Array.of(1, 0))).toBe(false)
  })

  it('hashes with 32-bit FNV-1a', () => {
    expect(hashBytes(new Uint8Array(0))).toBe(0x811c9dc5)
    expect(hashBytes(Uint8Array.of(0x61))).toBe(0xe40c292c)
  })
})

describe('calculateChecksum', () => {
  it('matches the RFC 1071 worked sum', () => {
    expect(calculateChecksum([hex('00 01 f2 03 f4 f5 f6 f7')])).toBe(0x220d)
  })

  it('treats chunks as one contiguous buffer', () => {
    expect(calculateChecksum([hex('00 01 f2'), hex('03 f4 f5 f6 f7')])).toBe(0x220d)
  })

  it('pads an odd trailing byte with zero', () => {
    expect(calculateChecksum([Uint8Array.of(0x01)])).toBe(0xfeff)
  })

  it('returns 0xffff for no data', () => {
    expect(calculateChecksum([])).toBe(0xffff)
  })
})
