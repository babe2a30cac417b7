/**
 * Renders bytes as lowercase hex pairs joined by `separator`.
 */
export function toHexString(bytes: Uint8Array, separator = ''): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join(
    separator,
  )
}

export function cloneBytes(bytes: Uint8Array): Uint8Array {
  return bytes.slice()
}

export function uint8ToBytes(value: number): Uint8Array {
  return Uint8Array.of(value & 0xff)
}

export function uint16ToBytes(value: number): Uint8Array {
  const bytes = new Uint8Array(2)
  new DataView(bytes.buffer).setUint16(0, value & 0xffff, false)
  return bytes
}

export function uint32ToBytes(value: number): Uint8Array {
  const bytes = new Uint8Array(4)
  new DataView(bytes.buffer).setUint32(0, value >>> 0, false)
  return bytes
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false
  }
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) {
      return false
    }
  }
  return true
}

/**
 * 32-bit FNV-1a over the buffer.
 */
export function hashBytes(bytes: Uint8Array): number {
  let hash = 0x811c9dc5
  for (const b of bytes) {
    hash ^= b
    hash = Math.imul(hash, 0x01000193)
  }
  return hash >>> 0
}
