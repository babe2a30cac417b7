/**
 * Internet checksum (RFC 1071): ones'-complement of the ones'-complement sum
 * of 16-bit words across all chunks, as if they were one buffer. An odd
 * trailing byte is padded with zero.
 */
export function calculateChecksum(chunks: readonly Uint8Array[]): number {
  let sum = 0
  let pending: number | null = null

  for (const chunk of chunks) {
    for (const b of chunk) {
      if (pending === null) {
        pending = b
        continue
      }
      sum += (pending << 8) | b
      pending = null
    }
  }
  if (pending !== null) {
    sum += pending << 8
  }

  while (sum > 0xffff) {
    sum = (sum & 0xffff) + (sum >>> 16)
  }
  return ~sum & 0xffff
}
