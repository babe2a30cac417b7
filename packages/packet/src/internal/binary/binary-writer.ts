/**
 * Accumulates wire fields and payload bytes for serialization.
 */
export class BinaryWriter {
  #chunks: Uint8Array[] = []
  #length = 0

  get length(): number {
    return this.#length
  }

  writeUint32(value: number): void {
    const view = new DataView(new ArrayBuffer(4))
    view.setUint32(0, value >>> 0, false)
    this.#chunks.push(new Uint8Array(view.buffer))
    this.#length += 4
  }

  writeBytes(bytes: Uint8Array): void {
    if (bytes.length === 0) {
      return
    }
    this.#chunks.push(bytes)
    this.#length += bytes.length
  }

  toUint8Array(): Uint8Array {
    const result = new Uint8Array(this.#length)
    let offset = 0
    for (const chunk of this.#chunks) {
      result.set(chunk, offset)
      offset += chunk.length
    }
    return result
  }
}
