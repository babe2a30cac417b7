import { MalformedInputError } from '../../errors'

/**
 * Cursor over a captured buffer. Multi-byte integers are read in network
 * byte order; every byte slice handed out is a copy.
 */
export class BinaryReader {
  #buffer: Uint8Array
  #offset = 0

  constructor(buffer: Uint8Array) {
    this.#buffer = buffer
  }

  get position(): number {
    return this.#offset
  }

  get remaining(): number {
    return this.#buffer.length - this.#offset
  }

  peek(length: number): Uint8Array {
    this.#ensureAvailable(length)
    return this.#buffer.slice(this.#offset, this.#offset + length)
  }

  readUint8(): number {
    this.#ensureAvailable(1)
    const value = this.#buffer[this.#offset]
    if (value === undefined) {
      throw new MalformedInputError('Reader overflow while reading uint8')
    }
    this.#offset += 1
    return value
  }

  readUint16(): number {
    return this.#readView(2).getUint16(0, false)
  }

  readUint32(): number {
    return this.#readView(4).getUint32(0, false)
  }

  readBytes(length: number): Uint8Array {
    if (length < 0) {
      throw new MalformedInputError(`Cannot read negative byte length (${length})`)
    }
    this.#ensureAvailable(length)
    const slice = this.#buffer.slice(this.#offset, this.#offset + length)
    this.#offset += length
    return slice
  }

  skip(length: number): void {
    if (length < 0) {
      throw new MalformedInputError(`Cannot skip negative length (${length})`)
    }
    this.#ensureAvailable(length)
    this.#offset += length
  }

  readRemaining(): Uint8Array {
    const slice = this.#buffer.slice(this.#offset)
    this.#offset = this.#buffer.length
    return slice
  }

  #readView(byteLength: number): DataView {
    this.#ensureAvailable(byteLength)
    const view = new DataView(
      this.#buffer.buffer,
      this.#buffer.byteOffset + this.#offset,
      byteLength,
    )
    this.#offset += byteLength
    return view
  }

  #ensureAvailable(length: number): void {
    if (this.remaining < length) {
      throw new MalformedInputError(
        `Insufficient data: need ${length} byte(s), have ${this.remaining}`,
      )
    }
  }
}
