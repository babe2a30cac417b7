import type { DiagnosticRecord } from '../diagnostics'
import { PacketError, RegistryConflictError } from '../errors'
import { toHexString } from '../internal/binary/bytes'
import { MalformedPacket } from '../layers/malformed-packet'
import { UnknownPacket } from '../layers/unknown-packet'
import {
  type PacketRegistryOptions,
  type ResolvedRegistryOptions,
  resolveRegistryOptions,
} from '../options'
import { type DiscriminatorContract, describeDiscriminator } from './numbers'
import type { Packet } from './packet'

/**
 * What a decoder needs from its caller: a way to decode the layer nested
 * inside it without knowing which protocol that is.
 */
export interface DecodeContext {
  decodeNested(
    contract: DiscriminatorContract,
    raw: Uint8Array,
    value: number,
  ): Packet
}

export type DecodeFn<P extends Packet = Packet> = (
  raw: Uint8Array,
  context: DecodeContext,
) => P

export interface RegisterOptions {
  /** Replace an existing entry instead of failing. */
  readonly replace?: boolean
}

const decodeUnknown: DecodeFn = (raw) => UnknownPacket.decode(raw)

function entryKey(contract: DiscriminatorContract, value: number): string {
  return `${contract.id}:${value}`
}

/**
 * Maps (contract, discriminator) pairs to decoders.
 *
 * The table is never edited in place: each registration publishes a new
 * immutable map, so a lookup sees either the table before or after a
 * registration and never a partial one.
 */
export class PacketRegistry implements DecodeContext {
  #entries: ReadonlyMap<string, DecodeFn> = new Map()
  readonly #config: ResolvedRegistryOptions

  constructor(options: PacketRegistryOptions = {}) {
    this.#config = resolveRegistryOptions(options)
  }

  register(
    contract: DiscriminatorContract,
    value: number,
    decode: DecodeFn,
    options: RegisterOptions = {},
  ): void {
    const key = entryKey(contract, value)
    if (this.#entries.has(key) && !options.replace) {
      throw new RegistryConflictError(
        `A decoder for ${contract.id} ${describeDiscriminator(contract, value)} is already registered`,
      )
    }
    const next = new Map(this.#entries)
    next.set(key, decode)
    this.#entries = next
    this.#record(
      'debug',
      'decoder-registered',
      `Registered decoder for ${contract.id} ${describeDiscriminator(contract, value)}`,
    )
  }

  unregister(contract: DiscriminatorContract, value: number): boolean {
    const key = entryKey(contract, value)
    if (!this.#entries.has(key)) {
      return false
    }
    const next = new Map(this.#entries)
    next.delete(key)
    this.#entries = next
    this.#record(
      'debug',
      'decoder-unregistered',
      `Removed decoder for ${contract.id} ${describeDiscriminator(contract, value)}`,
    )
    return true
  }

  has(contract: DiscriminatorContract, value: number): boolean {
    return this.#entries.has(entryKey(contract, value))
  }

  /**
   * Discriminator values registered under `contract`, in ascending order.
   */
  values(contract: DiscriminatorContract): number[] {
    const prefix = `${contract.id}:`
    const values: number[] = []
    for (const key of this.#entries.keys()) {
      if (key.startsWith(prefix)) {
        values.push(Number(key.slice(prefix.length)))
      }
    }
    return values.sort((a, b) => a - b)
  }

  /**
   * Never fails: falls back to the opaque unknown-payload decoder.
   */
  lookup(contract: DiscriminatorContract, value: number): DecodeFn {
    const decode = this.#entries.get(entryKey(contract, value))
    if (decode) {
      return decode
    }
    this.#record(
      'debug',
      'decoder-fallback',
      `No decoder for ${contract.id} ${describeDiscriminator(contract, value)}; treating as unknown payload`,
    )
    return decodeUnknown
  }

  /**
   * Decodes an outermost layer. Validation failures reach the caller.
   */
  decode(contract: DiscriminatorContract, raw: Uint8Array, value: number): Packet {
    return this.lookup(contract, value)(raw, this)
  }

  /**
   * Decodes a layer nested inside another. A validation failure does not
   * escape: the bytes are kept as a {@link MalformedPacket} instead.
   */
  decodeNested(
    contract: DiscriminatorContract,
    raw: Uint8Array,
    value: number,
  ): Packet {
    const decode = this.lookup(contract, value)
    try {
      return decode(raw, this)
    } catch (error) {
      if (!(error instanceof PacketError)) {
        throw error
      }
      this.#record(
        'warn',
        'malformed-layer',
        `Kept ${raw.length} undecodable byte(s) for ${contract.id} ${describeDiscriminator(contract, value)}: ${error.message}`,
        { contract: contract.id, value, data: toHexString(raw, ' '), error },
      )
      return new MalformedPacket(raw, error)
    }
  }

  #record(
    level: DiagnosticRecord['level'],
    code: DiagnosticRecord['code'],
    message: string,
    detail?: unknown,
  ): void {
    if (!this.#config.diagnostics) {
      return
    }
    this.#config.diagnostics.onRecord({
      timestamp: this.#config.clock(),
      level,
      code,
      message,
      detail,
    })
  }
}

export function createPacketRegistry(
  options: PacketRegistryOptions = {},
): PacketRegistry {
  return new PacketRegistry(options)
}
