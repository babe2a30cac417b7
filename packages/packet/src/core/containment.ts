import { UnknownPacketBuilder } from '../layers/unknown-packet'
import type { Packet, PacketBuilder } from './packet'

/**
 * True when `packet` or any layer below it is a malformed-layer sentinel.
 */
export function containsMalformed(packet: Packet): boolean {
  for (
    let current: Packet | undefined = packet;
    current;
    current = current.payload
  ) {
    if (current.malformed) {
      return true
    }
  }
  return false
}

/**
 * Calls `visit` for `builder` and every builder nested below it, outermost
 * first. `visit` receives the builder holding the current one, if any.
 */
export function walkBuilderChain(
  builder: PacketBuilder,
  visit: (builder: PacketBuilder, parent: PacketBuilder | undefined) => void,
): void {
  let parent: PacketBuilder | undefined
  for (
    let current: PacketBuilder | undefined = builder;
    current;
    current = current.getPayloadBuilder()
  ) {
    visit(current, parent)
    parent = current
  }
}

/**
 * Turns off length and checksum correction on every builder in the chain.
 */
export function disableCorrections(builder: PacketBuilder): void {
  walkBuilderChain(builder, (current) => current.corrections.disableAll())
}

/**
 * Rebuilds a decoded chain that holds a malformed-layer sentinel below its
 * root so that nothing in it is ever "fixed": the sentinel becomes an
 * explicit unknown payload with the same bytes and every correction is
 * disabled. The result serializes to the same bytes as `packet`.
 *
 * Chains without a sentinel, and a root that is itself the sentinel, come
 * back unchanged.
 */
export function quarantineMalformed(packet: Packet): Packet {
  if (packet.malformed || !containsMalformed(packet)) {
    return packet
  }
  const root = packet.toBuilder()
  walkBuilderChain(root, (current, parent) => {
    if (current.malformed && parent) {
      parent.payloadBuilder(
        new UnknownPacketBuilder().rawData(current.build().serialize()),
      )
    }
  })
  disableCorrections(root)
  return root.build()
}
