import { createPacketRegistry, type PacketRegistry } from './core/registry'
import { registerIpV6Packet } from './layers/ipv6-packet'
import { registerNdRedirectedHeaderOption } from './layers/nd-redirected-header-option'
import { registerUdpPacket } from './layers/udp-packet'

let defaultRegistry: PacketRegistry | undefined

/**
 * Registers every decoder this package ships with.
 */
export function installDefaultDecoders(registry: PacketRegistry): PacketRegistry {
  registerIpV6Packet(registry)
  registerUdpPacket(registry)
  registerNdRedirectedHeaderOption(registry)
  return registry
}

/**
 * Process-wide registry used when a decoder is called without a context.
 * Populated with the built-in decoders on first use.
 */
export function getDefaultRegistry(): PacketRegistry {
  defaultRegistry ??= installDefaultDecoders(createPacketRegistry())
  return defaultRegistry
}
