import type { DiscriminatorContract } from './core/numbers'
import type { Packet } from './core/packet'
import { getDefaultRegistry } from './default-registry'

export {
  containsMalformed,
  disableCorrections,
  quarantineMalformed,
  walkBuilderChain,
} from './core/containment'
export { type Correction, CorrectionPolicy } from './core/corrections'
export {
  describeDiscriminator,
  type DiscriminatorContract,
  ETHER_TYPE,
  EtherType,
  IP_NUMBER,
  IpNumber,
  ND_OPTION_TYPE,
  NdOptionType,
  SSH_MESSAGE_NUMBER,
  SshMessageNumber,
} from './core/numbers'
export {
  AbstractHeader,
  AbstractPacket,
  containsLayer,
  findLayer,
  type Header,
  type Packet,
  type PacketBuilder,
} from './core/packet'
export {
  createPacketRegistry,
  type DecodeContext,
  type DecodeFn,
  PacketRegistry,
  type RegisterOptions,
} from './core/registry'
export { getDefaultRegistry, installDefaultDecoders } from './default-registry'
export {
  type DiagnosticCode,
  type DiagnosticRecord,
  type DiagnosticsSink,
  MemoryDiagnosticsSink,
} from './diagnostics'
export {
  InconsistentLengthError,
  InvalidBuilderStateError,
  MalformedInputError,
  PacketError,
  RegistryConflictError,
  TypeMismatchError,
} from './errors'
export { toHexString } from './internal/binary/bytes'
export {
  formatIpV6Address,
  IPV6_KIND,
  IpV6Header,
  IpV6Packet,
  IpV6PacketBuilder,
} from './layers/ipv6-packet'
export {
  MALFORMED_KIND,
  MalformedPacket,
  MalformedPacketBuilder,
} from './layers/malformed-packet'
export {
  ND_REDIRECTED_HEADER_KIND,
  NdRedirectedHeaderOption,
  NdRedirectedHeaderOptionBuilder,
  NdRedirectedHeaderOptionHeader,
} from './layers/nd-redirected-header-option'
export {
  SSH2_BINARY_PACKET_KIND,
  Ssh2BinaryHeader,
  Ssh2BinaryPacket,
  Ssh2BinaryPacketBuilder,
} from './layers/ssh2-binary-packet'
export {
  calculateUdpChecksum,
  UDP_KIND,
  UdpHeader,
  UdpPacket,
  UdpPacketBuilder,
} from './layers/udp-packet'
export {
  UNKNOWN_KIND,
  UnknownPacket,
  UnknownPacketBuilder,
} from './layers/unknown-packet'
export type { PacketRegistryOptions } from './options'

/**
 * Decodes `raw` as the outermost layer selected by `value` in `contract`,
 * using the default registry.
 */
export function decodePacket(
  contract: DiscriminatorContract,
  raw: Uint8Array,
  value: number,
): Packet {
  return getDefaultRegistry().decode(contract, raw, value)
}
