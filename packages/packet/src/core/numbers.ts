/**
 * A numbering space used to pick the decoder for the next layer, e.g. the
 * EtherType carried by a link header or the next-header byte of IPv6.
 */
export interface DiscriminatorContract {
  readonly id: string
  readonly bits: 8 | 16
  readonly names: Readonly<Record<string, number>>
}

export const EtherType = {
  IPV4: 0x0800,
  ARP: 0x0806,
  IPV6: 0x86dd,
} as const

export const IpNumber = {
  TCP: 6,
  UDP: 17,
  ICMPV6: 58,
  IPV6_NONXT: 59,
} as const

export const NdOptionType = {
  SOURCE_LINK_LAYER_ADDRESS: 1,
  TARGET_LINK_LAYER_ADDRESS: 2,
  PREFIX_INFORMATION: 3,
  REDIRECTED_HEADER: 4,
  MTU: 5,
} as const

export const SshMessageNumber = {
  DISCONNECT: 1,
  IGNORE: 2,
  UNIMPLEMENTED: 3,
  DEBUG: 4,
  SERVICE_REQUEST: 5,
  SERVICE_ACCEPT: 6,
  KEXINIT: 20,
  NEWKEYS: 21,
} as const

export const ETHER_TYPE: DiscriminatorContract = {
  id: 'ether-type',
  bits: 16,
  names: EtherType,
}

export const IP_NUMBER: DiscriminatorContract = {
  id: 'ip-number',
  bits: 8,
  names: IpNumber,
}

export const ND_OPTION_TYPE: DiscriminatorContract = {
  id: 'nd-option-type',
  bits: 8,
  names: NdOptionType,
}

export const SSH_MESSAGE_NUMBER: DiscriminatorContract = {
  id: 'ssh-message-number',
  bits: 8,
  names: SshMessageNumber,
}

/**
 * Renders `value` as e.g. `0x86dd (IPV6)`, or just the hex when the contract
 * has no name for it.
 */
export function describeDiscriminator(
  contract: DiscriminatorContract,
  value: number,
): string {
  const hex = `0x${value.toString(16).padStart(contract.bits / 4, '0')}`
  for (const [name, known] of Object.entries(contract.names)) {
    if (known === value) {
      return `${hex} (${name})`
    }
  }
  return hex
}
