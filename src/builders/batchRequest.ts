// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * Translation of named interface operations (`{ op: "set_mtu", value: "9000" }`)
 * into builder calls.
 *
 * Compound values are comma separated, e.g. `"100,10.1.1.1/24"` for a VLAN
 * address or `"rx,512"` for a ring buffer size.
 */

import {
  DHCP_OPTIONS,
  DHCPV6_FLAGS,
  IP_FLAGS,
  MIRROR_DIRECTIONS,
  OFFLOAD_OPTIONS,
  RING_BUFFER_DIRECTIONS,
} from '../mappers/interfaces/ethernet';
import { InterfaceMapper } from '../mappers/interfaces/interfaceMapper';
import { InterfaceType } from '../parsers/types';
import { MalformedValueError, UnsupportedOperationError } from '../utils/errors';
import { InterfaceOperationRequest } from '../utils/validation';
import { DummyBatchBuilder } from './dummyBatch';
import { EthernetBatchBuilder } from './ethernetBatch';
import { InterfaceBatchBuilder } from './interfaceBatch';

type OperationHandler<B> = (builder: B, iface: string, value: string | undefined, op: string) => void;

type OperationTable<B> = ReadonlyMap<string, OperationHandler<B>>;

/**
 * Split a compound value into exactly as many parts as `format` names.
 * With `textTail`, commas beyond the last separator stay in the final part.
 */
export function splitValue(value: string, format: string, textTail = false): string[] {
  const expected = format.split(',').length;
  let parts = value.split(',');
  if (textTail && parts.length > expected) {
    parts = [...parts.slice(0, expected - 1), parts.slice(expected - 1).join(',')];
  }
  parts = parts.map((part) => part.trim());
  if (parts.length !== expected || parts.some((part) => part === '')) {
    throw new MalformedValueError(value, format);
  }
  return parts;
}

function oneOf<T extends string>(value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new MalformedValueError(value, allowed.join('|'));
  }
  return match;
}

function withValue<B>(apply: (builder: B, iface: string, value: string) => void): OperationHandler<B> {
  return (builder, iface, value, op) => {
    if (value === undefined || value === '') {
      throw new UnsupportedOperationError(op, `${op} requires a value`);
    }
    apply(builder, iface, value);
  };
}

function flag<B>(apply: (builder: B, iface: string) => void): OperationHandler<B> {
  return (builder, iface) => apply(builder, iface);
}

type AnyInterfaceBuilder = InterfaceBatchBuilder<InterfaceMapper>;

const COMMON_OPERATIONS: Record<string, OperationHandler<AnyInterfaceBuilder>> = {
  set_description: withValue((b, i, v) => b.setInterfaceDescription(i, v)),
  delete_description: flag((b, i) => b.deleteInterfaceDescription(i)),
  set_address: withValue((b, i, v) => b.setInterfaceAddress(i, v)),
  delete_address: withValue((b, i, v) => b.deleteInterfaceAddress(i, v)),
  set_mtu: withValue((b, i, v) => b.setInterfaceMtu(i, v)),
  delete_mtu: flag((b, i) => b.deleteInterfaceMtu(i)),
  set_vrf: withValue((b, i, v) => b.setInterfaceVrf(i, v)),
  delete_vrf: withValue((b, i, v) => b.deleteInterfaceVrf(i, v)),
  disable: flag((b, i) => b.setInterfaceDisable(i)),
  enable: flag((b, i) => b.deleteInterfaceDisable(i)),
  delete_interface: flag((b, i) => b.deleteInterface(i)),
};

const ETHERNET_ONLY_OPERATIONS: Record<string, OperationHandler<EthernetBatchBuilder>> = {
  // Physical link
  set_duplex: withValue((b, i, v) => b.setDuplex(i, v)),
  delete_duplex: flag((b, i) => b.deleteDuplex(i)),
  set_speed: withValue((b, i, v) => b.setSpeed(i, v)),
  delete_speed: flag((b, i) => b.deleteSpeed(i)),
  set_hw_id: withValue((b, i, v) => b.setHwId(i, v)),
  delete_hw_id: flag((b, i) => b.deleteHwId(i)),
  set_mac: withValue((b, i, v) => b.setMac(i, v)),
  delete_mac: flag((b, i) => b.deleteMac(i)),
  set_disable_flow_control: flag((b, i) => b.setDisableFlowControl(i)),
  delete_disable_flow_control: flag((b, i) => b.deleteDisableFlowControl(i)),
  set_disable_link_detect: flag((b, i) => b.setDisableLinkDetect(i)),
  delete_disable_link_detect: flag((b, i) => b.deleteDisableLinkDetect(i)),
  set_offload: withValue((b, i, v) => b.setOffload(i, oneOf(v, OFFLOAD_OPTIONS))),
  delete_offload: withValue((b, i, v) => b.deleteOffload(i, oneOf(v, OFFLOAD_OPTIONS))),
  set_ring_buffer: withValue((b, i, v) => {
    const [direction, size] = splitValue(v, 'direction,size');
    b.setRingBuffer(i, oneOf(direction, RING_BUFFER_DIRECTIONS), size);
  }),
  delete_ring_buffer: withValue((b, i, v) =>
    b.deleteRingBuffer(i, oneOf(v, RING_BUFFER_DIRECTIONS)),
  ),

  // IPv4
  set_ip_adjust_mss: withValue((b, i, v) => b.setIpAdjustMss(i, v)),
  delete_ip_adjust_mss: flag((b, i) => b.deleteIpAdjustMss(i)),
  set_ip_arp_cache_timeout: withValue((b, i, v) => b.setIpArpCacheTimeout(i, v)),
  delete_ip_arp_cache_timeout: flag((b, i) => b.deleteIpArpCacheTimeout(i)),
  set_ip_source_validation: withValue((b, i, v) => b.setIpSourceValidation(i, v)),
  delete_ip_source_validation: flag((b, i) => b.deleteIpSourceValidation(i)),
  set_ip_flag: withValue((b, i, v) => b.setIpFlag(i, oneOf(v, IP_FLAGS))),
  delete_ip_flag: withValue((b, i, v) => b.deleteIpFlag(i, oneOf(v, IP_FLAGS))),
  set_ip_enable_directed_broadcast: flag((b, i) => b.setIpEnableDirectedBroadcast(i)),
  delete_ip_enable_directed_broadcast: flag((b, i) => b.deleteIpEnableDirectedBroadcast(i)),

  // IPv6
  set_ipv6_autoconf: flag((b, i) => b.setIpv6AddressAutoconf(i)),
  delete_ipv6_autoconf: flag((b, i) => b.deleteIpv6AddressAutoconf(i)),
  set_ipv6_eui64: withValue((b, i, v) => b.setIpv6AddressEui64(i, v)),
  delete_ipv6_eui64: withValue((b, i, v) => b.deleteIpv6AddressEui64(i, v)),
  set_ipv6_no_default_link_local: flag((b, i) => b.setIpv6NoDefaultLinkLocal(i)),
  delete_ipv6_no_default_link_local: flag((b, i) => b.deleteIpv6NoDefaultLinkLocal(i)),
  set_ipv6_adjust_mss: withValue((b, i, v) => b.setIpv6AdjustMss(i, v)),
  delete_ipv6_adjust_mss: flag((b, i) => b.deleteIpv6AdjustMss(i)),
  set_ipv6_disable_forwarding: flag((b, i) => b.setIpv6DisableForwarding(i)),
  delete_ipv6_disable_forwarding: flag((b, i) => b.deleteIpv6DisableForwarding(i)),
  set_ipv6_dup_addr_detect_transmits: withValue((b, i, v) =>
    b.setIpv6DupAddrDetectTransmits(i, v),
  ),
  delete_ipv6_dup_addr_detect_transmits: flag((b, i) => b.deleteIpv6DupAddrDetectTransmits(i)),

  // DHCP / DHCPv6 client
  set_dhcp_option: withValue((b, i, v) => {
    const [option, value] = splitValue(v, 'option,value', true);
    b.setDhcpOption(i, oneOf(option, DHCP_OPTIONS), value);
  }),
  delete_dhcp_option: withValue((b, i, v) => b.deleteDhcpOption(i, oneOf(v, DHCP_OPTIONS))),
  set_dhcp_no_default_route: flag((b, i) => b.setDhcpNoDefaultRoute(i)),
  delete_dhcp_no_default_route: flag((b, i) => b.deleteDhcpNoDefaultRoute(i)),
  set_dhcpv6_duid: withValue((b, i, v) => b.setDhcpv6Duid(i, v)),
  delete_dhcpv6_duid: flag((b, i) => b.deleteDhcpv6Duid(i)),
  set_dhcpv6_flag: withValue((b, i, v) => b.setDhcpv6Flag(i, oneOf(v, DHCPV6_FLAGS))),
  delete_dhcpv6_flag: withValue((b, i, v) => b.deleteDhcpv6Flag(i, oneOf(v, DHCPV6_FLAGS))),

  // vif
  set_vif: withValue((b, i, v) => b.setVif(i, v)),
  delete_vif: withValue((b, i, v) => b.deleteVif(i, v)),
  set_vif_address: withValue((b, i, v) => {
    const [vlan, address] = splitValue(v, 'vlan,address');
    b.setVifAddress(i, vlan, address);
  }),
  delete_vif_address: withValue((b, i, v) => {
    const [vlan, address] = splitValue(v, 'vlan,address');
    b.deleteVifAddress(i, vlan, address);
  }),
  set_vif_description: withValue((b, i, v) => {
    const [vlan, description] = splitValue(v, 'vlan,description', true);
    b.setVifDescription(i, vlan, description);
  }),
  delete_vif_description: withValue((b, i, v) => b.deleteVifDescription(i, v)),
  set_vif_mtu: withValue((b, i, v) => {
    const [vlan, mtu] = splitValue(v, 'vlan,mtu');
    b.setVifMtu(i, vlan, mtu);
  }),
  delete_vif_mtu: withValue((b, i, v) => b.deleteVifMtu(i, v)),
  set_vif_disable: withValue((b, i, v) => b.setVifDisable(i, v)),
  delete_vif_disable: withValue((b, i, v) => b.deleteVifDisable(i, v)),
  set_vif_vrf: withValue((b, i, v) => {
    const [vlan, vrf] = splitValue(v, 'vlan,vrf');
    b.setVifVrf(i, vlan, vrf);
  }),
  delete_vif_vrf: withValue((b, i, v) => b.deleteVifVrf(i, v)),

  // vif-s
  set_vif_s: withValue((b, i, v) => b.setVifS(i, v)),
  delete_vif_s: withValue((b, i, v) => b.deleteVifS(i, v)),
  set_vif_s_address: withValue((b, i, v) => {
    const [svlan, address] = splitValue(v, 'svlan,address');
    b.setVifSAddress(i, svlan, address);
  }),
  delete_vif_s_address: withValue((b, i, v) => {
    const [svlan, address] = splitValue(v, 'svlan,address');
    b.deleteVifSAddress(i, svlan, address);
  }),
  set_vif_s_description: withValue((b, i, v) => {
    const [svlan, description] = splitValue(v, 'svlan,description', true);
    b.setVifSDescription(i, svlan, description);
  }),
  delete_vif_s_description: withValue((b, i, v) => b.deleteVifSDescription(i, v)),
  set_vif_s_protocol: withValue((b, i, v) => {
    const [svlan, protocol] = splitValue(v, 'svlan,protocol');
    b.setVifSProtocol(i, svlan, protocol);
  }),
  delete_vif_s_protocol: withValue((b, i, v) => b.deleteVifSProtocol(i, v)),
  set_vif_s_mtu: withValue((b, i, v) => {
    const [svlan, mtu] = splitValue(v, 'svlan,mtu');
    b.setVifSMtu(i, svlan, mtu);
  }),
  delete_vif_s_mtu: withValue((b, i, v) => b.deleteVifSMtu(i, v)),
  set_vif_s_disable: withValue((b, i, v) => b.setVifSDisable(i, v)),
  delete_vif_s_disable: withValue((b, i, v) => b.deleteVifSDisable(i, v)),

  // vif-c
  set_vif_c: withValue((b, i, v) => {
    const [svlan, cvlan] = splitValue(v, 'svlan,cvlan');
    b.setVifC(i, svlan, cvlan);
  }),
  delete_vif_c: withValue((b, i, v) => {
    const [svlan, cvlan] = splitValue(v, 'svlan,cvlan');
    b.deleteVifC(i, svlan, cvlan);
  }),
  set_vif_c_address: withValue((b, i, v) => {
    const [svlan, cvlan, address] = splitValue(v, 'svlan,cvlan,address');
    b.setVifCAddress(i, svlan, cvlan, address);
  }),
  delete_vif_c_address: withValue((b, i, v) => {
    const [svlan, cvlan, address] = splitValue(v, 'svlan,cvlan,address');
    b.deleteVifCAddress(i, svlan, cvlan, address);
  }),
  set_vif_c_description: withValue((b, i, v) => {
    const [svlan, cvlan, description] = splitValue(v, 'svlan,cvlan,description', true);
    b.setVifCDescription(i, svlan, cvlan, description);
  }),
  delete_vif_c_description: withValue((b, i, v) => {
    const [svlan, cvlan] = splitValue(v, 'svlan,cvlan');
    b.deleteVifCDescription(i, svlan, cvlan);
  }),
  set_vif_c_mtu: withValue((b, i, v) => {
    const [svlan, cvlan, mtu] = splitValue(v, 'svlan,cvlan,mtu');
    b.setVifCMtu(i, svlan, cvlan, mtu);
  }),
  delete_vif_c_mtu: withValue((b, i, v) => {
    const [svlan, cvlan] = splitValue(v, 'svlan,cvlan');
    b.deleteVifCMtu(i, svlan, cvlan);
  }),
  set_vif_c_disable: withValue((b, i, v) => {
    const [svlan, cvlan] = splitValue(v, 'svlan,cvlan');
    b.setVifCDisable(i, svlan, cvlan);
  }),
  delete_vif_c_disable: withValue((b, i, v) => {
    const [svlan, cvlan] = splitValue(v, 'svlan,cvlan');
    b.deleteVifCDisable(i, svlan, cvlan);
  }),

  // Mirroring, 802.1X, EVPN
  set_mirror: withValue((b, i, v) => {
    const [direction, target] = splitValue(v, 'direction,interface');
    b.setMirror(i, oneOf(direction, MIRROR_DIRECTIONS), target);
  }),
  delete_mirror: withValue((b, i, v) => b.deleteMirror(i, oneOf(v, MIRROR_DIRECTIONS))),
  set_eapol_ca_certificate: withValue((b, i, v) => b.setEapolCaCertificate(i, v)),
  set_eapol_certificate: withValue((b, i, v) => b.setEapolCertificate(i, v)),
  delete_eapol: flag((b, i) => b.deleteEapol(i)),
  set_evpn_uplink: flag((b, i) => b.setEvpnUplink(i)),
  delete_evpn_uplink: flag((b, i) => b.deleteEvpnUplink(i)),
};

export const ETHERNET_OPERATIONS: OperationTable<EthernetBatchBuilder> = new Map(
  Object.entries({ ...COMMON_OPERATIONS, ...ETHERNET_ONLY_OPERATIONS }),
);

export const DUMMY_OPERATIONS: OperationTable<DummyBatchBuilder> = new Map(
  Object.entries(COMMON_OPERATIONS),
);

/**
 * Operation names accepted for an interface type, sorted
 */
export function getSupportedOperations(type: InterfaceType): string[] {
  const table = type === 'ethernet' ? ETHERNET_OPERATIONS : DUMMY_OPERATIONS;
  return [...table.keys()].sort();
}

/**
 * Apply `operations` to `builder` in order. Throws on the first unknown
 * operation or bad value; earlier operations stay queued.
 */
export function applyOperations<B>(
  builder: B,
  table: OperationTable<B>,
  iface: string,
  operations: readonly InterfaceOperationRequest[],
): B {
  for (const { op, value } of operations) {
    const handler = table.get(op);
    if (!handler) {
      throw new UnsupportedOperationError(op);
    }
    handler(builder, iface, value, op);
  }
  return builder;
}
