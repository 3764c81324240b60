// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * Normalized interface records.
 *
 * Every attribute is always present on a record. `null` means the attribute is
 * not configured on the device, or not supported by the device's version.
 */

export type InterfaceType = 'ethernet' | 'dummy';

export interface InterfaceRecord {
  name: string;
  type: InterfaceType;
  addresses: string[];
  description: string | null;
  vrf: string | null;
  mtu: string | null;
  /** true when administratively disabled, otherwise null */
  disable: true | null;
}

export type DummyInterfaceRecord = InterfaceRecord;

export interface OffloadConfig {
  gro: boolean;
  gso: boolean;
  lro: boolean;
  rps: boolean;
  rfs: boolean;
  sg: boolean;
  tso: boolean;
}

export interface RingBufferConfig {
  rx: string | null;
  tx: string | null;
}

export interface IpConfig {
  adjustMss: string | null;
  arpCacheTimeout: string | null;
  disableArpFilter: boolean;
  disableForwarding: boolean;
  enableArpAccept: boolean;
  enableArpAnnounce: boolean;
  enableArpIgnore: boolean;
  enableProxyArp: boolean;
  proxyArpPvlan: boolean;
  sourceValidation: string | null;
  /** Available from VyOS 1.5; null on older versions */
  enableDirectedBroadcast: boolean | null;
}

export interface Ipv6Config {
  autoconf: boolean;
  eui64: string[];
  noDefaultLinkLocal: boolean;
  adjustMss: string | null;
  disableForwarding: boolean;
  dupAddrDetectTransmits: string | null;
}

export interface DhcpOptions {
  clientId: string | null;
  hostName: string | null;
  vendorClassId: string | null;
  defaultRouteDistance: string | null;
  noDefaultRoute: boolean;
  reject: string[];
}

export interface Dhcpv6Options {
  duid: string | null;
  parametersOnly: boolean;
  rapidCommit: boolean;
  temporary: boolean;
}

export interface VifRecord {
  vlanId: string;
  addresses: string[];
  description: string | null;
  mtu: string | null;
  vrf: string | null;
  disable: true | null;
}

export type VifCRecord = Omit<VifRecord, 'vrf'>;

export interface VifSRecord extends Omit<VifRecord, 'vrf'> {
  protocol: string | null;
  vifC: VifCRecord[] | null;
}

export interface MirrorConfig {
  ingress: string | null;
  egress: string | null;
}

export interface EapolConfig {
  caCertificate: string | null;
  certificate: string | null;
}

export interface EvpnConfig {
  uplink: boolean;
}

export interface EthernetInterfaceRecord extends InterfaceRecord {
  hwId: string | null;
  mac: string | null;
  duplex: string | null;
  speed: string | null;
  disableFlowControl: true | null;
  disableLinkDetect: true | null;
  offload: OffloadConfig | null;
  ringBuffer: RingBufferConfig | null;
  ip: IpConfig | null;
  ipv6: Ipv6Config | null;
  dhcpOptions: DhcpOptions | null;
  dhcpv6Options: Dhcpv6Options | null;
  vif: VifRecord[] | null;
  vifS: VifSRecord[] | null;
  mirror: MirrorConfig | null;
  eapol: EapolConfig | null;
  evpn: EvpnConfig | null;
}

/**
 * Summary of every interface of one type
 */
export interface InterfaceSummary<R extends InterfaceRecord = InterfaceRecord> {
  interfaces: R[];
  total: number;
  byType: Partial<Record<InterfaceType, number>>;
  /** Interfaces without a VRF are not counted */
  byVrf: Record<string, number>;
}
