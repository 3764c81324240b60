// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { CommandPath } from '../commandPath';
import { installOverrides } from '../base';
import { resolveVersion } from '../versions';
import { ConfigTree, getString, hasKey } from '../../parsers/configTree';
import {
  parseCommonFields,
  parseDhcpOptions,
  parseDhcpv6Options,
  parseEapol,
  parseEvpn,
  parseIp,
  parseIpv6,
  parseMirror,
  parseOffload,
  parseRingBuffer,
  parseVif,
  parseVifS,
} from '../../parsers/interfaceParser';
import { EthernetInterfaceRecord } from '../../parsers/types';
import { ETHERNET_VERSION_PROFILES } from './ethernetVersions';
import { InterfaceMapper } from './interfaceMapper';

export const OFFLOAD_OPTIONS = ['gro', 'gso', 'lro', 'rps', 'rfs', 'sg', 'tso'] as const;
export type OffloadOption = (typeof OFFLOAD_OPTIONS)[number];

export const RING_BUFFER_DIRECTIONS = ['rx', 'tx'] as const;
export type RingBufferDirection = (typeof RING_BUFFER_DIRECTIONS)[number];

export const IP_FLAGS = [
  'disable-arp-filter',
  'disable-forwarding',
  'enable-arp-accept',
  'enable-arp-announce',
  'enable-arp-ignore',
  'enable-proxy-arp',
  'proxy-arp-pvlan',
] as const;
export type IpFlag = (typeof IP_FLAGS)[number];

export const DHCP_OPTIONS = [
  'client-id',
  'host-name',
  'vendor-class-id',
  'default-route-distance',
  'reject',
] as const;
export type DhcpOption = (typeof DHCP_OPTIONS)[number];

export const DHCPV6_FLAGS = ['parameters-only', 'rapid-commit', 'temporary'] as const;
export type Dhcpv6Flag = (typeof DHCPV6_FLAGS)[number];

export const MIRROR_DIRECTIONS = ['ingress', 'egress'] as const;
export type MirrorDirection = (typeof MIRROR_DIRECTIONS)[number];

/**
 * Parsers for the optional sub-blocks of an ethernet interface
 */
export interface EthernetBlockParsers {
  offload: typeof parseOffload;
  ringBuffer: typeof parseRingBuffer;
  ip: typeof parseIp;
  ipv6: typeof parseIpv6;
  dhcpOptions: typeof parseDhcpOptions;
  dhcpv6Options: typeof parseDhcpv6Options;
  vif: typeof parseVif;
  vifS: typeof parseVifS;
  mirror: typeof parseMirror;
  eapol: typeof parseEapol;
  evpn: typeof parseEvpn;
}

export const BASE_ETHERNET_PARSERS: EthernetBlockParsers = {
  offload: parseOffload,
  ringBuffer: parseRingBuffer,
  ip: parseIp,
  ipv6: parseIpv6,
  dhcpOptions: parseDhcpOptions,
  dhcpv6Options: parseDhcpv6Options,
  vif: parseVif,
  vifS: parseVifS,
  mirror: parseMirror,
  eapol: parseEapol,
  evpn: parseEvpn,
};

/**
 * What one device version changes relative to the base mapper
 */
export interface EthernetVersionProfile {
  /** Path method overrides, built against the mapper they are installed on */
  paths?: (mapper: EthernetInterfaceMapper) => Partial<EthernetInterfaceMapper>;
  parsers?: Partial<EthernetBlockParsers>;
}

/**
 * Ethernet interface mapper.
 *
 * The base implementation describes the newest supported schema. Older
 * versions are expressed as an {@link EthernetVersionProfile}, installed by
 * the constructor from the device version.
 */
export class EthernetInterfaceMapper extends InterfaceMapper<EthernetInterfaceRecord> {
  private readonly parsers: EthernetBlockParsers;

  constructor(version: string) {
    super(version, 'ethernet');
    const profile = ETHERNET_VERSION_PROFILES[resolveVersion(version)];
    this.parsers = { ...BASE_ETHERNET_PARSERS, ...profile.parsers };
    if (profile.paths) {
      installOverrides<EthernetInterfaceMapper>(this, profile.paths(this));
    }
  }

  // Physical link

  getDuplex(iface: string, duplex: string): CommandPath {
    return this.path(iface, 'duplex', duplex);
  }

  getDuplexPath(iface: string): CommandPath {
    return this.path(iface, 'duplex');
  }

  getSpeed(iface: string, speed: string): CommandPath {
    return this.path(iface, 'speed', speed);
  }

  getSpeedPath(iface: string): CommandPath {
    return this.path(iface, 'speed');
  }

  getHwId(iface: string, hwId: string): CommandPath {
    return this.path(iface, 'hw-id', hwId);
  }

  getHwIdPath(iface: string): CommandPath {
    return this.path(iface, 'hw-id');
  }

  getMac(iface: string, mac: string): CommandPath {
    return this.path(iface, 'mac', mac);
  }

  getMacPath(iface: string): CommandPath {
    return this.path(iface, 'mac');
  }

  getDisableFlowControl(iface: string): CommandPath {
    return this.path(iface, 'disable-flow-control');
  }

  getDisableLinkDetect(iface: string): CommandPath {
    return this.path(iface, 'disable-link-detect');
  }

  getOffload(iface: string, option: OffloadOption): CommandPath {
    return this.path(iface, 'offload', option);
  }

  getOffloadPath(iface: string): CommandPath {
    return this.path(iface, 'offload');
  }

  getRingBuffer(iface: string, direction: RingBufferDirection, size: string): CommandPath {
    return this.path(iface, 'ring-buffer', direction, size);
  }

  getRingBufferPath(iface: string, direction: RingBufferDirection): CommandPath {
    return this.path(iface, 'ring-buffer', direction);
  }

  // IPv4

  getIpAdjustMss(iface: string, mss: string): CommandPath {
    return this.path(iface, 'ip', 'adjust-mss', mss);
  }

  getIpAdjustMssPath(iface: string): CommandPath {
    return this.path(iface, 'ip', 'adjust-mss');
  }

  getIpArpCacheTimeout(iface: string, timeout: string): CommandPath {
    return this.path(iface, 'ip', 'arp-cache-timeout', timeout);
  }

  getIpArpCacheTimeoutPath(iface: string): CommandPath {
    return this.path(iface, 'ip', 'arp-cache-timeout');
  }

  getIpSourceValidation(iface: string, mode: string): CommandPath {
    return this.path(iface, 'ip', 'source-validation', mode);
  }

  getIpSourceValidationPath(iface: string): CommandPath {
    return this.path(iface, 'ip', 'source-validation');
  }

  getIpFlag(iface: string, flag: IpFlag): CommandPath {
    return this.path(iface, 'ip', flag);
  }

  /** VyOS 1.5+ */
  getIpEnableDirectedBroadcast(iface: string): CommandPath {
    return this.path(iface, 'ip', 'enable-directed-broadcast');
  }

  // IPv6

  getIpv6AddressAutoconf(iface: string): CommandPath {
    return this.path(iface, 'ipv6', 'address', 'autoconf');
  }

  getIpv6AddressEui64(iface: string, prefix: string): CommandPath {
    return this.path(iface, 'ipv6', 'address', 'eui64', prefix);
  }

  getIpv6NoDefaultLinkLocal(iface: string): CommandPath {
    return this.path(iface, 'ipv6', 'address', 'no-default-link-local');
  }

  getIpv6AdjustMss(iface: string, mss: string): CommandPath {
    return this.path(iface, 'ipv6', 'adjust-mss', mss);
  }

  getIpv6AdjustMssPath(iface: string): CommandPath {
    return this.path(iface, 'ipv6', 'adjust-mss');
  }

  getIpv6DisableForwarding(iface: string): CommandPath {
    return this.path(iface, 'ipv6', 'disable-forwarding');
  }

  getIpv6DupAddrDetectTransmits(iface: string, count: string): CommandPath {
    return this.path(iface, 'ipv6', 'dup-addr-detect-transmits', count);
  }

  getIpv6DupAddrDetectTransmitsPath(iface: string): CommandPath {
    return this.path(iface, 'ipv6', 'dup-addr-detect-transmits');
  }

  // DHCP / DHCPv6 client

  getDhcpOption(iface: string, option: DhcpOption, value: string): CommandPath {
    return this.path(iface, 'dhcp-options', option, value);
  }

  getDhcpOptionPath(iface: string, option: DhcpOption): CommandPath {
    return this.path(iface, 'dhcp-options', option);
  }

  getDhcpNoDefaultRoute(iface: string): CommandPath {
    return this.path(iface, 'dhcp-options', 'no-default-route');
  }

  getDhcpv6Duid(iface: string, duid: string): CommandPath {
    return this.path(iface, 'dhcpv6-options', 'duid', duid);
  }

  getDhcpv6DuidPath(iface: string): CommandPath {
    return this.path(iface, 'dhcpv6-options', 'duid');
  }

  getDhcpv6Flag(iface: string, flag: Dhcpv6Flag): CommandPath {
    return this.path(iface, 'dhcpv6-options', flag);
  }

  // 802.1Q sub-interfaces

  getVif(iface: string, vlanId: string): CommandPath {
    return this.path(iface, 'vif', vlanId);
  }

  getVifAddress(iface: string, vlanId: string, address: string): CommandPath {
    return this.path(iface, 'vif', vlanId, 'address', address);
  }

  getVifDescription(iface: string, vlanId: string, description: string): CommandPath {
    return this.path(iface, 'vif', vlanId, 'description', description);
  }

  getVifDescriptionPath(iface: string, vlanId: string): CommandPath {
    return this.path(iface, 'vif', vlanId, 'description');
  }

  getVifMtu(iface: string, vlanId: string, mtu: string): CommandPath {
    return this.path(iface, 'vif', vlanId, 'mtu', mtu);
  }

  getVifMtuPath(iface: string, vlanId: string): CommandPath {
    return this.path(iface, 'vif', vlanId, 'mtu');
  }

  getVifDisable(iface: string, vlanId: string): CommandPath {
    return this.path(iface, 'vif', vlanId, 'disable');
  }

  getVifVrf(iface: string, vlanId: string, vrf: string): CommandPath {
    return this.path(iface, 'vif', vlanId, 'vrf', vrf);
  }

  getVifVrfPath(iface: string, vlanId: string): CommandPath {
    return this.path(iface, 'vif', vlanId, 'vrf');
  }

  // QinQ: the service VLAN is always the outer segment

  getVifS(iface: string, serviceVlanId: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId);
  }

  getVifSAddress(iface: string, serviceVlanId: string, address: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'address', address);
  }

  getVifSDescription(iface: string, serviceVlanId: string, description: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'description', description);
  }

  getVifSDescriptionPath(iface: string, serviceVlanId: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'description');
  }

  getVifSProtocol(iface: string, serviceVlanId: string, protocol: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'protocol', protocol);
  }

  getVifSProtocolPath(iface: string, serviceVlanId: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'protocol');
  }

  getVifSMtu(iface: string, serviceVlanId: string, mtu: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'mtu', mtu);
  }

  getVifSMtuPath(iface: string, serviceVlanId: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'mtu');
  }

  getVifSDisable(iface: string, serviceVlanId: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'disable');
  }

  getVifC(iface: string, serviceVlanId: string, customerVlanId: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'vif-c', customerVlanId);
  }

  getVifCAddress(
    iface: string,
    serviceVlanId: string,
    customerVlanId: string,
    address: string,
  ): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'vif-c', customerVlanId, 'address', address);
  }

  getVifCDescription(
    iface: string,
    serviceVlanId: string,
    customerVlanId: string,
    description: string,
  ): CommandPath {
    return this.path(
      iface,
      'vif-s',
      serviceVlanId,
      'vif-c',
      customerVlanId,
      'description',
      description,
    );
  }

  getVifCDescriptionPath(iface: string, serviceVlanId: string, customerVlanId: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'vif-c', customerVlanId, 'description');
  }

  getVifCMtu(iface: string, serviceVlanId: string, customerVlanId: string, mtu: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'vif-c', customerVlanId, 'mtu', mtu);
  }

  getVifCMtuPath(iface: string, serviceVlanId: string, customerVlanId: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'vif-c', customerVlanId, 'mtu');
  }

  getVifCDisable(iface: string, serviceVlanId: string, customerVlanId: string): CommandPath {
    return this.path(iface, 'vif-s', serviceVlanId, 'vif-c', customerVlanId, 'disable');
  }

  // Port mirroring, 802.1X, EVPN

  getMirror(iface: string, direction: MirrorDirection, target: string): CommandPath {
    return this.path(iface, 'mirror', direction, target);
  }

  getMirrorPath(iface: string, direction: MirrorDirection): CommandPath {
    return this.path(iface, 'mirror', direction);
  }

  getEapolCaCertificate(iface: string, name: string): CommandPath {
    return this.path(iface, 'eapol', 'ca-certificate', name);
  }

  getEapolCertificate(iface: string, name: string): CommandPath {
    return this.path(iface, 'eapol', 'certificate', name);
  }

  getEapolPath(iface: string): CommandPath {
    return this.path(iface, 'eapol');
  }

  getEvpnUplink(iface: string): CommandPath {
    return this.path(iface, 'evpn', 'uplink');
  }

  parseSingleInterface(name: string, config: ConfigTree): EthernetInterfaceRecord {
    return {
      ...parseCommonFields(name, this.interfaceType, config),
      hwId: getString(config, 'hw-id'),
      mac: getString(config, 'mac'),
      duplex: getString(config, 'duplex'),
      speed: getString(config, 'speed'),
      disableFlowControl: hasKey(config, 'disable-flow-control') ? true : null,
      disableLinkDetect: hasKey(config, 'disable-link-detect') ? true : null,
      offload: this.parsers.offload(config),
      ringBuffer: this.parsers.ringBuffer(config),
      ip: this.parsers.ip(config),
      ipv6: this.parsers.ipv6(config),
      dhcpOptions: this.parsers.dhcpOptions(config),
      dhcpv6Options: this.parsers.dhcpv6Options(config),
      vif: this.parsers.vif(config),
      vifS: this.parsers.vifS(config),
      mirror: this.parsers.mirror(config),
      eapol: this.parsers.eapol(config),
      evpn: this.parsers.evpn(config),
    };
  }
}
