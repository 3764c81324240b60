// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import {
  DhcpOption,
  Dhcpv6Flag,
  EthernetInterfaceMapper,
  IpFlag,
  MirrorDirection,
  OffloadOption,
  RingBufferDirection,
} from '../mappers/interfaces/ethernet';
import { InterfaceBatchBuilder } from './interfaceBatch';

/**
 * Batch builder for ethernet interfaces: the common interface operations plus
 * physical link, IP/IPv6, DHCP, VLAN and QinQ sub-interfaces, mirroring,
 * 802.1X and EVPN.
 *
 * Version-gated operations throw `UnsupportedFeatureError` before anything
 * is queued.
 */
export class EthernetBatchBuilder extends InterfaceBatchBuilder<EthernetInterfaceMapper> {
  // Physical link

  setDuplex(iface: string, duplex: string): this {
    return this.addSet(this.mapper.getDuplex(iface, duplex));
  }

  deleteDuplex(iface: string): this {
    return this.addDelete(this.mapper.getDuplexPath(iface));
  }

  setSpeed(iface: string, speed: string): this {
    return this.addSet(this.mapper.getSpeed(iface, speed));
  }

  deleteSpeed(iface: string): this {
    return this.addDelete(this.mapper.getSpeedPath(iface));
  }

  setHwId(iface: string, hwId: string): this {
    return this.addSet(this.mapper.getHwId(iface, hwId));
  }

  deleteHwId(iface: string): this {
    return this.addDelete(this.mapper.getHwIdPath(iface));
  }

  setMac(iface: string, mac: string): this {
    return this.addSet(this.mapper.getMac(iface, mac));
  }

  deleteMac(iface: string): this {
    return this.addDelete(this.mapper.getMacPath(iface));
  }

  setDisableFlowControl(iface: string): this {
    return this.addSet(this.mapper.getDisableFlowControl(iface));
  }

  deleteDisableFlowControl(iface: string): this {
    return this.addDelete(this.mapper.getDisableFlowControl(iface));
  }

  setDisableLinkDetect(iface: string): this {
    return this.addSet(this.mapper.getDisableLinkDetect(iface));
  }

  deleteDisableLinkDetect(iface: string): this {
    return this.addDelete(this.mapper.getDisableLinkDetect(iface));
  }

  setOffload(iface: string, option: OffloadOption): this {
    return this.addSet(this.mapper.getOffload(iface, option));
  }

  deleteOffload(iface: string, option: OffloadOption): this {
    return this.addDelete(this.mapper.getOffload(iface, option));
  }

  setRingBuffer(iface: string, direction: RingBufferDirection, size: string): this {
    return this.addSet(this.mapper.getRingBuffer(iface, direction, size));
  }

  deleteRingBuffer(iface: string, direction: RingBufferDirection): this {
    return this.addDelete(this.mapper.getRingBufferPath(iface, direction));
  }

  // IPv4

  setIpAdjustMss(iface: string, mss: string): this {
    return this.addSet(this.mapper.getIpAdjustMss(iface, mss));
  }

  deleteIpAdjustMss(iface: string): this {
    return this.addDelete(this.mapper.getIpAdjustMssPath(iface));
  }

  setIpArpCacheTimeout(iface: string, timeout: string): this {
    return this.addSet(this.mapper.getIpArpCacheTimeout(iface, timeout));
  }

  deleteIpArpCacheTimeout(iface: string): this {
    return this.addDelete(this.mapper.getIpArpCacheTimeoutPath(iface));
  }

  setIpSourceValidation(iface: string, mode: string): this {
    return this.addSet(this.mapper.getIpSourceValidation(iface, mode));
  }

  deleteIpSourceValidation(iface: string): this {
    return this.addDelete(this.mapper.getIpSourceValidationPath(iface));
  }

  setIpFlag(iface: string, flag: IpFlag): this {
    return this.addSet(this.mapper.getIpFlag(iface, flag));
  }

  deleteIpFlag(iface: string, flag: IpFlag): this {
    return this.addDelete(this.mapper.getIpFlag(iface, flag));
  }

  /** VyOS 1.5+ */
  setIpEnableDirectedBroadcast(iface: string): this {
    return this.addSet(this.mapper.getIpEnableDirectedBroadcast(iface));
  }

  /** VyOS 1.5+ */
  deleteIpEnableDirectedBroadcast(iface: string): this {
    return this.addDelete(this.mapper.getIpEnableDirectedBroadcast(iface));
  }

  // IPv6

  setIpv6AddressAutoconf(iface: string): this {
    return this.addSet(this.mapper.getIpv6AddressAutoconf(iface));
  }

  deleteIpv6AddressAutoconf(iface: string): this {
    return this.addDelete(this.mapper.getIpv6AddressAutoconf(iface));
  }

  setIpv6AddressEui64(iface: string, prefix: string): this {
    return this.addSet(this.mapper.getIpv6AddressEui64(iface, prefix));
  }

  deleteIpv6AddressEui64(iface: string, prefix: string): this {
    return this.addDelete(this.mapper.getIpv6AddressEui64(iface, prefix));
  }

  setIpv6NoDefaultLinkLocal(iface: string): this {
    return this.addSet(this.mapper.getIpv6NoDefaultLinkLocal(iface));
  }

  deleteIpv6NoDefaultLinkLocal(iface: string): this {
    return this.addDelete(this.mapper.getIpv6NoDefaultLinkLocal(iface));
  }

  setIpv6AdjustMss(iface: string, mss: string): this {
    return this.addSet(this.mapper.getIpv6AdjustMss(iface, mss));
  }

  deleteIpv6AdjustMss(iface: string): this {
    return this.addDelete(this.mapper.getIpv6AdjustMssPath(iface));
  }

  setIpv6DisableForwarding(iface: string): this {
    return this.addSet(this.mapper.getIpv6DisableForwarding(iface));
  }

  deleteIpv6DisableForwarding(iface: string): this {
    return this.addDelete(this.mapper.getIpv6DisableForwarding(iface));
  }

  setIpv6DupAddrDetectTransmits(iface: string, count: string): this {
    return this.addSet(this.mapper.getIpv6DupAddrDetectTransmits(iface, count));
  }

  deleteIpv6DupAddrDetectTransmits(iface: string): this {
    return this.addDelete(this.mapper.getIpv6DupAddrDetectTransmitsPath(iface));
  }

  // DHCP / DHCPv6 client

  setDhcpOption(iface: string, option: DhcpOption, value: string): this {
    return this.addSet(this.mapper.getDhcpOption(iface, option, value));
  }

  deleteDhcpOption(iface: string, option: DhcpOption): this {
    return this.addDelete(this.mapper.getDhcpOptionPath(iface, option));
  }

  setDhcpNoDefaultRoute(iface: string): this {
    return this.addSet(this.mapper.getDhcpNoDefaultRoute(iface));
  }

  deleteDhcpNoDefaultRoute(iface: string): this {
    return this.addDelete(this.mapper.getDhcpNoDefaultRoute(iface));
  }

  setDhcpv6Duid(iface: string, duid: string): this {
    return this.addSet(this.mapper.getDhcpv6Duid(iface, duid));
  }

  deleteDhcpv6Duid(iface: string): this {
    return this.addDelete(this.mapper.getDhcpv6DuidPath(iface));
  }

  setDhcpv6Flag(iface: string, flag: Dhcpv6Flag): this {
    return this.addSet(this.mapper.getDhcpv6Flag(iface, flag));
  }

  deleteDhcpv6Flag(iface: string, flag: Dhcpv6Flag): this {
    return this.addDelete(this.mapper.getDhcpv6Flag(iface, flag));
  }

  // 802.1Q VLAN (vif)

  setVif(iface: string, vlanId: string): this {
    return this.addSet(this.mapper.getVif(iface, vlanId));
  }

  deleteVif(iface: string, vlanId: string): this {
    return this.addDelete(this.mapper.getVif(iface, vlanId));
  }

  setVifAddress(iface: string, vlanId: string, address: string): this {
    return this.addSet(this.mapper.getVifAddress(iface, vlanId, address));
  }

  deleteVifAddress(iface: string, vlanId: string, address: string): this {
    return this.addDelete(this.mapper.getVifAddress(iface, vlanId, address));
  }

  setVifDescription(iface: string, vlanId: string, description: string): this {
    return this.addSet(this.mapper.getVifDescription(iface, vlanId, description));
  }

  deleteVifDescription(iface: string, vlanId: string): this {
    return this.addDelete(this.mapper.getVifDescriptionPath(iface, vlanId));
  }

  setVifMtu(iface: string, vlanId: string, mtu: string): this {
    return this.addSet(this.mapper.getVifMtu(iface, vlanId, mtu));
  }

  deleteVifMtu(iface: string, vlanId: string): this {
    return this.addDelete(this.mapper.getVifMtuPath(iface, vlanId));
  }

  setVifDisable(iface: string, vlanId: string): this {
    return this.addSet(this.mapper.getVifDisable(iface, vlanId));
  }

  deleteVifDisable(iface: string, vlanId: string): this {
    return this.addDelete(this.mapper.getVifDisable(iface, vlanId));
  }

  setVifVrf(iface: string, vlanId: string, vrf: string): this {
    return this.addSet(this.mapper.getVifVrf(iface, vlanId, vrf));
  }

  deleteVifVrf(iface: string, vlanId: string): this {
    return this.addDelete(this.mapper.getVifVrfPath(iface, vlanId));
  }

  // QinQ service VLAN (vif-s)

  setVifS(iface: string, serviceVlanId: string): this {
    return this.addSet(this.mapper.getVifS(iface, serviceVlanId));
  }

  deleteVifS(iface: string, serviceVlanId: string): this {
    return this.addDelete(this.mapper.getVifS(iface, serviceVlanId));
  }

  setVifSAddress(iface: string, serviceVlanId: string, address: string): this {
    return this.addSet(this.mapper.getVifSAddress(iface, serviceVlanId, address));
  }

  deleteVifSAddress(iface: string, serviceVlanId: string, address: string): this {
    return this.addDelete(this.mapper.getVifSAddress(iface, serviceVlanId, address));
  }

  setVifSDescription(iface: string, serviceVlanId: string, description: string): this {
    return this.addSet(this.mapper.getVifSDescription(iface, serviceVlanId, description));
  }

  deleteVifSDescription(iface: string, serviceVlanId: string): this {
    return this.addDelete(this.mapper.getVifSDescriptionPath(iface, serviceVlanId));
  }

  setVifSProtocol(iface: string, serviceVlanId: string, protocol: string): this {
    return this.addSet(this.mapper.getVifSProtocol(iface, serviceVlanId, protocol));
  }

  deleteVifSProtocol(iface: string, serviceVlanId: string): this {
    return this.addDelete(this.mapper.getVifSProtocolPath(iface, serviceVlanId));
  }

  setVifSMtu(iface: string, serviceVlanId: string, mtu: string): this {
    return this.addSet(this.mapper.getVifSMtu(iface, serviceVlanId, mtu));
  }

  deleteVifSMtu(iface: string, serviceVlanId: string): this {
    return this.addDelete(this.mapper.getVifSMtuPath(iface, serviceVlanId));
  }

  setVifSDisable(iface: string, serviceVlanId: string): this {
    return this.addSet(this.mapper.getVifSDisable(iface, serviceVlanId));
  }

  deleteVifSDisable(iface: string, serviceVlanId: string): this {
    return this.addDelete(this.mapper.getVifSDisable(iface, serviceVlanId));
  }

  // QinQ customer VLAN (vif-c)

  setVifC(iface: string, serviceVlanId: string, customerVlanId: string): this {
    return this.addSet(this.mapper.getVifC(iface, serviceVlanId, customerVlanId));
  }

  deleteVifC(iface: string, serviceVlanId: string, customerVlanId: string): this {
    return this.addDelete(this.mapper.getVifC(iface, serviceVlanId, customerVlanId));
  }

  setVifCAddress(
    iface: string,
    serviceVlanId: string,
    customerVlanId: string,
    address: string,
  ): this {
    return this.addSet(this.mapper.getVifCAddress(iface, serviceVlanId, customerVlanId, address));
  }

  deleteVifCAddress(
    iface: string,
    serviceVlanId: string,
    customerVlanId: string,
    address: string,
  ): this {
    return this.addDelete(
      this.mapper.getVifCAddress(iface, serviceVlanId, customerVlanId, address),
    );
  }

  setVifCDescription(
    iface: string,
    serviceVlanId: string,
    customerVlanId: string,
    description: string,
  ): this {
    return this.addSet(
      this.mapper.getVifCDescription(iface, serviceVlanId, customerVlanId, description),
    );
  }

  deleteVifCDescription(iface: string, serviceVlanId: string, customerVlanId: string): this {
    return this.addDelete(
      this.mapper.getVifCDescriptionPath(iface, serviceVlanId, customerVlanId),
    );
  }

  setVifCMtu(iface: string, serviceVlanId: string, customerVlanId: string, mtu: string): this {
    return this.addSet(this.mapper.getVifCMtu(iface, serviceVlanId, customerVlanId, mtu));
  }

  deleteVifCMtu(iface: string, serviceVlanId: string, customerVlanId: string): this {
    return this.addDelete(this.mapper.getVifCMtuPath(iface, serviceVlanId, customerVlanId));
  }

  setVifCDisable(iface: string, serviceVlanId: string, customerVlanId: string): this {
    return this.addSet(this.mapper.getVifCDisable(iface, serviceVlanId, customerVlanId));
  }

  deleteVifCDisable(iface: string, serviceVlanId: string, customerVlanId: string): this {
    return this.addDelete(this.mapper.getVifCDisable(iface, serviceVlanId, customerVlanId));
  }

  // Mirroring, 802.1X, EVPN

  setMirror(iface: string, direction: MirrorDirection, target: string): this {
    return this.addSet(this.mapper.getMirror(iface, direction, target));
  }

  deleteMirror(iface: string, direction: MirrorDirection): this {
    return this.addDelete(this.mapper.getMirrorPath(iface, direction));
  }

  setEapolCaCertificate(iface: string, name: string): this {
    return this.addSet(this.mapper.getEapolCaCertificate(iface, name));
  }

  setEapolCertificate(iface: string, name: string): this {
    return this.addSet(this.mapper.getEapolCertificate(iface, name));
  }

  deleteEapol(iface: string): this {
    return this.addDelete(this.mapper.getEapolPath(iface));
  }

  setEvpnUplink(iface: string): this {
    return this.addSet(this.mapper.getEvpnUplink(iface));
  }

  deleteEvpnUplink(iface: string): this {
    return this.addDelete(this.mapper.getEvpnUplink(iface));
  }
}
