// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * Sub-block parsers shared by the interface mappers.
 *
 * Each parser receives the interface's raw subtree and returns null when its
 * own key is absent, so records distinguish "not configured" from "empty".
 */

import {
  ConfigTree,
  asConfigTree,
  getString,
  getStringList,
  getSubtree,
  hasKey,
  isConfigTree,
} from './configTree';
import {
  DhcpOptions,
  Dhcpv6Options,
  EapolConfig,
  EvpnConfig,
  InterfaceRecord,
  InterfaceSummary,
  InterfaceType,
  IpConfig,
  Ipv6Config,
  MirrorConfig,
  OffloadConfig,
  RingBufferConfig,
  VifCRecord,
  VifRecord,
  VifSRecord,
} from './types';

function flag(tree: ConfigTree, key: string): true | null {
  return hasKey(tree, key) ? true : null;
}

/**
 * Fields every interface type carries
 */
export function parseCommonFields(
  name: string,
  type: InterfaceType,
  config: ConfigTree,
): InterfaceRecord {
  return {
    name,
    type,
    addresses: getStringList(config, 'address'),
    description: getString(config, 'description'),
    vrf: getString(config, 'vrf'),
    mtu: getString(config, 'mtu'),
    disable: flag(config, 'disable'),
  };
}

export function parseOffload(config: ConfigTree): OffloadConfig | null {
  const offload = getSubtree(config, 'offload');
  if (!offload) {
    return null;
  }
  return {
    gro: hasKey(offload, 'gro'),
    gso: hasKey(offload, 'gso'),
    lro: hasKey(offload, 'lro'),
    rps: hasKey(offload, 'rps'),
    rfs: hasKey(offload, 'rfs'),
    sg: hasKey(offload, 'sg'),
    tso: hasKey(offload, 'tso'),
  };
}

export function parseRingBuffer(config: ConfigTree): RingBufferConfig | null {
  const ring = getSubtree(config, 'ring-buffer');
  if (!ring) {
    return null;
  }
  return {
    rx: getString(ring, 'rx'),
    tx: getString(ring, 'tx'),
  };
}

export function parseIp(config: ConfigTree): IpConfig | null {
  const ip = getSubtree(config, 'ip');
  if (!ip) {
    return null;
  }
  return {
    adjustMss: getString(ip, 'adjust-mss'),
    arpCacheTimeout: getString(ip, 'arp-cache-timeout'),
    disableArpFilter: hasKey(ip, 'disable-arp-filter'),
    disableForwarding: hasKey(ip, 'disable-forwarding'),
    enableArpAccept: hasKey(ip, 'enable-arp-accept'),
    enableArpAnnounce: hasKey(ip, 'enable-arp-announce'),
    enableArpIgnore: hasKey(ip, 'enable-arp-ignore'),
    enableProxyArp: hasKey(ip, 'enable-proxy-arp'),
    proxyArpPvlan: hasKey(ip, 'proxy-arp-pvlan'),
    sourceValidation: getString(ip, 'source-validation'),
    enableDirectedBroadcast: hasKey(ip, 'enable-directed-broadcast'),
  };
}

export function parseIpv6(config: ConfigTree): Ipv6Config | null {
  const ipv6 = getSubtree(config, 'ipv6');
  if (!ipv6) {
    return null;
  }
  const address = getSubtree(ipv6, 'address') ?? {};
  return {
    autoconf: hasKey(address, 'autoconf'),
    eui64: getStringList(address, 'eui64'),
    noDefaultLinkLocal: hasKey(address, 'no-default-link-local'),
    adjustMss: getString(ipv6, 'adjust-mss'),
    disableForwarding: hasKey(ipv6, 'disable-forwarding'),
    dupAddrDetectTransmits: getString(ipv6, 'dup-addr-detect-transmits'),
  };
}

export function parseDhcpOptions(config: ConfigTree): DhcpOptions | null {
  const dhcp = getSubtree(config, 'dhcp-options');
  if (!dhcp) {
    return null;
  }
  return {
    clientId: getString(dhcp, 'client-id'),
    hostName: getString(dhcp, 'host-name'),
    vendorClassId: getString(dhcp, 'vendor-class-id'),
    defaultRouteDistance: getString(dhcp, 'default-route-distance'),
    noDefaultRoute: hasKey(dhcp, 'no-default-route'),
    reject: getStringList(dhcp, 'reject'),
  };
}

export function parseDhcpv6Options(config: ConfigTree): Dhcpv6Options | null {
  const dhcpv6 = getSubtree(config, 'dhcpv6-options');
  if (!dhcpv6) {
    return null;
  }
  return {
    duid: getString(dhcpv6, 'duid'),
    parametersOnly: hasKey(dhcpv6, 'parameters-only'),
    rapidCommit: hasKey(dhcpv6, 'rapid-commit'),
    temporary: hasKey(dhcpv6, 'temporary'),
  };
}

/**
 * Iterate the map entries of a VLAN block, skipping malformed (non-map) entries
 */
function vlanEntries(block: ConfigTree): Array<[string, ConfigTree]> {
  const entries: Array<[string, ConfigTree]> = [];
  for (const [vlanId, value] of Object.entries(block)) {
    if (isConfigTree(value)) {
      entries.push([vlanId, value]);
    }
  }
  return entries;
}

function parseVifCommon(vlanId: string, config: ConfigTree): VifCRecord {
  return {
    vlanId,
    addresses: getStringList(config, 'address'),
    description: getString(config, 'description'),
    mtu: getString(config, 'mtu'),
    disable: flag(config, 'disable'),
  };
}

export function parseVif(config: ConfigTree): VifRecord[] | null {
  const vif = getSubtree(config, 'vif');
  if (!vif) {
    return null;
  }
  return vlanEntries(vif).map(([vlanId, vlan]) => ({
    ...parseVifCommon(vlanId, vlan),
    vrf: getString(vlan, 'vrf'),
  }));
}

export function parseVifS(config: ConfigTree): VifSRecord[] | null {
  const vifS = getSubtree(config, 'vif-s');
  if (!vifS) {
    return null;
  }
  return vlanEntries(vifS).map(([vlanId, vlan]) => {
    const vifC = getSubtree(vlan, 'vif-c');
    return {
      ...parseVifCommon(vlanId, vlan),
      protocol: getString(vlan, 'protocol'),
      vifC: vifC ? vlanEntries(vifC).map(([innerId, inner]) => parseVifCommon(innerId, inner)) : null,
    };
  });
}

export function parseMirror(config: ConfigTree): MirrorConfig | null {
  const mirror = getSubtree(config, 'mirror');
  if (!mirror) {
    return null;
  }
  return {
    ingress: getString(mirror, 'ingress'),
    egress: getString(mirror, 'egress'),
  };
}

export function parseEapol(config: ConfigTree): EapolConfig | null {
  const eapol = getSubtree(config, 'eapol');
  if (!eapol) {
    return null;
  }
  return {
    caCertificate: getString(eapol, 'ca-certificate'),
    certificate: getString(eapol, 'certificate'),
  };
}

export function parseEvpn(config: ConfigTree): EvpnConfig | null {
  const evpn = getSubtree(config, 'evpn');
  if (!evpn) {
    return null;
  }
  return { uplink: hasKey(evpn, 'uplink') };
}

/**
 * Parse every interface of one type and tally the totals.
 * Entries that are not nested maps are skipped.
 */
export function summarizeInterfaces<R extends InterfaceRecord>(
  type: InterfaceType,
  rawFamilyConfig: unknown,
  parseSingle: (name: string, config: ConfigTree) => R,
): InterfaceSummary<R> {
  const familyConfig = asConfigTree(rawFamilyConfig, `${type} interface configuration`);
  const interfaces: R[] = [];
  const byVrf = new Map<string, number>();

  for (const [name, value] of Object.entries(familyConfig)) {
    if (!isConfigTree(value)) {
      continue;
    }

    const record = parseSingle(name, value);
    interfaces.push(record);

    if (record.vrf) {
      byVrf.set(record.vrf, (byVrf.get(record.vrf) ?? 0) + 1);
    }
  }

  const byType: Partial<Record<InterfaceType, number>> = {};
  byType[type] = interfaces.length;

  return {
    interfaces,
    total: interfaces.length,
    byType,
    byVrf: Object.fromEntries(byVrf),
  };
}
