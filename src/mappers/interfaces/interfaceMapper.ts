// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { CommandPath, buildPath } from '../commandPath';
import { FeatureMapper } from '../base';
import { ConfigTree } from '../../parsers/configTree';
import { summarizeInterfaces } from '../../parsers/interfaceParser';
import { InterfaceRecord, InterfaceSummary, InterfaceType } from '../../parsers/types';

/**
 * Attributes shared by every interface type, rooted at
 * `interfaces <type> <name>`.
 *
 * Methods named after an attribute return the path to a value instance (used
 * by `set`, and by `delete` of one value among several such as an address).
 * Methods ending in `Path` return the path to the property itself, for
 * deleting a scalar property.
 */
export abstract class InterfaceMapper<R extends InterfaceRecord = InterfaceRecord>
  implements FeatureMapper
{
  readonly family: string;
  readonly version: string;
  readonly interfaceType: InterfaceType;

  protected constructor(version: string, interfaceType: InterfaceType) {
    this.version = version;
    this.interfaceType = interfaceType;
    this.family = `interface_${interfaceType}`;
  }

  protected path(iface: string, ...segments: string[]): CommandPath {
    return buildPath('interfaces', this.interfaceType, iface, segments);
  }

  getInterface(iface: string): CommandPath {
    return this.path(iface);
  }

  getDescription(iface: string, description: string): CommandPath {
    return this.path(iface, 'description', description);
  }

  getDescriptionPath(iface: string): CommandPath {
    return this.path(iface, 'description');
  }

  getAddress(iface: string, address: string): CommandPath {
    return this.path(iface, 'address', address);
  }

  getMtu(iface: string, mtu: string): CommandPath {
    return this.path(iface, 'mtu', mtu);
  }

  getMtuPath(iface: string): CommandPath {
    return this.path(iface, 'mtu');
  }

  getDisable(iface: string): CommandPath {
    return this.path(iface, 'disable');
  }

  getVrf(iface: string, vrf: string): CommandPath {
    return this.path(iface, 'vrf', vrf);
  }

  getVrfPath(iface: string): CommandPath {
    return this.path(iface, 'vrf');
  }

  abstract parseSingleInterface(name: string, config: ConfigTree): R;

  /**
   * Parse the raw `interfaces <type>` subtree into records and counts
   */
  parseInterfacesOfType(config: unknown): InterfaceSummary<R> {
    return summarizeInterfaces(this.interfaceType, config, (name, ifaceConfig) =>
      this.parseSingleInterface(name, ifaceConfig),
    );
  }
}
