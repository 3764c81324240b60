// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { InterfaceMapper } from '../mappers/interfaces/interfaceMapper';
import { BatchBuilder } from './batchBuilder';

/**
 * Operations every interface type supports, resolved through the bound mapper
 */
export class InterfaceBatchBuilder<M extends InterfaceMapper> extends BatchBuilder {
  readonly mapper: M;

  constructor(mapper: M) {
    super();
    this.mapper = mapper;
  }

  get version(): string {
    return this.mapper.version;
  }

  setInterfaceDescription(iface: string, description: string): this {
    return this.addSet(this.mapper.getDescription(iface, description));
  }

  deleteInterfaceDescription(iface: string): this {
    return this.addDelete(this.mapper.getDescriptionPath(iface));
  }

  setInterfaceAddress(iface: string, address: string): this {
    return this.addSet(this.mapper.getAddress(iface, address));
  }

  deleteInterfaceAddress(iface: string, address: string): this {
    return this.addDelete(this.mapper.getAddress(iface, address));
  }

  setInterfaceMtu(iface: string, mtu: string): this {
    return this.addSet(this.mapper.getMtu(iface, mtu));
  }

  deleteInterfaceMtu(iface: string): this {
    return this.addDelete(this.mapper.getMtuPath(iface));
  }

  setInterfaceVrf(iface: string, vrf: string): this {
    return this.addSet(this.mapper.getVrf(iface, vrf));
  }

  /**
   * Remove the VRF binding; with `vrf` only when it matches that value
   */
  deleteInterfaceVrf(iface: string, vrf?: string): this {
    return this.addDelete(vrf ? this.mapper.getVrf(iface, vrf) : this.mapper.getVrfPath(iface));
  }

  /** Administratively disable */
  setInterfaceDisable(iface: string): this {
    return this.addSet(this.mapper.getDisable(iface));
  }

  /** Re-enable */
  deleteInterfaceDisable(iface: string): this {
    return this.addDelete(this.mapper.getDisable(iface));
  }

  deleteInterface(iface: string): this {
    return this.addDelete(this.mapper.getInterface(iface));
  }
}
