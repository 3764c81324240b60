// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { ConfigTransport } from '../api/client';
import { DeviceProfile } from '../config/types';
import { DeviceNotFoundError } from '../utils/errors';
import { getLogger } from '../utils/logger';
import { VyosDeviceService } from './deviceService';

/**
 * Named device services known to the process
 */
export class DeviceRegistry {
  private readonly logger = getLogger();
  private readonly devices = new Map<string, VyosDeviceService>();

  /**
   * Add or replace a device. A profile gets a service over the HTTP client
   * unless a transport is given.
   */
  register(
    name: string,
    device: DeviceProfile | VyosDeviceService,
    transport?: ConfigTransport,
  ): VyosDeviceService {
    const service =
      device instanceof VyosDeviceService ? device : new VyosDeviceService(device, transport);
    if (this.devices.has(name)) {
      this.logger.warn(`Replacing registered device: ${name}`);
    }
    this.devices.set(name, service);
    return service;
  }

  get(name: string): VyosDeviceService {
    const service = this.devices.get(name);
    if (!service) {
      throw new DeviceNotFoundError(name);
    }
    return service;
  }

  has(name: string): boolean {
    return this.devices.has(name);
  }

  /**
   * @returns false when no device had that name
   */
  unregister(name: string): boolean {
    return this.devices.delete(name);
  }

  listDevices(): string[] {
    return [...this.devices.keys()];
  }

  clear(): void {
    this.devices.clear();
  }
}
