// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import type { VyosVersion } from '../mappers/versions';

export type DeviceProtocol = 'http' | 'https';

/**
 * Device profile as stored on disk; connection settings may be omitted
 */
export interface DeviceProfileInput {
  name: string;
  hostname: string;
  apiKey: string;
  version: VyosVersion;
  protocol?: DeviceProtocol;
  port?: number;
  verifySsl?: boolean;
  /** Request timeout in seconds */
  timeout?: number;
}

/**
 * Device profile with every connection setting resolved
 */
export type DeviceProfile = Required<DeviceProfileInput>;

export const PROFILE_DEFAULTS = {
  protocol: 'https',
  port: 443,
  verifySsl: false,
  timeout: 10,
} as const satisfies Pick<DeviceProfile, 'protocol' | 'port' | 'verifySsl' | 'timeout'>;

export function withDefaults(input: DeviceProfileInput): DeviceProfile {
  return {
    name: input.name,
    hostname: input.hostname,
    apiKey: input.apiKey,
    version: input.version,
    protocol: input.protocol ?? PROFILE_DEFAULTS.protocol,
    port: input.port ?? PROFILE_DEFAULTS.port,
    verifySsl: input.verifySsl ?? PROFILE_DEFAULTS.verifySsl,
    timeout: input.timeout ?? PROFILE_DEFAULTS.timeout,
  };
}
