// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * Per-version differences of the ethernet interface schema.
 *
 * The base mapper describes VyOS 1.5. Each entry lists only what a version
 * does differently; everything else falls through to the base.
 */

import { UnsupportedFeatureError } from '../../utils/errors';
import { parseIp } from '../../parsers/interfaceParser';
import { VyosVersion } from '../versions';
import type { EthernetVersionProfile } from './ethernet';

const V1_4: EthernetVersionProfile = {
  paths: (mapper) => ({
    getIpEnableDirectedBroadcast: () => {
      throw new UnsupportedFeatureError('enable-directed-broadcast', '1.5', mapper.version);
    },
  }),
  parsers: {
    ip: (config) => {
      const ip = parseIp(config);
      // Not part of the 1.4 schema
      return ip ? { ...ip, enableDirectedBroadcast: null } : null;
    },
  },
};

export const ETHERNET_VERSION_PROFILES: Record<VyosVersion, EthernetVersionProfile> = {
  '1.4': V1_4,
  '1.5': {},
};
