// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { getLogger } from '../utils/logger';

export const SUPPORTED_VERSIONS = ['1.4', '1.5'] as const;

export type VyosVersion = (typeof SUPPORTED_VERSIONS)[number];

/** Version whose behavior unrecognized version strings receive */
export const LATEST_VERSION: VyosVersion = '1.5';

export function isSupportedVersion(version: string): version is VyosVersion {
  return SUPPORTED_VERSIONS.some((known) => known === version);
}

/**
 * Resolve a device version string to a known version.
 * Unrecognized strings get the newest known behavior.
 */
export function resolveVersion(version: string): VyosVersion {
  if (isSupportedVersion(version)) {
    return version;
  }
  getLogger().warn(`Unrecognized VyOS version '${version}', using ${LATEST_VERSION} behavior`);
  return LATEST_VERSION;
}
