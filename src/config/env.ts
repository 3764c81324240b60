// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { isSupportedVersion, SUPPORTED_VERSIONS } from '../mappers/versions';
import { ConfigurationError } from '../utils/errors';
import { isValidDeviceName } from './paths';
import { DeviceProfile, DeviceProtocol, PROFILE_DEFAULTS } from './types';

export const ENV_VARS = {
  NAME: 'VYOS_NAME',
  HOSTNAME: 'VYOS_HOSTNAME',
  API_KEY: 'VYOS_APIKEY',
  VERSION: 'VYOS_VERSION',
  PROTOCOL: 'VYOS_PROTOCOL',
  PORT: 'VYOS_PORT',
  VERIFY_SSL: 'VYOS_VERIFY_SSL',
  TIMEOUT: 'VYOS_TIMEOUT',
} as const;

const REQUIRED = [ENV_VARS.NAME, ENV_VARS.HOSTNAME, ENV_VARS.API_KEY, ENV_VARS.VERSION] as const;

type Env = Readonly<Record<string, string | undefined>>;

function parseProtocol(raw: string | undefined): DeviceProtocol {
  const value = raw?.trim().toLowerCase();
  if (!value) {
    return PROFILE_DEFAULTS.protocol;
  }
  if (value !== 'http' && value !== 'https') {
    throw new ConfigurationError(`${ENV_VARS.PROTOCOL} must be 'http' or 'https', got '${raw}'`);
  }
  return value;
}

function parsePort(raw: string | undefined): number {
  if (!raw?.trim()) {
    return PROFILE_DEFAULTS.port;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`${ENV_VARS.PORT} must be between 1 and 65535, got '${raw}'`);
  }
  return port;
}

function parseTimeout(raw: string | undefined): number {
  if (!raw?.trim()) {
    return PROFILE_DEFAULTS.timeout;
  }
  const timeout = Number(raw);
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigurationError(`${ENV_VARS.TIMEOUT} must be a positive number, got '${raw}'`);
  }
  return timeout;
}

function parseFlag(raw: string | undefined): boolean {
  if (!raw) {
    return PROFILE_DEFAULTS.verifySsl;
  }
  return ['true', '1', 'yes'].includes(raw.trim().toLowerCase());
}

/**
 * Build a device profile from `VYOS_*` environment variables
 */
export function loadDeviceFromEnv(env: Env = process.env): DeviceProfile {
  const missing = REQUIRED.filter((key) => !env[key]?.trim());
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const name = env[ENV_VARS.NAME]?.trim() ?? '';
  if (!isValidDeviceName(name)) {
    throw new ConfigurationError(`${ENV_VARS.NAME} is not a valid device name: '${name}'`);
  }

  const version = env[ENV_VARS.VERSION]?.trim() ?? '';
  if (!isSupportedVersion(version)) {
    throw new ConfigurationError(
      `${ENV_VARS.VERSION} must be one of ${SUPPORTED_VERSIONS.join(', ')}, got '${version}'`,
    );
  }

  return {
    name,
    hostname: env[ENV_VARS.HOSTNAME]?.trim() ?? '',
    apiKey: env[ENV_VARS.API_KEY]?.trim() ?? '',
    version,
    protocol: parseProtocol(env[ENV_VARS.PROTOCOL]),
    port: parsePort(env[ENV_VARS.PORT]),
    verifySsl: parseFlag(env[ENV_VARS.VERIFY_SSL]),
    timeout: parseTimeout(env[ENV_VARS.TIMEOUT]),
  };
}
