// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * On-disk layout of stored device profiles:
 *
 *   <config root>/vyos-batch/
 *   ├── active_device      # Plain text: active device name
 *   └── devices/
 *       ├── edge-1.json
 *       └── lab.json
 *
 * The config root is %APPDATA% on Windows, otherwise $XDG_CONFIG_HOME or ~/.config.
 */

import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '../utils/errors';

const APP_NAME = 'vyos-batch';

/** Owner read/write only */
export const FILE_MODE = 0o600;

/** Owner read/write/execute only */
export const DIR_MODE = 0o700;

const DEVICE_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export interface ConfigPaths {
  root: string;
  devicesDir: string;
  activeDevice: string;
}

/**
 * Resolve the layout for an environment; defaults to the current process
 */
export function resolveConfigPaths(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): ConfigPaths {
  const base =
    platform === 'win32'
      ? env.APPDATA || os.homedir()
      : env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  const root = path.join(base, APP_NAME);

  return {
    root,
    devicesDir: path.join(root, 'devices'),
    activeDevice: path.join(root, 'active_device'),
  };
}

export function isValidDeviceName(name: string): boolean {
  return DEVICE_NAME_PATTERN.test(name);
}

/**
 * Profile file for `name`. Names are checked here so no caller can build a
 * path outside the devices directory.
 */
export function getDeviceProfilePath(name: string, paths = resolveConfigPaths()): string {
  if (!isValidDeviceName(name)) {
    throw new ConfigurationError(
      `Invalid device name: ${name}. Must be alphanumeric, dash, or underscore only (max 64 chars).`,
    );
  }
  return path.join(paths.devicesDir, `${name}.json`);
}
