// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * File-backed store of device profiles
 *
 * Profiles stored at: ~/.config/vyos-batch/devices/{name}.json
 * Active device at: ~/.config/vyos-batch/active_device
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../utils/errors';
import { getLogger } from '../utils/logger';
import { validateDeviceProfile } from '../utils/validation';
import {
  ConfigPaths,
  DIR_MODE,
  FILE_MODE,
  getDeviceProfilePath,
  isValidDeviceName,
  resolveConfigPaths,
} from './paths';
import { DeviceProfile, DeviceProfileInput, withDefaults } from './types';

const logger = getLogger();

/**
 * Write `content` to `target` through a temp file and rename
 */
async function writeAtomic(target: string, content: string): Promise<void> {
  const tempPath = `${target}.tmp.${process.pid}`;

  try {
    await fs.promises.writeFile(tempPath, content, { encoding: 'utf-8', mode: FILE_MODE });
    await fs.promises.rename(tempPath, target);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.debug(`Could not remove ${tempPath}: ${String(cleanupError)}`);
    });
    throw error;
  }
}

export class DeviceProfileManager {
  /**
   * @param configPaths - layout to use; resolved from the environment on each call when omitted
   */
  constructor(private readonly configPaths?: ConfigPaths) {}

  private get paths(): ConfigPaths {
    return this.configPaths ?? resolveConfigPaths();
  }

  private profilePath(name: string): string {
    return getDeviceProfilePath(name, this.paths);
  }

  async ensureDirectories(): Promise<void> {
    const { root, devicesDir } = this.paths;
    for (const dir of [root, devicesDir]) {
      await fs.promises.mkdir(dir, { recursive: true, mode: DIR_MODE });
    }
  }

  /**
   * All readable profiles, sorted by name. Invalid files are skipped.
   */
  async list(): Promise<DeviceProfile[]> {
    const { devicesDir } = this.paths;

    if (!fs.existsSync(devicesDir)) {
      return [];
    }

    const files = await fs.promises.readdir(devicesDir);
    const profiles: DeviceProfile[] = [];

    for (const file of files.filter((entry) => entry.endsWith('.json')).sort()) {
      const profile = await this.get(path.basename(file, '.json'));
      if (profile) {
        profiles.push(profile);
      }
    }

    return profiles;
  }

  /**
   * Load a profile with defaults applied; `null` if missing or invalid
   */
  async get(name: string): Promise<DeviceProfile | null> {
    if (!isValidDeviceName(name)) {
      return null;
    }

    const profilePath = this.profilePath(name);
    if (!fs.existsSync(profilePath)) {
      return null;
    }

    const content = await fs.promises.readFile(profilePath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger.warn(`Skipping malformed device profile: ${name}`, String(error));
      return null;
    }

    // File name wins over the stored name
    const candidate =
      typeof parsed === 'object' && parsed !== null ? { ...parsed, name } : parsed;
    const result = validateDeviceProfile(candidate);
    if (!result.valid) {
      logger.warn(`Skipping invalid device profile: ${name}`, result.errors);
      return null;
    }

    return withDefaults(result.value);
  }

  /**
   * Create or replace a profile
   */
  async save(profile: DeviceProfileInput): Promise<void> {
    const target = this.profilePath(profile.name);

    const result = validateDeviceProfile(profile);
    if (!result.valid) {
      throw new ConfigurationError(
        `Invalid device profile '${profile.name}': ${result.errors.join('; ')}`,
      );
    }

    await this.ensureDirectories();
    await writeAtomic(target, JSON.stringify(profile, null, 2));
    logger.debug(`Saved device profile: ${profile.name}`);
  }

  async delete(name: string): Promise<void> {
    const target = this.profilePath(name);

    const wasActive = (await this.getActive()) === name;
    await fs.promises.rm(target, { force: true });

    if (wasActive) {
      await this.clearActive();
    }
  }

  async exists(name: string): Promise<boolean> {
    return isValidDeviceName(name) && fs.existsSync(this.profilePath(name));
  }

  /**
   * Name of the active device, if it is set and still has a profile
   */
  async getActive(): Promise<string | null> {
    const activePath = this.paths.activeDevice;

    if (!fs.existsSync(activePath)) {
      return null;
    }

    const name = (await fs.promises.readFile(activePath, 'utf-8')).trim();
    if (!name || !(await this.exists(name))) {
      return null;
    }

    return name;
  }

  async setActive(name: string): Promise<void> {
    if (!fs.existsSync(this.profilePath(name))) {
      throw new ConfigurationError(`Device profile not found: ${name}`);
    }

    await this.ensureDirectories();
    await writeAtomic(this.paths.activeDevice, name);
  }

  async clearActive(): Promise<void> {
    await fs.promises.rm(this.paths.activeDevice, { force: true });
  }

  async getActiveProfile(): Promise<DeviceProfile | null> {
    const name = await this.getActive();
    return name ? this.get(name) : null;
  }
}
