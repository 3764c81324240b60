// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * Mapper Registry: catalog of feature-families and the mapper that serves
 * each one. Populated once by {@link initRegistry}; read-only afterwards.
 */

import { RegistrySealedError, UnknownFeatureError } from '../utils/errors';
import { getLogger } from '../utils/logger';
import { FeatureMapper, MapperEntry, fromClass, instantiate } from './base';
import { DummyInterfaceMapper } from './interfaces/dummy';
import { EthernetInterfaceMapper } from './interfaces/ethernet';

const logger = getLogger();

export const FEATURE_FAMILIES = {
  ETHERNET: 'interface_ethernet',
  DUMMY: 'interface_dummy',
} as const;

/**
 * Mapper type served for each built-in family name
 */
export interface BuiltinMappers {
  interface_ethernet: EthernetInterfaceMapper;
  interface_dummy: DummyInterfaceMapper;
}

type MapperCatalog<M> = Record<keyof M, FeatureMapper>;

type RegistryEntries<M extends MapperCatalog<M>> = { [K in keyof M]?: MapperEntry<M[K]> };

export class MapperRegistry<M extends MapperCatalog<M> = BuiltinMappers> {
  private readonly entries: RegistryEntries<M> = {};
  private sealed = false;

  /**
   * Associate a family with a mapper class or factory. Last registration wins.
   */
  register<K extends keyof M & string>(family: K, entry: MapperEntry<M[K]>): this {
    if (this.sealed) {
      throw new RegistrySealedError(family);
    }
    this.entries[family] = entry;
    return this;
  }

  /**
   * Freeze the catalog; further registrations throw
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  hasFamily(family: string): family is keyof M & string {
    return Object.prototype.hasOwnProperty.call(this.entries, family);
  }

  getFamilies(): Array<keyof M & string> {
    return Object.keys(this.entries).filter((family): family is keyof M & string =>
      this.hasFamily(family),
    );
  }

  /**
   * Create a fresh mapper for `family` bound to `version`
   */
  resolve<K extends keyof M & string>(family: K, version: string): M[K] {
    const entry = this.entries[family];
    if (!entry) {
      throw new UnknownFeatureError(family);
    }
    return instantiate(entry, version);
  }

  /**
   * Resolve a family given as an untyped name, e.g. from a request
   */
  resolveByName(family: string, version: string): FeatureMapper {
    if (!this.hasFamily(family)) {
      throw new UnknownFeatureError(family);
    }
    return this.resolve(family, version);
  }

  /**
   * One fresh mapper per registered family
   */
  resolveAll(version: string): Map<string, FeatureMapper> {
    const mappers = new Map<string, FeatureMapper>();
    for (const family of this.getFamilies()) {
      mappers.set(family, this.resolve(family, version));
    }
    return mappers;
  }
}

/**
 * Build and seal the registry of built-in families
 */
export function initRegistry(): MapperRegistry<BuiltinMappers> {
  const registry = new MapperRegistry<BuiltinMappers>()
    .register(FEATURE_FAMILIES.ETHERNET, fromClass(EthernetInterfaceMapper))
    .register(FEATURE_FAMILIES.DUMMY, fromClass(DummyInterfaceMapper))
    .seal();
  logger.debug(`Mapper registry initialized with ${registry.getFamilies().length} families`);
  return registry;
}

let registryInstance: MapperRegistry<BuiltinMappers> | null = null;

/**
 * Get the process-wide registry, initializing it on first use
 */
export function getMapperRegistry(): MapperRegistry<BuiltinMappers> {
  if (!registryInstance) {
    registryInstance = initRegistry();
  }
  return registryInstance;
}

/**
 * Reset the registry (for testing purposes)
 */
export function resetMapperRegistry(): void {
  registryInstance = null;
}
