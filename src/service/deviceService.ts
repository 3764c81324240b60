// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { ConfigTransport, ConfigureResult, VyosClient } from '../api/client';
import { BatchBuilder } from '../builders/batchBuilder';
import { DummyBatchBuilder } from '../builders/dummyBatch';
import { EthernetBatchBuilder } from '../builders/ethernetBatch';
import { RawBatchBuilder } from '../builders/rawBatch';
import { DeviceProfile } from '../config/types';
import { formatPath } from '../mappers/commandPath';
import { FEATURE_FAMILIES, getMapperRegistry } from '../mappers/registry';
import { ConfigTree, sliceTree } from '../parsers/configTree';
import {
  DummyInterfaceRecord,
  EthernetInterfaceRecord,
  InterfaceSummary,
  InterfaceType,
} from '../parsers/types';
import { EmptyBatchError, UnknownFeatureError } from '../utils/errors';
import { getLogger } from '../utils/logger';

export interface InterfaceRecordsByType {
  ethernet: EthernetInterfaceRecord;
  dummy: DummyInterfaceRecord;
}

/**
 * One managed router: creates version-bound batches, submits them and serves
 * the (cached) running configuration.
 */
export class VyosDeviceService {
  private readonly logger = getLogger();
  private readonly transport: ConfigTransport;
  private cachedConfig: ConfigTree | null = null;

  constructor(
    readonly profile: DeviceProfile,
    transport?: ConfigTransport,
  ) {
    this.transport = transport ?? new VyosClient(profile);
  }

  get name(): string {
    return this.profile.name;
  }

  getVersion(): string {
    return this.profile.version;
  }

  createEthernetBatch(): EthernetBatchBuilder {
    const mapper = getMapperRegistry().resolve(FEATURE_FAMILIES.ETHERNET, this.profile.version);
    return new EthernetBatchBuilder(mapper);
  }

  createDummyBatch(): DummyBatchBuilder {
    const mapper = getMapperRegistry().resolve(FEATURE_FAMILIES.DUMMY, this.profile.version);
    return new DummyBatchBuilder(mapper);
  }

  createRawBatch(): RawBatchBuilder {
    return new RawBatchBuilder();
  }

  /**
   * Submit every queued operation as one configure request.
   * On success the batch is consumed and the cached configuration dropped.
   */
  async executeBatch(batch: BatchBuilder): Promise<ConfigureResult> {
    batch.assertExecutable();
    if (batch.isEmpty()) {
      throw new EmptyBatchError();
    }

    const operations = batch.getOperations();
    this.logger.info(`Applying ${operations.length} operations to ${this.name}`);
    for (const operation of operations) {
      this.logger.debug(`${operation.op} ${formatPath(operation.path)}`);
    }

    batch.beginExecution();
    let result: ConfigureResult;
    try {
      result = await this.transport.configureMultiple(operations);
    } catch (error) {
      batch.abortExecution();
      throw error;
    }
    batch.markExecuted();
    this.invalidateCache();
    return result;
  }

  /**
   * Full running configuration, fetched once and reused until refreshed
   */
  async getFullConfig(forceRefresh = false): Promise<ConfigTree> {
    if (this.cachedConfig && !forceRefresh) {
      return this.cachedConfig;
    }

    this.logger.debug(`Fetching configuration from ${this.name}`);
    this.cachedConfig = await this.transport.showConfig();
    return this.cachedConfig;
  }

  invalidateCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Normalized records for every interface of one type
   */
  async getInterfacesOfType<T extends InterfaceType>(
    type: T,
    forceRefresh?: boolean,
  ): Promise<InterfaceSummary<InterfaceRecordsByType[T]>>;
  async getInterfacesOfType(
    type: InterfaceType,
    forceRefresh = false,
  ): Promise<InterfaceSummary<EthernetInterfaceRecord | DummyInterfaceRecord>> {
    // Callers outside the type system may pass any string
    const family = `interface_${type}`;
    const registry = getMapperRegistry();
    if (!registry.hasFamily(family)) {
      throw new UnknownFeatureError(family);
    }

    const config = await this.getFullConfig(forceRefresh);
    const familyConfig = sliceTree(config, ['interfaces', type]);

    return registry.resolve(family, this.profile.version).parseInterfacesOfType(familyConfig);
  }
}
