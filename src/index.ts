// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

export { ConfigTransport, ConfigureResult, ENDPOINTS, VyosClient } from './api/client';
export { BatchBuilder } from './builders/batchBuilder';
export {
  DUMMY_OPERATIONS,
  ETHERNET_OPERATIONS,
  applyOperations,
  getSupportedOperations,
  splitValue,
} from './builders/batchRequest';
export { DummyBatchBuilder } from './builders/dummyBatch';
export { EthernetBatchBuilder } from './builders/ethernetBatch';
export { InterfaceBatchBuilder } from './builders/interfaceBatch';
export { RawBatchBuilder } from './builders/rawBatch';
export { DeviceProfileManager } from './config/deviceProfiles';
export { ENV_VARS, loadDeviceFromEnv } from './config/env';
export * from './config/paths';
export { DeviceProfile, DeviceProfileInput, DeviceProtocol, withDefaults } from './config/types';
export {
  BatchSummary,
  configureInterfaceBatch,
  configureRawBatch,
  getInterfaceConfig,
} from './handlers/interfaces';
export { FeatureMapper, MapperEntry, fromClass, fromFactory } from './mappers/base';
export * from './mappers/commandPath';
export { DummyInterfaceMapper } from './mappers/interfaces/dummy';
export * from './mappers/interfaces/ethernet';
export { ETHERNET_VERSION_PROFILES } from './mappers/interfaces/ethernetVersions';
export { InterfaceMapper } from './mappers/interfaces/interfaceMapper';
export {
  BuiltinMappers,
  FEATURE_FAMILIES,
  MapperRegistry,
  getMapperRegistry,
  initRegistry,
  resetMapperRegistry,
} from './mappers/registry';
export * from './mappers/versions';
export * from './parsers/configTree';
export * from './parsers/types';
export { DeviceRegistry } from './service/deviceRegistry';
export { InterfaceRecordsByType, VyosDeviceService } from './service/deviceService';
export * from './utils/errors';
export { LogLevel, Logger, getLogger } from './utils/logger';
export {
  InterfaceBatchRequest,
  InterfaceOperationRequest,
  ValidationResult,
  validateBatchRequest,
  validateDeviceProfile,
  validateRawOperations,
} from './utils/validation';
