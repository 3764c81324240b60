// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * Request/response entry points for interface configuration. Every function
 * resolves to an {@link OperationOutcome} instead of throwing.
 */

import { BatchBuilder } from '../builders/batchBuilder';
import { applyOperations, DUMMY_OPERATIONS, ETHERNET_OPERATIONS } from '../builders/batchRequest';
import { BatchOperation } from '../mappers/commandPath';
import { InterfaceSummary, InterfaceType } from '../parsers/types';
import { DeviceRegistry } from '../service/deviceRegistry';
import { InterfaceRecordsByType, VyosDeviceService } from '../service/deviceService';
import {
  InvalidRequestError,
  OperationOutcome,
  UnknownFeatureError,
  withErrorHandling,
} from '../utils/errors';
import { InterfaceBatchRequest, validateBatchRequest } from '../utils/validation';

export interface BatchSummary {
  device: string;
  version: string;
  operationCount: number;
  operations: BatchOperation[];
}

function buildInterfaceBatch(
  service: VyosDeviceService,
  family: InterfaceType,
  request: InterfaceBatchRequest,
): BatchBuilder {
  switch (family) {
    case 'ethernet':
      return applyOperations(
        service.createEthernetBatch(),
        ETHERNET_OPERATIONS,
        request.interface,
        request.operations,
      );
    case 'dummy':
      return applyOperations(
        service.createDummyBatch(),
        DUMMY_OPERATIONS,
        request.interface,
        request.operations,
      );
    default:
      // Reachable from untyped callers
      throw new UnknownFeatureError(`interface_${String(family)}`);
  }
}

async function executeInterfaceRequest(
  service: VyosDeviceService,
  family: InterfaceType,
  request: InterfaceBatchRequest,
): Promise<BatchSummary> {
  const batch = buildInterfaceBatch(service, family, request);
  const operations = batch.getOperations();
  await service.executeBatch(batch);
  return {
    device: service.name,
    version: service.getVersion(),
    operationCount: operations.length,
    operations,
  };
}

/**
 * Validate a named-operation request for one interface and apply it as one batch
 */
export function configureInterfaceBatch(
  devices: DeviceRegistry,
  deviceName: string,
  family: InterfaceType,
  request: unknown,
): Promise<OperationOutcome<BatchSummary>> {
  return withErrorHandling(async () => {
    const validated = validateBatchRequest(request);
    if (!validated.valid) {
      throw new InvalidRequestError('interface batch request', validated.errors);
    }
    return executeInterfaceRequest(devices.get(deviceName), family, validated.value);
  }, `Configure ${family} interfaces on ${deviceName}`);
}

/**
 * Apply caller-supplied `{ op, path }` records without version checks
 */
export function configureRawBatch(
  devices: DeviceRegistry,
  deviceName: string,
  operations: unknown,
): Promise<OperationOutcome<BatchSummary>> {
  return withErrorHandling(async () => {
    const service = devices.get(deviceName);
    const batch = service.createRawBatch().addOperations(operations);
    const queued = batch.getOperations();
    await service.executeBatch(batch);
    return {
      device: service.name,
      version: service.getVersion(),
      operationCount: queued.length,
      operations: queued,
    };
  }, `Apply raw operations on ${deviceName}`);
}

export function getInterfaceConfig<T extends InterfaceType>(
  devices: DeviceRegistry,
  deviceName: string,
  family: T,
  forceRefresh = false,
): Promise<OperationOutcome<InterfaceSummary<InterfaceRecordsByType[T]>>> {
  return withErrorHandling(
    () => devices.get(deviceName).getInterfacesOfType(family, forceRefresh),
    `Read ${family} interfaces on ${deviceName}`,
  );
}
