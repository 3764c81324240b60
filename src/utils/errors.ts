// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { getLogger } from './logger';

/**
 * Base class for every error raised by the mapping, batching and device layers.
 * `status` is the HTTP-like code a request handler reports for it.
 */
export class VyosError extends Error {
  readonly status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = 'VyosError';
    this.status = status;
  }
}

/**
 * Requested feature-family was never registered
 */
export class UnknownFeatureError extends VyosError {
  readonly feature: string;

  constructor(feature: string) {
    super(`Unknown feature: ${feature}`, 500);
    this.name = 'UnknownFeatureError';
    this.feature = feature;
  }
}

/**
 * Attribute exists in the configuration schema but not on the bound device version
 */
export class UnsupportedFeatureError extends VyosError {
  readonly feature: string;
  readonly requiredVersion: string;
  readonly currentVersion: string;

  constructor(feature: string, requiredVersion: string, currentVersion: string) {
    super(
      `${feature} requires VyOS ${requiredVersion}+. Current device is running v${currentVersion}`,
      400,
    );
    this.name = 'UnsupportedFeatureError';
    this.feature = feature;
    this.requiredVersion = requiredVersion;
    this.currentVersion = currentVersion;
  }
}

export class EmptyBatchError extends VyosError {
  constructor() {
    super('Cannot execute empty batch', 400);
    this.name = 'EmptyBatchError';
  }
}

/**
 * A batch that was already applied to the device, executed or appended to again
 */
export class BatchConsumedError extends VyosError {
  constructor() {
    super('Batch has already been executed; call clear() before reusing it', 409);
    this.name = 'BatchConsumedError';
  }
}

/**
 * A batch submitted again while its first submission is still pending
 */
export class BatchInFlightError extends VyosError {
  constructor() {
    super('Batch is already being executed', 409);
    this.name = 'BatchInFlightError';
  }
}

/**
 * Compound argument (e.g. "vlan,address") that does not split into the expected parts
 */
export class MalformedValueError extends VyosError {
  readonly value: string;
  readonly expectedFormat: string;

  constructor(value: string, expectedFormat: string) {
    super(`Malformed value '${value}': expected format '${expectedFormat}'`, 400);
    this.name = 'MalformedValueError';
    this.value = value;
    this.expectedFormat = expectedFormat;
  }
}

export class ConfigParseError extends VyosError {
  constructor(message: string) {
    super(message, 502);
    this.name = 'ConfigParseError';
  }
}

/**
 * Named operation that a feature-family does not offer, or that lacks its value
 */
export class UnsupportedOperationError extends VyosError {
  readonly operation: string;

  constructor(operation: string, detail?: string) {
    super(detail ?? `Unsupported operation: ${operation}`, 400);
    this.name = 'UnsupportedOperationError';
    this.operation = operation;
  }
}

export class DeviceNotFoundError extends VyosError {
  readonly device: string;

  constructor(device: string) {
    super(`Device '${device}' not found in registry`, 404);
    this.name = 'DeviceNotFoundError';
    this.device = device;
  }
}

/**
 * Invalid device profile or environment configuration
 */
export class ConfigurationError extends VyosError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ConfigurationError';
  }
}

/**
 * Request payload that does not match its JSON schema
 */
export class InvalidRequestError extends VyosError {
  readonly details: string[];

  constructor(description: string, details: string[]) {
    super(`Invalid ${description}: ${details.join('; ')}`, 400);
    this.name = 'InvalidRequestError';
    this.details = details;
  }
}

export class RegistrySealedError extends VyosError {
  constructor(feature: string) {
    super(`Cannot register feature '${feature}': mapper registry is already initialized`, 500);
    this.name = 'RegistrySealedError';
  }
}

/**
 * Error returned by the device's HTTP API
 */
export class DeviceApiError extends VyosError {
  readonly statusCode: number;
  readonly body: string;
  readonly endpoint?: string;

  constructor(statusCode: number, body: string, endpoint?: string) {
    super(`API Error ${statusCode}: ${body}`, 502);
    this.name = 'DeviceApiError';
    this.statusCode = statusCode;
    this.body = body;
    this.endpoint = endpoint;
  }

  get isAuthError(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }

  get isNotFound(): boolean {
    return this.statusCode === 404;
  }

  get isServerError(): boolean {
    return this.statusCode >= 500;
  }

  get userFriendlyMessage(): string {
    if (this.isAuthError) {
      return 'Authentication failed. Please check the device API key.';
    }
    if (this.isNotFound) {
      return 'Endpoint not found. Is the HTTP API enabled on the device?';
    }
    if (this.isServerError) {
      return 'Device error. Please try again later.';
    }

    // VyOS wraps failures as {"success": false, "error": "..."}
    try {
      const parsed: unknown = JSON.parse(this.body);
      if (typeof parsed === 'object' && parsed !== null) {
        if ('error' in parsed && typeof parsed.error === 'string' && parsed.error) {
          return parsed.error;
        }
        if ('message' in parsed && typeof parsed.message === 'string' && parsed.message) {
          return parsed.message;
        }
      }
    } catch {
      // Body is not JSON
    }

    return this.message;
  }
}

/**
 * Outcome of an operation run through {@link withErrorHandling}
 */
export type OperationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; status: number; error: string; message: string };

/**
 * Map any thrown value to the status and message reported to a caller
 */
export function describeError(error: unknown): { status: number; error: string; message: string } {
  if (error instanceof DeviceApiError) {
    return { status: error.status, error: error.name, message: error.userFriendlyMessage };
  }
  if (error instanceof VyosError) {
    return { status: error.status, error: error.name, message: error.message };
  }
  if (error instanceof Error) {
    return { status: 500, error: error.name, message: error.message };
  }
  return { status: 500, error: 'Error', message: 'An unexpected error occurred' };
}

/**
 * Run an operation, logging failures and converting them to a failed outcome
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: string,
): Promise<OperationOutcome<T>> {
  const logger = getLogger();

  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    const described = describeError(error);
    if (described.status >= 500) {
      logger.error(`${context} failed`, error instanceof Error ? error : undefined);
    } else {
      logger.warn(`${context} rejected: ${described.message}`);
    }
    return { ok: false, ...described, message: `${context}: ${described.message}` };
  }
}
