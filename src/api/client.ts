// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import * as http from 'http';
import * as https from 'https';
import { DeviceProfile } from '../config/types';
import { BatchOperation, CommandPath } from '../mappers/commandPath';
import { ConfigTree, asConfigTree } from '../parsers/configTree';
import { ConfigParseError, DeviceApiError } from '../utils/errors';
import { getLogger } from '../utils/logger';

/**
 * Device endpoints the batch layer depends on. {@link VyosClient} talks to a
 * real router; tests substitute an in-memory implementation.
 */
export interface ConfigTransport {
  /** Apply an ordered list of operations as a single commit */
  configureMultiple(operations: readonly BatchOperation[]): Promise<ConfigureResult>;
  /** Configuration subtree at `path`, the whole tree by default */
  showConfig(path?: CommandPath): Promise<ConfigTree>;
}

export interface ConfigureResult {
  success: true;
  data: unknown;
}

/**
 * Envelope of every device API response
 */
interface ApiEnvelope {
  success: boolean;
  data: unknown;
  error: string | null;
}

interface HttpResponse {
  statusCode: number;
  body: string;
}

export const ENDPOINTS = {
  CONFIGURE: '/configure',
  RETRIEVE: '/retrieve',
} as const;

function isApiEnvelope(value: unknown): value is ApiEnvelope {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    typeof value.success === 'boolean'
  );
}

/**
 * Client for the VyOS HTTP API. Requests are form-encoded with the API key in
 * the `key` field and the JSON payload in `data`.
 */
export class VyosClient implements ConfigTransport {
  private readonly logger = getLogger();

  constructor(private readonly profile: DeviceProfile) {}

  get baseUrl(): string {
    return `${this.profile.protocol}://${this.profile.hostname}:${this.profile.port}`;
  }

  async configureMultiple(operations: readonly BatchOperation[]): Promise<ConfigureResult> {
    this.logger.debug(
      `Submitting ${operations.length} operations to ${this.profile.name}`,
      operations,
    );
    const envelope = await this.post(ENDPOINTS.CONFIGURE, operations);
    return { success: true, data: envelope.data };
  }

  async showConfig(path: CommandPath = []): Promise<ConfigTree> {
    const envelope = await this.post(ENDPOINTS.RETRIEVE, { op: 'showConfig', path });
    return asConfigTree(envelope.data, `configuration at [${path.join(' ')}]`);
  }

  /**
   * POST a payload and unwrap the response envelope
   */
  private async post(endpoint: string, payload: unknown): Promise<ApiEnvelope> {
    const form = new URLSearchParams({
      data: JSON.stringify(payload),
      key: this.profile.apiKey,
    }).toString();

    const response = await this.httpRequest(endpoint, form);

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new DeviceApiError(response.statusCode, response.body, endpoint);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(response.body);
    } catch {
      throw new ConfigParseError(`Device returned a non-JSON response from ${endpoint}`);
    }

    if (!isApiEnvelope(parsed)) {
      throw new ConfigParseError(`Device returned an unexpected response from ${endpoint}`);
    }
    if (!parsed.success) {
      throw new DeviceApiError(response.statusCode, response.body, endpoint);
    }

    return parsed;
  }

  /**
   * Low-level request using Node.js http/https modules
   */
  private httpRequest(endpoint: string, form: string): Promise<HttpResponse> {
    const options: http.RequestOptions = {
      hostname: this.profile.hostname,
      port: this.profile.port,
      path: endpoint,
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        'Content-Length': Buffer.byteLength(form),
      },
      timeout: this.profile.timeout * 1000,
    };

    return new Promise((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage): void => {
        const chunks: Buffer[] = [];

        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });

        res.on('end', () => {
          resolve({
            statusCode: res.statusCode || 500,
            body: Buffer.concat(chunks).toString('utf-8'),
          });
        });
      };

      const req =
        this.profile.protocol === 'https'
          ? https.request({ ...options, rejectUnauthorized: this.profile.verifySsl }, onResponse)
          : http.request(options, onResponse);

      req.on('error', (error) => {
        this.logger.error(`Request to ${this.baseUrl}${endpoint} failed`, error);
        reject(error);
      });

      req.on('timeout', () => {
        req.destroy();
        reject(new Error(`Request to ${this.baseUrl}${endpoint} timed out`));
      });

      req.write(form);
      req.end();
    });
  }
}
