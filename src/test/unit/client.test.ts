// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { EventEmitter } from 'events';
import { VyosClient } from '../../api/client';
import { DeviceProfile } from '../../config/types';
import { ConfigParseError, DeviceApiError } from '../../utils/errors';

jest.mock('../../utils/logger', () => ({
  getLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

jest.mock('https', () => ({
  request: jest.fn(),
}));

jest.mock('http', () => ({
  request: jest.fn(),
}));

// Type for mock request object
interface MockRequest {
  on: jest.Mock;
  write: jest.Mock;
  end: jest.Mock;
  destroy: jest.Mock;
}

const profile: DeviceProfile = {
  name: 'edge',
  hostname: 'router.test',
  apiKey: 'test-secret',
  version: '1.5',
  protocol: 'https',
  port: 8443,
  verifySsl: false,
  timeout: 5,
};

/**
 * Make the mocked module answer the next request with `statusCode` and `body`
 */
function respondWith(moduleName: 'http' | 'https', statusCode: number, body: string): MockRequest {
  const transport = require(moduleName);
  const mockRequest: MockRequest = {
    on: jest.fn((): MockRequest => mockRequest),
    write: jest.fn(),
    end: jest.fn(),
    destroy: jest.fn(),
  };

  transport.request.mockImplementation(
    (_options: unknown, callback: (res: EventEmitter & { statusCode: number }) => void) => {
      const response = Object.assign(new EventEmitter(), { statusCode });
      setTimeout(() => {
        callback(response);
        response.emit('data', Buffer.from(body));
        response.emit('end');
      }, 0);
      return mockRequest;
    },
  );

  return mockRequest;
}

function sentForm(mockRequest: MockRequest): URLSearchParams {
  return new URLSearchParams(mockRequest.write.mock.calls[0][0]);
}

describe('VyosClient', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('configureMultiple', () => {
    it('should post form-encoded operations to /configure', async () => {
      const https = require('https');
      const mockRequest = respondWith(
        'https',
        200,
        JSON.stringify({ success: true, data: null, error: null }),
      );
      const operations = [
        { op: 'set' as const, path: ['interfaces', 'dummy', 'dum0'] },
        { op: 'delete' as const, path: ['interfaces', 'dummy', 'dum1'] },
      ];

      const result = await new VyosClient(profile).configureMultiple(operations);

      expect(result).toEqual({ success: true, data: null });
      const options = https.request.mock.calls[0][0];
      expect(options).toMatchObject({
        hostname: 'router.test',
        port: 8443,
        path: '/configure',
        method: 'POST',
        timeout: 5000,
        rejectUnauthorized: false,
      });
      const form = sentForm(mockRequest);
      expect(form.get('key')).toBe('test-secret');
      expect(JSON.parse(form.get('data') ?? '')).toEqual(operations);
      expect(mockRequest.end).toHaveBeenCalled();
    });

    it('should throw DeviceApiError when the device reports failure', async () => {
      const body = JSON.stringify({ success: false, data: null, error: 'Invalid path' });
      respondWith('https', 400, body);

      const promise = new VyosClient(profile).configureMultiple([]);
      await expect(promise).rejects.toBeInstanceOf(DeviceApiError);
    });

    it('should throw DeviceApiError for success false with status 200', async () => {
      respondWith('https', 200, JSON.stringify({ success: false, data: null, error: 'commit failed' }));

      await expect(new VyosClient(profile).configureMultiple([])).rejects.toMatchObject({
        statusCode: 200,
        userFriendlyMessage: 'commit failed',
        endpoint: '/configure',
      });
    });

    it('should report authentication failures', async () => {
      respondWith('https', 401, 'Unauthorized');

      await expect(new VyosClient(profile).configureMultiple([])).rejects.toMatchObject({
        isAuthError: true,
      });
    });
  });

  describe('showConfig', () => {
    it('should request the whole tree by default', async () => {
      const mockRequest = respondWith(
        'https',
        200,
        JSON.stringify({ success: true, data: { interfaces: { dummy: {} } }, error: null }),
      );

      const config = await new VyosClient(profile).showConfig();

      expect(config).toEqual({ interfaces: { dummy: {} } });
      expect(JSON.parse(sentForm(mockRequest).get('data') ?? '')).toEqual({
        op: 'showConfig',
        path: [],
      });
    });

    it('should use plain http with the http protocol', async () => {
      const http = require('http');
      const https = require('https');
      respondWith('http', 200, JSON.stringify({ success: true, data: {}, error: null }));

      await new VyosClient({ ...profile, protocol: 'http', port: 80 }).showConfig(['interfaces']);

      expect(http.request).toHaveBeenCalledTimes(1);
      expect(https.request).not.toHaveBeenCalled();
      expect(http.request.mock.calls[0][0]).not.toHaveProperty('rejectUnauthorized');
    });

    it('should reject a non-JSON body', async () => {
      respondWith('https', 200, '<html>');

      await expect(new VyosClient(profile).showConfig()).rejects.toThrow(
        'Device returned a non-JSON response from /retrieve',
      );
    });

    it('should reject data that is not a nested map', async () => {
      respondWith('https', 200, JSON.stringify({ success: true, data: 'eth0', error: null }));

      await expect(new VyosClient(profile).showConfig()).rejects.toBeInstanceOf(ConfigParseError);
    });
  });

  describe('transport errors', () => {
    it('should reject on a network error', async () => {
      const https = require('https');
      const mockRequest: MockRequest = {
        on: jest.fn((event: string, callback: (err?: Error) => void): MockRequest => {
          if (event === 'error') {
            setTimeout(() => callback(new Error('Network error')), 0);
          }
          return mockRequest;
        }),
        write: jest.fn(),
        end: jest.fn(),
        destroy: jest.fn(),
      };
      https.request.mockImplementation(() => mockRequest);

      await expect(new VyosClient(profile).showConfig()).rejects.toThrow('Network error');
    });

    it('should destroy the request on timeout', async () => {
      const https = require('https');
      const mockRequest: MockRequest = {
        on: jest.fn((event: string, callback: () => void): MockRequest => {
          if (event === 'timeout') {
            setTimeout(() => callback(), 0);
          }
          return mockRequest;
        }),
        write: jest.fn(),
        end: jest.fn(),
        destroy: jest.fn(),
      };
      https.request.mockImplementation(() => mockRequest);

      await expect(new VyosClient(profile).showConfig()).rejects.toThrow(
        'Request to https://router.test:8443/retrieve timed out',
      );
      expect(mockRequest.destroy).toHaveBeenCalled();
    });
  });
});
