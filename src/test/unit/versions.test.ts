// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { LATEST_VERSION, isSupportedVersion, resolveVersion } from '../../mappers/versions';

const mockLogger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

jest.mock('../../utils/logger', () => ({
  getLogger: () => mockLogger,
}));

describe('versions', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should recognize supported versions', () => {
    expect(isSupportedVersion('1.4')).toBe(true);
    expect(isSupportedVersion('1.5')).toBe(true);
    expect(isSupportedVersion('1.3')).toBe(false);
    expect(isSupportedVersion('')).toBe(false);
  });

  it('should keep a supported version', () => {
    expect(resolveVersion('1.4')).toBe('1.4');
    expect(mockLogger.warn).not.toHaveBeenCalled();
  });

  it('should map unknown versions to the latest and warn', () => {
    expect(resolveVersion('1.6')).toBe(LATEST_VERSION);
    expect(LATEST_VERSION).toBe('1.5');
    expect(mockLogger.warn).toHaveBeenCalledWith(
      "Unrecognized VyOS version '1.6', using 1.5 behavior",
    );
  });
});
