// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { buildPath, formatPath, isPathPrefix } from '../../mappers/commandPath';

describe('buildPath', () => {
  it('should flatten nested segment lists', () => {
    expect(buildPath(['interfaces', 'ethernet'], 'eth0', ['mtu', '1500'])).toEqual([
      'interfaces',
      'ethernet',
      'eth0',
      'mtu',
      '1500',
    ]);
  });

  it('should return a frozen path', () => {
    expect(Object.isFrozen(buildPath('interfaces'))).toBe(true);
  });

  it('should keep empty segments lists out', () => {
    expect(buildPath('interfaces', [], 'dummy')).toEqual(['interfaces', 'dummy']);
  });
});

describe('isPathPrefix', () => {
  const path = ['interfaces', 'ethernet', 'eth0', 'mtu', '9000'];

  it('should accept an ancestor', () => {
    expect(isPathPrefix(['interfaces', 'ethernet', 'eth0', 'mtu'], path)).toBe(true);
  });

  it('should accept the same path', () => {
    expect(isPathPrefix(path, path)).toBe(true);
  });

  it('should reject a longer path', () => {
    expect(isPathPrefix([...path, 'extra'], path)).toBe(false);
  });

  it('should reject a diverging path', () => {
    expect(isPathPrefix(['interfaces', 'dummy'], path)).toBe(false);
  });
});

describe('formatPath', () => {
  it('should join segments with spaces', () => {
    expect(formatPath(['interfaces', 'dummy', 'dum0', 'disable'])).toBe(
      'interfaces dummy dum0 disable',
    );
  });
});
