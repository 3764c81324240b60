// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import {
  asConfigTree,
  getString,
  getStringList,
  getSubtree,
  hasKey,
  parseConfigTree,
  sliceTree,
} from '../../parsers/configTree';
import { ConfigParseError } from '../../utils/errors';

describe('parseConfigTree', () => {
  it('should decode a nested map', () => {
    expect(parseConfigTree('{"interfaces":{"dummy":{}}}')).toEqual({ interfaces: { dummy: {} } });
  });

  it('should reject invalid JSON', () => {
    expect(() => parseConfigTree('{not json')).toThrow(ConfigParseError);
  });

  it('should reject JSON that is not a map', () => {
    expect(() => parseConfigTree('[1, 2]')).toThrow(
      'Expected configuration to be a nested map, got list',
    );
  });
});

describe('asConfigTree', () => {
  it('should describe null', () => {
    expect(() => asConfigTree(null, 'data')).toThrow('Expected data to be a nested map, got null');
  });

  it('should describe scalars by type', () => {
    expect(() => asConfigTree('text', 'data')).toThrow(
      'Expected data to be a nested map, got string',
    );
  });
});

describe('sliceTree', () => {
  const tree = {
    interfaces: {
      ethernet: { eth0: { mtu: '1500' } },
      loopback: 'lo',
    },
  };

  it('should return the subtree at a path', () => {
    expect(sliceTree(tree, ['interfaces', 'ethernet'])).toEqual({ eth0: { mtu: '1500' } });
  });

  it('should return an empty tree for a missing key', () => {
    expect(sliceTree(tree, ['interfaces', 'dummy'])).toEqual({});
    expect(sliceTree(tree, ['protocols', 'bgp'])).toEqual({});
  });

  it('should reject a scalar in the middle of the path', () => {
    expect(() => sliceTree(tree, ['interfaces', 'loopback'])).toThrow(
      "Expected 'interfaces loopback' to be a nested map, got string",
    );
  });

  it('should return the tree itself for an empty path', () => {
    expect(sliceTree(tree, [])).toBe(tree);
  });
});

describe('leaf helpers', () => {
  const tree = {
    description: 'uplink',
    mtu: 9000,
    address: ['10.0.0.1/24', '10.0.1.1/24'],
    single: '192.0.2.1/32',
    disable: {},
    empty: null,
  };

  it('should read strings and stringify numbers', () => {
    expect(getString(tree, 'description')).toBe('uplink');
    expect(getString(tree, 'mtu')).toBe('9000');
    expect(getString(tree, 'disable')).toBeNull();
    expect(getString(tree, 'missing')).toBeNull();
    expect(getString(tree, 'empty')).toBeNull();
  });

  it('should normalize lists', () => {
    expect(getStringList(tree, 'address')).toEqual(['10.0.0.1/24', '10.0.1.1/24']);
    expect(getStringList(tree, 'single')).toEqual(['192.0.2.1/32']);
    expect(getStringList(tree, 'missing')).toEqual([]);
  });

  it('should detect valueless keys', () => {
    expect(hasKey(tree, 'disable')).toBe(true);
    expect(hasKey(tree, 'toString')).toBe(false);
  });

  it('should return nested maps only', () => {
    expect(getSubtree(tree, 'disable')).toEqual({});
    expect(getSubtree(tree, 'address')).toBeNull();
  });
});
