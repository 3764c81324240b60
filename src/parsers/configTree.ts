// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { ConfigParseError } from '../utils/errors';

/**
 * Raw configuration tree as exported by the device's showConfig operation.
 * Valueless nodes (flags such as `disable`) are exported as empty maps.
 */
export type ConfigScalar = string | number | boolean | null;

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigTree;

export interface ConfigTree {
  [key: string]: ConfigValue;
}

export function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode device JSON text into a configuration tree
 */
export function parseConfigTree(text: string): ConfigTree {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigParseError(`Configuration is not valid JSON: ${reason}`);
  }
  return asConfigTree(decoded, 'configuration');
}

export function asConfigTree(value: unknown, description: string): ConfigTree {
  if (!isConfigTree(value)) {
    throw new ConfigParseError(`Expected ${description} to be a nested map, got ${describeValue(value)}`);
  }
  return value;
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'list';
  }
  return typeof value;
}

/**
 * Slice the subtree at `path`. Missing keys yield an empty tree;
 * a scalar where a map is expected is a contract violation.
 */
export function sliceTree(tree: ConfigTree, path: readonly string[]): ConfigTree {
  let current: ConfigTree = tree;
  for (let i = 0; i < path.length; i++) {
    const next = current[path[i]];
    if (next === undefined) {
      return {};
    }
    current = asConfigTree(next, `'${path.slice(0, i + 1).join(' ')}'`);
  }
  return current;
}

export function hasKey(tree: ConfigTree, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(tree, key);
}

/**
 * Leaf value as a string; null when absent or not a scalar
 */
export function getString(tree: ConfigTree, key: string): string | null {
  const value = tree[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

/**
 * Multi-valued leaf as a list. Single values are exported as a bare scalar.
 */
export function getStringList(tree: ConfigTree, key: string): string[] {
  const value = tree[key];
  if (Array.isArray(value)) {
    return value.flatMap((item) =>
      typeof item === 'string' || typeof item === 'number' ? [String(item)] : [],
    );
  }
  const single = getString(tree, key);
  return single === null ? [] : [single];
}

export function getSubtree(tree: ConfigTree, key: string): ConfigTree | null {
  const value = tree[key];
  return isConfigTree(value) ? value : null;
}
