// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * Ordered segments addressing a node in the device configuration tree.
 * For "set" operations the last segment may be the leaf value.
 */
export type CommandPath = readonly string[];

export type OperationKind = 'set' | 'delete';

/**
 * One entry of a multi-operation configure request, in the device's wire shape
 */
export interface BatchOperation {
  op: OperationKind;
  path: CommandPath;
}

/**
 * Build a command path from segments, flattening nested segment lists.
 *
 * @example
 * buildPath(['interfaces', 'ethernet'], 'eth0', 'mtu', '1500')
 * // ['interfaces', 'ethernet', 'eth0', 'mtu', '1500']
 */
export function buildPath(...segments: Array<string | readonly string[]>): CommandPath {
  const result: string[] = [];
  for (const segment of segments) {
    if (typeof segment === 'string') {
      result.push(segment);
    } else {
      result.push(...segment);
    }
  }
  return Object.freeze(result);
}

/**
 * True when `prefix` addresses an ancestor of (or the same node as) `path`
 */
export function isPathPrefix(prefix: CommandPath, path: CommandPath): boolean {
  if (prefix.length > path.length) {
    return false;
  }
  return prefix.every((segment, index) => path[index] === segment);
}

export function formatPath(path: CommandPath): string {
  return path.join(' ');
}
