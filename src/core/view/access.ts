/**
 * Property-name access shared by the attribute view and path queries.
 */
import type { HydrationNode } from '../nodes/types.js';
import { MappingNode } from '../nodes/structures.js';

const INTEGER_KEY = /^-?\d+$/;

export type PathSegment = string | number;

/**
 * Access `node` by a property name. Integer-like names index, unless the
 * node is a mapping that has that exact key.
 */
export function accessKey(node: HydrationNode, key: string): HydrationNode {
  if (INTEGER_KEY.test(key) && !(node instanceof MappingNode && node.hasKey(key))) {
    return node.getIndex(Number(key));
  }
  return node.getAttribute(key);
}

export function accessSegment(node: HydrationNode, segment: PathSegment): HydrationNode {
  return typeof segment === 'number' ? node.getIndex(segment) : accessKey(node, segment);
}

/**
 * Split `users[0].name` or `users.0.name` into segments. Bracketed
 * integers become numbers; bracketed quoted names stay names, so keys
 * holding dots stay reachable (`a["b.c"]`). Returns `undefined` when the
 * expression is malformed.
 */
export function parsePath(expression: string): PathSegment[] | undefined {
  const segments: PathSegment[] = [];
  const pattern = /([^.[\]]+)|\[(-?\d+)\]|\[(["'])(.*?)\3\]/g;
  let consumed = 0;

  for (const match of expression.matchAll(pattern)) {
    const between = expression.slice(consumed, match.index);
    if (between.replace(/\./g, '') !== '') {
      return undefined;
    }
    const [whole, name, index, , quoted] = match;
    if (name !== undefined) {
      segments.push(name);
    } else if (index !== undefined) {
      segments.push(Number(index));
    } else {
      segments.push(quoted ?? '');
    }
    consumed = (match.index ?? 0) + whole.length;
  }

  if (expression.slice(consumed).replace(/\./g, '') !== '') {
    return undefined;
  }
  return segments;
}
