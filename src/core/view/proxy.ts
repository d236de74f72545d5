/**
 * Attribute view: a callable proxy over a node.
 *
 *   view.user_info.first_name()   // value
 *   view.users[0]('json')         // rendering
 *
 * Property reads go to `accessKey`, calls go to the output resolver.
 */
import { inspect } from 'node:util';
import type {
  HydrationNode,
  NodeKind,
  StructuralMapping,
  StructuralValue,
  TypeTag,
} from '../nodes/types.js';
import { MappingNode } from '../nodes/structures.js';
import { accessKey } from './access.js';

/** Symbol under which a view exposes its node. */
export const NODE: unique symbol = Symbol('hydrate.node');

/**
 * Names a view never treats as data keys: `then` would make every view
 * look like a promise, and `toJSON` serializes the cleaned value.
 */
const RESERVED_KEYS: ReadonlySet<string> = new Set(['then', 'toJSON']);

export interface Hydrated {
  (): StructuralValue;
  (selector: 'value'): StructuralValue;
  (selector: 'element'): StructuralMapping;
  (selector: 'type'): TypeTag;
  (selector: 'depth'): number;
  (selector: 'map'): Record<string, string> | null;
  (selector: 'json' | 'yaml' | 'toml'): string;
  (selector: string): StructuralValue;
  readonly [NODE]: HydrationNode;
  readonly [inspect.custom]: () => string;
  readonly [key: string]: Hydrated;

  // Data keys that would otherwise resolve to Function members.
  readonly name: Hydrated;
  readonly length: Hydrated;
  readonly call: Hydrated;
  readonly apply: Hydrated;
  readonly bind: Hydrated;
  readonly arguments: Hydrated;
  readonly caller: Hydrated;
  readonly prototype: Hydrated;
  readonly constructor: Hydrated;
}

/**
 * `util.inspect` reads `inspect.custom` from a proxy's target rather than
 * through the handler, so the target carries it.
 */
type ViewTarget = ((selector?: string) => StructuralValue) & { [inspect.custom]: () => string };

const views = new WeakMap<HydrationNode, Hydrated>();

/**
 * The view of `node`. Views are cached, so the same node always yields
 * the same view.
 */
export function viewOf(node: HydrationNode): Hydrated {
  const cached = views.get(node);
  if (cached) {
    return cached;
  }
  const target: ViewTarget = Object.assign((selector?: string) => node.resolve(selector), {
    [inspect.custom]: () => describe(node.kind, node.depth),
  });
  // Proxy's typing only knows the target; the handler supplies the rest of Hydrated.
  const view = new Proxy(target, createHandler(node)) as Hydrated;
  views.set(node, view);
  return view;
}

export function unwrap(view: Hydrated): HydrationNode {
  return view[NODE];
}

export function toInt(view: Hydrated): number {
  return unwrap(view).asInt();
}

export function toFloat(view: Hydrated): number {
  return unwrap(view).asFloat();
}

export function toBool(view: Hydrated): boolean {
  return unwrap(view).asBool();
}

function describe(kind: NodeKind, depth: number): string {
  return `Hydrated<${kind}>(depth=${depth})`;
}

function createHandler(node: HydrationNode): ProxyHandler<ViewTarget> {
  return {
    get(_target, prop) {
      if (typeof prop === 'symbol') {
        return symbolProperty(node, prop);
      }
      if (RESERVED_KEYS.has(prop)) {
        return prop === 'toJSON' ? () => node.cleaned() : undefined;
      }
      return viewOf(accessKey(node, prop));
    },
    has(_target, prop) {
      return typeof prop === 'string' && node instanceof MappingNode && node.hasKey(prop);
    },
    set() {
      return false;
    },
    deleteProperty() {
      return false;
    },
  };
}

function symbolProperty(node: HydrationNode, prop: symbol): unknown {
  switch (prop) {
    case NODE:
      return node;
    case Symbol.toPrimitive:
      return (hint: string) => (hint === 'number' ? node.asFloat() : String(node.resolve('yaml')));
    case inspect.custom:
      return () => describe(node.kind, node.depth);
    case Symbol.toStringTag:
      return 'Hydrated';
    default:
      return undefined;
  }
}
