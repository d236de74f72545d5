/**
 * Node type definitions.
 */
import type { HydrateError } from '../../utils/errors.js';
import type { ResolvedOptions } from '../config/schema.js';

/** Scalar values a terminal node can hold. `null` is the none-sentinel. */
export type Primitive = string | number | boolean | null;

/** Plain data: what the cleaned value of any node looks like. */
export type StructuralValue = Primitive | StructuralValue[] | { [key: string]: StructuralValue };

/** Plain-object mapping of structural values. */
export type StructuralMapping = { [key: string]: StructuralValue };

/** Type tags reported by the `type` and `element` selectors. */
export type TypeTag = 'dict' | 'list' | 'str' | 'int' | 'float' | 'bool' | 'NoneType';

export type NodeKind = 'mapping' | 'sequence' | 'terminal';

/**
 * Output selectors understood by `resolve`.
 * - value: the cleaned value (default)
 * - element: `{ [typeTag]: cleaned }`
 * - type: the type tag
 * - depth: the node's depth
 * - map: normalized → original key table (mappings only)
 * - json / yaml / toml: text rendering of the cleaned value
 */
export type Selector = 'value' | 'element' | 'type' | 'depth' | 'map' | 'json' | 'yaml' | 'toml';

export const SELECTORS: readonly Selector[] = [
  'value',
  'element',
  'type',
  'depth',
  'map',
  'json',
  'yaml',
  'toml',
];

/**
 * Receives recorded warnings. Traversal never throws; it reports here.
 */
export interface DiagnosticsSink {
  record(warning: HydrateError): void;
}

/**
 * One debug trace entry: a traversal step (`get`) or a terminal call (`call`).
 */
export interface TraceRecord {
  nodeKind: NodeKind;
  operation: 'get' | 'call';
  /** Attribute name, index or selector */
  key: string | number;
  /** Depth of the resulting node (get) or of the called node (call) */
  depth: number;
  /** Resolved output, for calls only */
  output?: StructuralValue;
}

export type TraceSink = (record: TraceRecord) => void;

/**
 * Shared by reference across every node of one tree.
 */
export interface NodeContext {
  readonly debug: boolean;
  readonly options: ResolvedOptions;
  readonly diagnostics: DiagnosticsSink;
  readonly trace: TraceSink;
}

/**
 * Capability set shared by the three node kinds.
 */
export interface HydrationNode {
  readonly kind: NodeKind;
  /** The wrapped source value, never reassigned */
  readonly raw: unknown;
  readonly depth: number;
  readonly debug: boolean;
  readonly context: NodeContext;

  /** Child by normalized attribute name; never throws. */
  getAttribute(name: string): HydrationNode;
  /** Child by position; never throws. */
  getIndex(index: number): HydrationNode;
  /** Cleaned value, computed once. */
  cleaned(): StructuralValue;
  /** Normalized → original key table; `null` except on mappings. */
  keyMap(): Record<string, string> | null;
  /** Output for a selector; unknown selectors record a warning and give `null`. */
  resolve(selector?: string): StructuralValue;

  asInt(): number;
  asFloat(): number;
  asBool(): boolean;
}
