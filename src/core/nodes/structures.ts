/**
 * Structure nodes: mappings and sequences, with lazily built, memoized children.
 */
import { AccessPatternError, ErrorCodes } from '../../utils/errors.js';
import { buildKeyTable } from '../keys/normalizer.js';
import { resolveOutput } from '../output/resolver.js';
import { coerceBool, coerceFloat, coerceInt } from './coercion.js';
import { TerminalNode, noneNode } from './terminal.js';
import type { HydrationNode, NodeContext, StructuralValue } from './types.js';
import { cleanValue, isPlainMapping } from './values.js';

/**
 * Wrap a value in the node kind that fits it.
 */
export function createNode(value: unknown, depth: number, context: NodeContext): HydrationNode {
  if (isPlainMapping(value)) {
    return new MappingNode(value, depth, context);
  }
  if (Array.isArray(value)) {
    return new SequenceNode(value, depth, context);
  }
  return new TerminalNode(value, depth, context);
}

/**
 * Key-value structure. The key table is built once, up front; children
 * are built on first access and cached under their normalized key.
 */
export class MappingNode implements HydrationNode {
  readonly kind = 'mapping';
  readonly keyTable: ReadonlyMap<string, string>;
  private readonly children = new Map<string, HydrationNode>();
  private cleanedValue: StructuralValue | undefined;

  constructor(
    readonly raw: Readonly<Record<string, unknown>>,
    readonly depth: number,
    readonly context: NodeContext
  ) {
    this.keyTable = buildKeyTable(Object.keys(raw));
  }

  get debug(): boolean {
    return this.context.debug;
  }

  /** Number of children built so far. */
  get cachedCount(): number {
    return this.children.size;
  }

  hasKey(name: string): boolean {
    return this.keyTable.has(name);
  }

  getAttribute(name: string): HydrationNode {
    const original = this.keyTable.get(name);
    let child: HydrationNode;

    if (original === undefined) {
      child = noneNode(this.depth + 1, this.context);
    } else {
      const cached = this.children.get(name);
      if (cached) {
        child = cached;
      } else {
        child = createNode(this.raw[original], this.depth + 1, this.context);
        this.children.set(name, child);
      }
    }

    if (this.debug) {
      this.context.trace({ nodeKind: this.kind, operation: 'get', key: name, depth: child.depth });
    }
    return child;
  }

  getIndex(index: number): HydrationNode {
    this.context.diagnostics.record(
      new AccessPatternError(
        ErrorCodes.INDEX_ON_MAPPING,
        `Cannot index a mapping with [${index}]; use attribute access instead`,
        { index, depth: this.depth }
      )
    );
    const child = noneNode(this.depth + 1, this.context);
    if (this.debug) {
      this.context.trace({ nodeKind: this.kind, operation: 'get', key: index, depth: child.depth });
    }
    return child;
  }

  cleaned(): StructuralValue {
    if (this.cleanedValue === undefined) {
      this.cleanedValue = cleanValue(this.raw, this.context.diagnostics);
    }
    return this.cleanedValue;
  }

  keyMap(): Record<string, string> {
    return Object.fromEntries(this.keyTable);
  }

  resolve(selector?: string): StructuralValue {
    return resolveOutput(this, selector);
  }

  asInt(): number {
    return coerceInt(this.cleaned(), this.context);
  }

  asFloat(): number {
    return coerceFloat(this.cleaned(), this.context);
  }

  asBool(): boolean {
    return this.keyTable.size > 0;
  }
}

/**
 * Ordered list. Children are built on first access and cached by index.
 */
export class SequenceNode implements HydrationNode {
  readonly kind = 'sequence';
  private readonly children = new Map<number, HydrationNode>();
  private cleanedValue: StructuralValue | undefined;

  constructor(
    readonly raw: readonly unknown[],
    readonly depth: number,
    readonly context: NodeContext
  ) {}

  get debug(): boolean {
    return this.context.debug;
  }

  get length(): number {
    return this.raw.length;
  }

  /** Number of children built so far. */
  get cachedCount(): number {
    return this.children.size;
  }

  getIndex(index: number): HydrationNode {
    let child: HydrationNode;

    if (Number.isInteger(index) && index >= 0 && index < this.raw.length) {
      const cached = this.children.get(index);
      if (cached) {
        child = cached;
      } else {
        child = createNode(this.raw[index], this.depth + 1, this.context);
        this.children.set(index, child);
      }
    } else {
      this.context.diagnostics.record(
        new AccessPatternError(
          ErrorCodes.INDEX_OUT_OF_BOUNDS,
          `Index ${index} is out of bounds for a sequence of length ${this.raw.length}`,
          { index, length: this.raw.length, depth: this.depth }
        )
      );
      child = noneNode(this.depth + 1, this.context);
    }

    if (this.debug) {
      this.context.trace({ nodeKind: this.kind, operation: 'get', key: index, depth: child.depth });
    }
    return child;
  }

  getAttribute(name: string): HydrationNode {
    this.context.diagnostics.record(
      new AccessPatternError(
        ErrorCodes.ATTRIBUTE_ON_SEQUENCE,
        `Cannot read attribute '${name}' of a sequence; use an index instead`,
        { attribute: name, depth: this.depth }
      )
    );
    const child = noneNode(this.depth + 1, this.context);
    if (this.debug) {
      this.context.trace({ nodeKind: this.kind, operation: 'get', key: name, depth: child.depth });
    }
    return child;
  }

  cleaned(): StructuralValue {
    if (this.cleanedValue === undefined) {
      this.cleanedValue = cleanValue(this.raw, this.context.diagnostics);
    }
    return this.cleanedValue;
  }

  keyMap(): null {
    return null;
  }

  resolve(selector?: string): StructuralValue {
    return resolveOutput(this, selector);
  }

  asInt(): number {
    return coerceInt(this.cleaned(), this.context);
  }

  asFloat(): number {
    return coerceFloat(this.cleaned(), this.context);
  }

  asBool(): boolean {
    return coerceBool(this.cleaned());
  }
}
