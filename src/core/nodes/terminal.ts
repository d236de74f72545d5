/**
 * Terminal node: a primitive, or the none-sentinel.
 */
import { TypeConversionError, ErrorCodes } from '../../utils/errors.js';
import { resolveOutput } from '../output/resolver.js';
import { coerceBool, coerceFloat, coerceInt } from './coercion.js';
import type { HydrationNode, NodeContext, Primitive, StructuralValue } from './types.js';
import { describeType, isPrimitive } from './values.js';

export class TerminalNode implements HydrationNode {
  readonly kind = 'terminal';
  readonly value: Primitive;

  constructor(
    readonly raw: unknown,
    readonly depth: number,
    readonly context: NodeContext
  ) {
    if (isPrimitive(raw)) {
      this.value = raw;
      return;
    }
    this.value = null;
    if (raw !== undefined) {
      context.diagnostics.record(
        new TypeConversionError(
          ErrorCodes.UNSUPPORTED_TYPE,
          `Terminal node does not support type '${describeType(raw)}'; using null instead`,
          { sourceType: describeType(raw), depth }
        )
      );
    }
  }

  get debug(): boolean {
    return this.context.debug;
  }

  getAttribute(name: string): HydrationNode {
    return this.absent(name);
  }

  getIndex(index: number): HydrationNode {
    return this.absent(index);
  }

  cleaned(): StructuralValue {
    return this.value;
  }

  keyMap(): null {
    return null;
  }

  resolve(selector?: string): StructuralValue {
    return resolveOutput(this, selector);
  }

  asInt(): number {
    return coerceInt(this.value, this.context);
  }

  asFloat(): number {
    return coerceFloat(this.value, this.context);
  }

  asBool(): boolean {
    return coerceBool(this.value);
  }

  private absent(key: string | number): TerminalNode {
    const node = noneNode(this.depth + 1, this.context);
    if (this.debug) {
      this.context.trace({ nodeKind: this.kind, operation: 'get', key, depth: node.depth });
    }
    return node;
  }
}

/**
 * A fresh terminal wrapping the none-sentinel.
 */
export function noneNode(depth: number, context: NodeContext): TerminalNode {
  return new TerminalNode(null, depth, context);
}
