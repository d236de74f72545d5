/**
 * Output resolver: turns a node and a selector into a representation.
 */
import { APIUsageError, TypeConversionError, ErrorCodes } from '../../utils/errors.js';
import type { HydrationNode, Selector, StructuralValue } from '../nodes/types.js';
import { SELECTORS } from '../nodes/types.js';
import { typeTagOf } from '../nodes/values.js';
import { render, type TextFormat } from './render.js';

export function isSelector(value: string): value is Selector {
  return SELECTORS.some((selector) => selector === value);
}

/**
 * Resolve `node` for `selector` (default `value`). An unknown selector
 * records an APIUsageError and resolves to `null`.
 */
export function resolveOutput(node: HydrationNode, selector: string = 'value'): StructuralValue {
  const output = select(node, selector);
  if (node.debug) {
    node.context.trace({ nodeKind: node.kind, operation: 'call', key: selector, depth: node.depth, output });
  }
  return output;
}

function select(node: HydrationNode, selector: string): StructuralValue {
  if (!isSelector(selector)) {
    node.context.diagnostics.record(
      new APIUsageError(
        ErrorCodes.INVALID_SELECTOR,
        `Call type '${selector}' is not supported. Valid options are: ${SELECTORS.join(', ')}`,
        { selector, valid: [...SELECTORS] }
      )
    );
    return null;
  }

  switch (selector) {
    case 'depth':
      return node.depth;
    case 'map':
      return node.keyMap();
    case 'value':
      return node.cleaned();
    case 'element': {
      const cleaned = node.cleaned();
      return { [typeTagOf(cleaned)]: cleaned };
    }
    case 'type':
      return typeTagOf(node.cleaned());
    case 'json':
    case 'yaml':
    case 'toml':
      return renderText(node, selector, node.cleaned());
  }
}

function renderText(node: HydrationNode, format: TextFormat, cleaned: StructuralValue): StructuralValue {
  try {
    return render(format, cleaned, typeTagOf(cleaned), node.context.options);
  } catch (error) {
    node.context.diagnostics.record(
      new TypeConversionError(
        ErrorCodes.RENDER_FAILED,
        `Cannot render ${typeTagOf(cleaned)} as ${format}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { format }
      )
    );
    return null;
  }
}
