/**
 * Numeric and boolean interpretation of node values.
 *
 * Failed conversions record a TypeConversionError and fall back to 0.
 * Boolean interpretation never fails.
 */
import { TypeConversionError, ErrorCodes } from '../../utils/errors.js';
import type { NodeContext, StructuralValue } from './types.js';
import { typeTagOf } from './values.js';

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const INT_FALLBACK = 0;
export const FLOAT_FALLBACK = 0;

export function coerceInt(value: StructuralValue, context: NodeContext): number {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return fail(value, 'int', INT_FALLBACK, context);
}

export function coerceFloat(value: StructuralValue, context: NodeContext): number {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && DECIMAL_TEXT.test(value.trim())) {
    return Number.parseFloat(value.trim());
  }
  return fail(value, 'float', FLOAT_FALLBACK, context);
}

export function coerceBool(value: StructuralValue): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === 'object' && value !== null) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}

function fail(value: StructuralValue, target: 'int' | 'float', fallback: number, context: NodeContext): number {
  const source = typeof value === 'string' ? `'${value}'` : typeTagOf(value);
  context.diagnostics.record(
    new TypeConversionError(
      ErrorCodes.COERCION_FAILED,
      `Cannot convert ${source} to ${target}; using ${fallback} instead`,
      { target, sourceType: typeTagOf(value), fallback }
    )
  );
  return fallback;
}
