/**
 * Value classification and cleaning.
 */
import { TypeConversionError, ErrorCodes } from '../../utils/errors.js';
import { normalizeKey } from '../keys/normalizer.js';
import type { DiagnosticsSink, Primitive, StructuralMapping, StructuralValue, TypeTag } from './types.js';

/**
 * A plain object (object literal, parsed JSON/YAML/TOML table, or
 * `Object.create(null)`). Class instances, dates and maps are not.
 */
export function isPlainMapping(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isPrimitive(value: unknown): value is Primitive {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Short type name used in warning messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    return isPlainMapping(value) ? 'object' : value.constructor?.name ?? 'object';
  }
  return typeof value;
}

export function typeTagOf(value: StructuralValue): TypeTag {
  if (value === null) return 'NoneType';
  if (Array.isArray(value)) return 'list';
  switch (typeof value) {
    case 'string':
      return 'str';
    case 'boolean':
      return 'bool';
    case 'number':
      return Number.isInteger(value) ? 'int' : 'float';
    default:
      return 'dict';
  }
}

/**
 * Recursively normalize mapping keys. Values outside the structural set
 * become `null`; on key collisions the later key wins. A value that
 * contains itself (a recursive YAML alias) is cut at the repeat, which
 * becomes `null` and is reported to `diagnostics`.
 */
export function cleanValue(value: unknown, diagnostics?: DiagnosticsSink): StructuralValue {
  return cleanWithin(value, new WeakSet<object>(), diagnostics);
}

function cleanWithin(value: unknown, ancestors: WeakSet<object>, diagnostics?: DiagnosticsSink): StructuralValue {
  if (isPrimitive(value)) {
    return value;
  }
  if (!Array.isArray(value) && !isPlainMapping(value)) {
    return null;
  }
  if (ancestors.has(value)) {
    diagnostics?.record(
      new TypeConversionError(
        ErrorCodes.UNSUPPORTED_TYPE,
        `Cyclic ${Array.isArray(value) ? 'list' : 'dict'} reference; using null instead`,
        { sourceType: describeType(value) }
      )
    );
    return null;
  }

  ancestors.add(value);
  let cleaned: StructuralValue;
  if (Array.isArray(value)) {
    cleaned = value.map((item: unknown) => cleanWithin(item, ancestors, diagnostics));
  } else {
    const mapping: StructuralMapping = {};
    for (const [key, item] of Object.entries(value)) {
      mapping[normalizeKey(key)] = cleanWithin(item, ancestors, diagnostics);
    }
    cleaned = mapping;
  }
  ancestors.delete(value);
  return cleaned;
}
