/**
 * Text renderings of cleaned values.
 */
import { stringifyYaml } from '../../utils/yaml.js';
import { stringifyToml } from '../../utils/toml.js';
import type { ResolvedOptions } from '../config/schema.js';
import type { StructuralMapping, StructuralValue, TypeTag } from '../nodes/types.js';

export type TextFormat = 'json' | 'yaml' | 'toml';

export function renderJson(value: StructuralValue, options: ResolvedOptions): string {
  return JSON.stringify(value, null, options.jsonIndent);
}

/**
 * YAML of a structure, or of the element form of a primitive
 * (`42` renders as `int: 42`).
 */
export function renderYaml(value: StructuralValue, tag: TypeTag, options: ResolvedOptions): string {
  const document = isStructure(value) ? value : { [tag]: value };
  return stringifyYaml(document, { indent: options.yamlIndent, lineWidth: options.yamlLineWidth });
}

/**
 * TOML has no null and no bare-array or bare-scalar documents: `null`
 * entries are dropped, a sequence is wrapped under `tomlRootKey`, and a
 * primitive renders as its element form.
 */
export function renderToml(value: StructuralValue, tag: TypeTag, options: ResolvedOptions): string {
  let table: StructuralMapping;
  if (Array.isArray(value)) {
    table = { [options.tomlRootKey]: value };
  } else if (typeof value === 'object' && value !== null) {
    table = value;
  } else {
    table = { [tag]: value };
  }
  return stringifyToml(withoutNulls(table));
}

function isStructure(value: StructuralValue): value is StructuralValue[] | StructuralMapping {
  return typeof value === 'object' && value !== null;
}

function withoutNulls(table: StructuralMapping): StructuralMapping {
  const result: StructuralMapping = {};
  for (const [key, value] of Object.entries(table)) {
    if (value !== null) {
      result[key] = withoutNullsValue(value);
    }
  }
  return result;
}

function withoutNullsValue(value: StructuralValue): StructuralValue {
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null).map(withoutNullsValue);
  }
  if (typeof value === 'object' && value !== null) {
    return withoutNulls(value);
  }
  return value;
}

export function render(format: TextFormat, value: StructuralValue, tag: TypeTag, options: ResolvedOptions): string {
  switch (format) {
    case 'json':
      return renderJson(value, options);
    case 'yaml':
      return renderYaml(value, tag, options);
    case 'toml':
      return renderToml(value, tag, options);
  }
}
