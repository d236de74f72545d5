/**
 * Core exports barrel file.
 */
export { normalizeKey, buildKeyTable } from './keys/normalizer.js';
export { HydrateOptionsSchema } from './config/schema.js';
export type { ResolvedOptions, HydrateConfigInput } from './config/schema.js';
export { resolveOptions, getDefaultOptions } from './config/loader.js';
export type { HydrateOptions } from './config/loader.js';
export { WarningCollector, LoggerSink, StrictSink, createLoggerTrace } from './diagnostics/sinks.js';
export { MappingNode, SequenceNode, createNode } from './nodes/structures.js';
export { TerminalNode, noneNode } from './nodes/terminal.js';
export { cleanValue, typeTagOf, isPlainMapping, isPrimitive } from './nodes/values.js';
export { SELECTORS } from './nodes/types.js';
export type {
  DiagnosticsSink,
  HydrationNode,
  NodeContext,
  NodeKind,
  Primitive,
  Selector,
  StructuralMapping,
  StructuralValue,
  TraceRecord,
  TraceSink,
  TypeTag,
} from './nodes/types.js';
export { resolveOutput, isSelector } from './output/resolver.js';
export { detectSource, detectText } from './source/detect.js';
export type { DetectedSource, SourceFormat } from './source/detect.js';
export { loadSource } from './source/loader.js';
export { Hydrate, hydrate, hydrateFile, createContext } from './root/hydrate.js';
export type { RootShape } from './root/hydrate.js';
export { viewOf, unwrap, toInt, toFloat, toBool, NODE } from './view/proxy.js';
export type { Hydrated } from './view/proxy.js';
export { parsePath } from './view/access.js';
export type { PathSegment } from './view/access.js';
