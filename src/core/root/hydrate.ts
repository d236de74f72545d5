/**
 * Root entry point: detects the shape of a source and owns the top-level node.
 */
import { APIUsageError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { resolveOptions, type HydrateOptions } from '../config/loader.js';
import { LoggerSink, StrictSink, createLoggerTrace } from '../diagnostics/sinks.js';
import { createNode } from '../nodes/structures.js';
import { noneNode } from '../nodes/terminal.js';
import type { HydrationNode, NodeContext, StructuralValue } from '../nodes/types.js';
import { detectSource, type DetectedSource, type SourceFormat } from '../source/detect.js';
import { loadSource } from '../source/loader.js';
import { accessKey, accessSegment, parsePath } from '../view/access.js';
import { viewOf, type Hydrated } from '../view/proxy.js';

export type RootShape = 'mapping' | 'sequence' | 'terminal' | 'none';

/** A source that was already parsed (file loading), so it skips detection. */
class DetectedInput {
  constructor(readonly detected: DetectedSource) {}
}

/**
 * Build the context every node of one tree shares.
 */
export function createContext(options: HydrateOptions = {}): NodeContext {
  const resolved = resolveOptions(options);
  const sink = options.diagnostics ?? new LoggerSink();
  return {
    debug: resolved.debug,
    options: resolved,
    diagnostics: resolved.strict ? new StrictSink(sink) : sink,
    trace: options.onTrace ?? createLoggerTrace(),
  };
}

/**
 * A hydrated source.
 *
 * @example
 * const root = new Hydrate('{"user-info": {"firstName": "John"}}');
 * root.query('user_info.first_name').resolve(); // 'John'
 * root.view().user_info.first_name();          // 'John'
 */
export class Hydrate {
  readonly shape: RootShape;
  readonly format: SourceFormat;
  readonly node: HydrationNode;
  readonly context: NodeContext;

  constructor(source: unknown, options: HydrateOptions = {}) {
    this.context = createContext(options);
    const detected = source instanceof DetectedInput ? source.detected : detectSource(source);
    this.format = detected.format;
    this.node = createNode(detected.value, 0, this.context);
    this.shape = shapeOf(this.node);

    if (this.context.debug && !options.onTrace) {
      const log = logger.child('hydrate');
      log.setLevel('debug');
      log.debug('Root constructed', {
        shape: this.shape,
        format: this.format,
        failedFormats: detected.attempts.map((a) => a.format),
      });
    }
  }

  /**
   * Load a `.json`, `.yaml`/`.yml` or `.toml` file (other extensions go
   * through text detection). Missing files and parse errors in a named
   * format throw a SystemError.
   */
  static async fromFile(filePath: string, options: HydrateOptions = {}): Promise<Hydrate> {
    const detected = await loadSource(filePath);
    return new Hydrate(new DetectedInput(detected), options);
  }

  get debug(): boolean {
    return this.context.debug;
  }

  get depth(): number {
    return this.node.depth;
  }

  get(name: string): HydrationNode {
    return this.node.getAttribute(name);
  }

  at(index: number): HydrationNode {
    return this.node.getIndex(index);
  }

  call(selector?: string): StructuralValue {
    return this.node.resolve(selector);
  }

  /**
   * Walk a path such as `users[0].name` or `users.0.name`. A malformed
   * expression records an APIUsageError and yields a none node.
   */
  query(expression: string): HydrationNode {
    const segments = parsePath(expression);
    if (segments === undefined) {
      this.context.diagnostics.record(
        new APIUsageError(ErrorCodes.INVALID_PATH, `Invalid path expression: ${expression}`, { expression })
      );
      return noneNode(this.node.depth + 1, this.context);
    }
    return segments.reduce<HydrationNode>((node, segment) => accessSegment(node, segment), this.node);
  }

  /**
   * The callable attribute view of the top-level node.
   */
  view(): Hydrated {
    return viewOf(this.node);
  }

  /**
   * Property-name access with the same rules the view uses.
   */
  access(key: string): HydrationNode {
    return accessKey(this.node, key);
  }
}

function shapeOf(node: HydrationNode): RootShape {
  if (node.kind !== 'terminal') {
    return node.kind;
  }
  return node.cleaned() === null ? 'none' : 'terminal';
}

/**
 * Hydrate a source and return its attribute view.
 *
 * @example
 * const data = hydrate({ users: [{ name: 'Alice' }] });
 * data.users[0].name(); // 'Alice'
 * data.users[99]();     // null
 */
export function hydrate(source: unknown, options: HydrateOptions = {}): Hydrated {
  return new Hydrate(source, options).view();
}

/**
 * Load a file and return its attribute view.
 */
export async function hydrateFile(filePath: string, options: HydrateOptions = {}): Promise<Hydrated> {
  const root = await Hydrate.fromFile(filePath, options);
  return root.view();
}
