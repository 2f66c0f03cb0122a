/**
 * NGINX Directive Registry
 * @module parsers/nginx/directive-registry
 *
 * Known directive names with the block contexts they may appear in and the
 * shape of their arguments. The table lives in `data/directives.json` and
 * is validated once when first used.
 */

import { z } from 'zod';
import rawRegistry from './data/directives.json';
import { BaseError } from '../../errors';

// ============================================================================
// Schema
// ============================================================================

/**
 * Named block contexts
 */
export const DirectiveContextSchema = z.enum([
  'MAIN',
  'EVENT',
  'HTTP_MAIN',
  'HTTP_SRV',
  'HTTP_LOC',
  'HTTP_UPS',
  'HTTP_SIF',
  'HTTP_LIF',
  'HTTP_LMT',
  'STREAM_MAIN',
  'STREAM_SRV',
  'STREAM_UPS',
  'MAIL_MAIN',
  'MAIL_SRV',
]);

export type DirectiveContext = z.infer<typeof DirectiveContextSchema>;

/**
 * Argument shapes. TAKEn takes exactly n arguments, TAKEnm... any of the
 * listed counts, FLAG a single `on` or `off`.
 */
export const ArgumentStyleSchema = z.enum([
  'NOARGS',
  'TAKE1',
  'TAKE2',
  'TAKE3',
  'TAKE4',
  'TAKE5',
  'TAKE6',
  'TAKE7',
  'TAKE12',
  'TAKE13',
  'TAKE23',
  'TAKE34',
  'TAKE123',
  'TAKE1234',
  'FLAG',
  'ANY',
  '1MORE',
  '2MORE',
]);

export type ArgumentStyle = z.infer<typeof ArgumentStyleSchema>;

export const DirectiveSignatureSchema = z.object({
  contexts: z.array(DirectiveContextSchema).min(1),
  args: ArgumentStyleSchema,
  block: z.boolean().default(false),
});

export type DirectiveSignature = z.infer<typeof DirectiveSignatureSchema>;

export const DirectiveRegistrySchema = z.object({
  /** Blocks whose children are data rather than directives */
  opaqueBlocks: z.array(z.string().min(1)),
  directives: z.record(z.string().min(1), z.array(DirectiveSignatureSchema).min(1)),
});

export type DirectiveRegistryData = z.infer<typeof DirectiveRegistrySchema>;

/**
 * Error raised when the bundled registry table is malformed
 */
export class RegistryValidationError extends BaseError {
  constructor(message: string) {
    super(message, 'INVALID_REGISTRY');
  }
}

// ============================================================================
// Context Tuples
// ============================================================================

/**
 * Block context as the chain of enclosing block directives,
 * e.g. `['http', 'server']`. The main context is the empty tuple.
 */
export type BlockContext = readonly string[];

const CONTEXT_TUPLES: Readonly<Record<DirectiveContext, BlockContext>> = {
  MAIN: [],
  EVENT: ['events'],
  HTTP_MAIN: ['http'],
  HTTP_SRV: ['http', 'server'],
  HTTP_LOC: ['http', 'location'],
  HTTP_UPS: ['http', 'upstream'],
  HTTP_SIF: ['http', 'server', 'if'],
  HTTP_LIF: ['http', 'location', 'if'],
  HTTP_LMT: ['http', 'location', 'limit_except'],
  STREAM_MAIN: ['stream'],
  STREAM_SRV: ['stream', 'server'],
  STREAM_UPS: ['stream', 'upstream'],
  MAIL_MAIN: ['mail'],
  MAIL_SRV: ['mail', 'server'],
};

const CONTEXTS_BY_KEY = new Map<string, DirectiveContext>(
  DirectiveContextSchema.options.map(name => [CONTEXT_TUPLES[name].join('>'), name])
);

/**
 * Context of the children of a block opened by `directive` in `context`.
 * Nested locations collapse into `['http', 'location']`.
 */
export function enterBlockContext(context: BlockContext, directive: string): BlockContext {
  if (context.length > 0 && context[0] === 'http' && directive === 'location') {
    return ['http', 'location'];
  }
  return [...context, directive];
}

/**
 * Named context for a context tuple; null for blocks outside the known set
 */
export function resolveContextName(context: BlockContext): DirectiveContext | null {
  return CONTEXTS_BY_KEY.get(context.join('>')) ?? null;
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Lookup table over the validated registry data
 */
export class DirectiveRegistry {
  private readonly signatures: ReadonlyMap<string, readonly DirectiveSignature[]>;
  private readonly opaque: ReadonlySet<string>;

  constructor(data: DirectiveRegistryData) {
    this.signatures = new Map(Object.entries(data.directives));
    this.opaque = new Set(data.opaqueBlocks);
  }

  /**
   * Validate raw registry data
   *
   * @throws RegistryValidationError when the data does not match the schema
   */
  static fromData(data: unknown): DirectiveRegistry {
    const result = DirectiveRegistrySchema.safeParse(data);
    if (!result.success) {
      const details = result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new RegistryValidationError(`Invalid directive registry: ${details}`);
    }
    return new DirectiveRegistry(result.data);
  }

  has(directive: string): boolean {
    return this.signatures.has(directive);
  }

  /**
   * Signatures of a directive; empty when it is unknown
   */
  getSignatures(directive: string): readonly DirectiveSignature[] {
    return this.signatures.get(directive) ?? [];
  }

  /**
   * Whether the children of this block are data rather than directives
   */
  isOpaqueBlock(directive: string): boolean {
    return this.opaque.has(directive);
  }

  get size(): number {
    return this.signatures.size;
  }
}

// ============================================================================
// Argument Shapes
// ============================================================================

const ARGUMENT_COUNTS: Readonly<Record<ArgumentStyle, (count: number) => boolean>> = {
  NOARGS: n => n === 0,
  TAKE1: n => n === 1,
  TAKE2: n => n === 2,
  TAKE3: n => n === 3,
  TAKE4: n => n === 4,
  TAKE5: n => n === 5,
  TAKE6: n => n === 6,
  TAKE7: n => n === 7,
  TAKE12: n => n === 1 || n === 2,
  TAKE13: n => n === 1 || n === 3,
  TAKE23: n => n === 2 || n === 3,
  TAKE34: n => n === 3 || n === 4,
  TAKE123: n => n >= 1 && n <= 3,
  TAKE1234: n => n >= 1 && n <= 4,
  FLAG: n => n === 1,
  ANY: () => true,
  '1MORE': n => n >= 1,
  '2MORE': n => n >= 2,
};

/**
 * Whether an argument count fits an argument style
 */
export function acceptsArgumentCount(style: ArgumentStyle, count: number): boolean {
  return ARGUMENT_COUNTS[style](count);
}

/**
 * Whether a value is a valid FLAG argument
 */
export function isFlagValue(value: string): boolean {
  const lower = value.toLowerCase();
  return lower === 'on' || lower === 'off';
}

// ============================================================================
// Default Registry
// ============================================================================

let defaultRegistry: DirectiveRegistry | null = null;

/**
 * The bundled registry, validated on first use
 */
export function getDefaultRegistry(): DirectiveRegistry {
  if (!defaultRegistry) {
    defaultRegistry = DirectiveRegistry.fromData(rawRegistry);
  }
  return defaultRegistry;
}
