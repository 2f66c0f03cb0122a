/**
 * NGINX Directive Policy
 * @module parsers/nginx/directive-policy
 *
 * Post-parse filtering of the directive tree. Ignored names are removed at
 * every depth (secret redaction). Strict mode turns directives missing from
 * the registry into errors, and the opt-in context and argument checks
 * validate the remaining ones against their registry signatures. A rejected
 * directive is dropped from the output together with its block.
 *
 * The input records are never mutated, so one parse tree can be filtered
 * and projected any number of times.
 */

import { createParseError, ParseErrorMessages, recordErrors } from './errors';
import {
  acceptsArgumentCount,
  BlockContext,
  DirectiveRegistry,
  DirectiveSignature,
  enterBlockContext,
  getDefaultRegistry,
  isFlagValue,
  resolveContextName,
} from './directive-registry';
import { DirectiveNode, isCommentNode, ParseError, ParseErrorKind, ParsedFile } from './types';

// ============================================================================
// Policy Types
// ============================================================================

/**
 * Policy settings
 */
export interface DirectivePolicyOptions {
  /** Directive names removed from the output (case-sensitive) */
  readonly ignoreDirectives: readonly string[];
  /** Report directives missing from the registry */
  readonly strict: boolean;
  /** Report directives used outside their allowed contexts */
  readonly checkContext: boolean;
  /** Report directives with arguments or block shape not matching the registry */
  readonly checkArguments: boolean;
}

/**
 * Filtered file records plus the errors the policy added
 */
export interface PolicyResult {
  readonly files: ParsedFile[];
  readonly errors: ParseError[];
}

interface Violation {
  readonly kind: ParseErrorKind;
  readonly message: string;
}

// ============================================================================
// Directive Policy
// ============================================================================

/**
 * Applies ignore filtering and registry checks to parsed files.
 *
 * @example
 * ```typescript
 * const policy = new DirectivePolicy({
 *   ignoreDirectives: ['ssl_certificate_key'],
 *   strict: true,
 *   checkContext: false,
 *   checkArguments: false,
 * });
 * const { files, errors } = policy.apply(parsedFiles);
 * ```
 */
export class DirectivePolicy {
  private readonly options: DirectivePolicyOptions;
  private readonly ignored: ReadonlySet<string>;
  private readonly registry: DirectiveRegistry;

  constructor(options: DirectivePolicyOptions, registry: DirectiveRegistry = getDefaultRegistry()) {
    this.options = options;
    this.ignored = new Set(options.ignoreDirectives);
    this.registry = registry;
  }

  /**
   * Filter every file record; errors are attached to the file they occur in
   */
  apply(files: readonly ParsedFile[]): PolicyResult {
    const allErrors: ParseError[] = [];

    const filtered = files.map(file => {
      const errors: ParseError[] = [];
      const record: ParsedFile = {
        file: file.file,
        status: file.status,
        errors: [...file.errors],
        parsed: this.filterNodes(file.parsed, file.context, false, errors),
        context: file.context,
      };
      recordErrors(record, errors);
      allErrors.push(...errors);
      return record;
    });

    return { files: filtered, errors: allErrors };
  }

  private filterNodes(
    nodes: readonly DirectiveNode[],
    context: BlockContext,
    opaque: boolean,
    errors: ParseError[]
  ): DirectiveNode[] {
    const result: DirectiveNode[] = [];

    for (const node of nodes) {
      if (isCommentNode(node)) {
        result.push({ ...node, args: [...node.args] });
        continue;
      }

      if (this.ignored.has(node.directive)) {
        continue;
      }

      if (!opaque) {
        const violation = this.check(node, context);
        if (violation) {
          errors.push(createParseError(violation.kind, violation.message, node.file, node.line));
          continue;
        }
      }

      const copy: DirectiveNode = { ...node, args: [...node.args] };
      if (node.includes) {
        copy.includes = [...node.includes];
      }
      if (node.block) {
        copy.block = this.filterNodes(
          node.block,
          enterBlockContext(context, node.directive),
          opaque || this.registry.isOpaqueBlock(node.directive),
          errors
        );
      }
      result.push(copy);
    }

    return result;
  }

  /**
   * Registry checks for one directive
   */
  private check(node: DirectiveNode, context: BlockContext): Violation | null {
    const { directive } = node;

    if (!this.registry.has(directive)) {
      return this.options.strict
        ? { kind: 'UnknownDirective', message: ParseErrorMessages.unknownDirective(directive) }
        : null;
    }

    if (!this.options.checkContext && !this.options.checkArguments) {
      return null;
    }

    // Blocks of unknown modules have no context to check against
    const contextName = resolveContextName(context);
    if (contextName === null) {
      return null;
    }

    let candidates = this.registry.getSignatures(directive);

    if (this.options.checkContext) {
      candidates = candidates.filter(signature => signature.contexts.includes(contextName));
      if (candidates.length === 0) {
        return { kind: 'DirectiveNotAllowed', message: ParseErrorMessages.notAllowedHere(directive) };
      }
    }

    if (this.options.checkArguments) {
      const message = findArgumentProblem(node, candidates);
      if (message !== null) {
        return { kind: 'InvalidArguments', message };
      }
    }

    return null;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * First reason no signature accepts the node, or null when one does.
 * The reason reported is that of the last signature tried.
 */
export function findArgumentProblem(
  node: DirectiveNode,
  signatures: readonly DirectiveSignature[]
): string | null {
  const { directive, args } = node;
  let reason: string | null = null;

  for (const signature of signatures) {
    if (signature.block && node.block === undefined) {
      reason = ParseErrorMessages.missingBlock(directive);
      continue;
    }
    if (!signature.block && node.block !== undefined) {
      reason = ParseErrorMessages.missingTerminator(directive);
      continue;
    }
    if (signature.args === 'FLAG' && args.length === 1 && !isFlagValue(args[0])) {
      reason = ParseErrorMessages.invalidFlag(directive, args[0]);
      continue;
    }
    if (!acceptsArgumentCount(signature.args, args.length)) {
      reason = ParseErrorMessages.invalidArgumentCount(directive);
      continue;
    }
    return null;
  }

  return reason;
}

/**
 * Ignore filtering plus optional strict mode over parsed files
 */
export function filterDirectives(
  files: readonly ParsedFile[],
  ignoreDirectives: readonly string[],
  strict: boolean
): PolicyResult {
  return new DirectivePolicy({
    ignoreDirectives,
    strict,
    checkContext: false,
    checkArguments: false,
  }).apply(files);
}

/**
 * Create a directive policy
 */
export function createDirectivePolicy(
  options: DirectivePolicyOptions,
  registry?: DirectiveRegistry
): DirectivePolicy {
  return new DirectivePolicy(options, registry);
}
