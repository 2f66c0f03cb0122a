/**
 * NGINX Block Parser
 * @module parsers/nginx/block-parser
 *
 * Builds the directive tree of one file from its token stream.
 * Nesting is tracked with an explicit frame stack, and structural errors
 * are recovered where they occur so one pass reports as many as possible.
 */

import { createParseError, ParseErrorMessages } from './errors';
import { isValueToken } from './nginx-lexer';
import { COMMENT_DIRECTIVE, DirectiveNode, NginxToken, ParseError } from './types';

// ============================================================================
// Parser Types
// ============================================================================

/**
 * Block parser result
 */
export interface BlockParseResult {
  readonly nodes: DirectiveNode[];
  readonly errors: ParseError[];
}

/**
 * An open block. `owner` is null for the top level and for a stray `{`
 * whose contents are discarded.
 */
interface Frame {
  readonly owner: DirectiveNode | null;
  readonly children: DirectiveNode[];
  readonly line: number;
}

// ============================================================================
// Block Parser
// ============================================================================

/**
 * Parser turning one file's tokens into directive nodes.
 *
 * @example
 * ```typescript
 * const { tokens } = tokenize(text, 'nginx.conf');
 * const { nodes, errors } = new BlockParser('nginx.conf').parse(tokens);
 * ```
 */
export class BlockParser {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Parse a token stream into top-level directive nodes
   */
  parse(tokens: readonly NginxToken[]): BlockParseResult {
    const errors: ParseError[] = [];
    const root: Frame = { owner: null, children: [], line: 0 };
    const stack: Frame[] = [root];
    let pos = 0;

    while (pos < tokens.length) {
      const token = tokens[pos];
      const frame = stack[stack.length - 1];

      switch (token.kind) {
        case 'comment':
          frame.children.push(this.createComment(token.value, token.line));
          pos++;
          break;

        case 'block-close':
          if (stack.length > 1) {
            stack.pop();
          } else {
            errors.push(this.error('UnexpectedClosingBrace', ParseErrorMessages.unexpectedClosingBrace(), token.line));
          }
          pos++;
          break;

        case 'statement-end':
          errors.push(this.error('UnexpectedToken', ParseErrorMessages.unexpectedToken(';'), token.line));
          pos++;
          break;

        case 'block-open':
          errors.push(this.error('UnexpectedToken', ParseErrorMessages.unexpectedToken('{'), token.line));
          stack.push({ owner: null, children: [], line: token.line });
          pos++;
          break;

        default:
          pos = this.parseDirective(tokens, pos, stack, errors);
      }
    }

    // Every block still open at end of input is unterminated, innermost first
    while (stack.length > 1) {
      const frame = stack.pop();
      if (frame) {
        errors.push(
          this.error(
            'UnterminatedBlock',
            ParseErrorMessages.unterminatedBlock(frame.owner ? frame.owner.directive : null),
            frame.line
          )
        );
      }
    }

    return { nodes: root.children, errors };
  }

  /**
   * Parse one directive starting at `start`; returns the position of the
   * next unconsumed token.
   */
  private parseDirective(
    tokens: readonly NginxToken[],
    start: number,
    stack: Frame[],
    errors: ParseError[]
  ): number {
    const nameToken = tokens[start];
    const frame = stack[stack.length - 1];
    const node: DirectiveNode = {
      directive: nameToken.value,
      args: [],
      file: this.filePath,
      line: nameToken.line,
    };
    const argComments: DirectiveNode[] = [];

    let pos = start + 1;
    while (pos < tokens.length && (isValueToken(tokens[pos]) || tokens[pos].kind === 'comment')) {
      const token = tokens[pos];
      if (token.kind === 'comment') {
        argComments.push(this.createComment(token.value, node.line));
      } else {
        node.args.push(token.value);
      }
      pos++;
    }

    if (node.directive === 'if') {
      node.args = stripIfParentheses(node.args);
    }

    frame.children.push(node);
    frame.children.push(...argComments);

    const terminator = tokens[pos];
    if (terminator === undefined) {
      errors.push(this.error('UnexpectedEndOfFile', ParseErrorMessages.unexpectedEndOfFile(node.directive), node.line));
      return pos;
    }

    switch (terminator.kind) {
      case 'statement-end':
        return pos + 1;

      case 'block-open':
        node.block = [];
        stack.push({ owner: node, children: node.block, line: node.line });
        return pos + 1;

      default:
        // A `}` ends the directive; leave it for the caller so it still closes the block
        errors.push(this.error('MissingTerminator', ParseErrorMessages.missingTerminator(node.directive), node.line));
        return pos;
    }
  }

  private createComment(raw: string, line: number): DirectiveNode {
    return {
      directive: COMMENT_DIRECTIVE,
      args: [],
      file: this.filePath,
      line,
      comment: raw.startsWith('#') ? raw.slice(1) : raw,
    };
  }

  private error(kind: ParseError['kind'], message: string, line: number): ParseError {
    return createParseError(kind, message, this.filePath, line);
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Removes the parentheses around an `if` condition:
 * `( $a = b )` and `($a = b)` both become `$a`, `=`, `b`.
 */
export function stripIfParentheses(args: readonly string[]): string[] {
  if (args.length === 0) {
    return [...args];
  }

  const first = args[0];
  const last = args[args.length - 1];
  if (!first.startsWith('(') || !last.endsWith(')')) {
    return [...args];
  }

  const result = [...args];
  result[0] = result[0].slice(1).trimStart();
  result[result.length - 1] = result[result.length - 1].slice(0, -1).trimEnd();

  const start = result[0] === '' ? 1 : 0;
  const end = result.length - (result[result.length - 1] === '' ? 1 : 0);
  return result.slice(start, Math.max(start, end));
}

/**
 * Parse tokens of a single file
 */
export function parseTokens(tokens: readonly NginxToken[], filePath: string): BlockParseResult {
  return new BlockParser(filePath).parse(tokens);
}
