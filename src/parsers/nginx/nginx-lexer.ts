/**
 * NGINX Configuration Lexer
 * @module parsers/nginx/nginx-lexer
 *
 * Turns configuration text into a flat token stream: words, quoted strings,
 * block delimiters, statement terminators and (optionally) comments.
 * The lexer never throws; an unterminated string is reported as an error
 * next to a best-effort token.
 */

import { createParseError, ParseErrorMessages } from './errors';
import { NginxToken, NginxTokenKind, ParseError } from './types';

// ============================================================================
// Lexer Types
// ============================================================================

/**
 * Lexer options
 */
export interface LexerOptions {
  /** Emit comment tokens instead of discarding them */
  readonly includeComments: boolean;
}

/**
 * Lexer result
 */
export interface LexerResult {
  readonly tokens: readonly NginxToken[];
  readonly errors: readonly ParseError[];
}

const DELIMITERS: Readonly<Record<string, NginxTokenKind>> = {
  '{': 'block-open',
  '}': 'block-close',
  ';': 'statement-end',
};

// ============================================================================
// NGINX Lexer
// ============================================================================

/**
 * Lexer for NGINX configuration syntax.
 *
 * @example
 * ```typescript
 * const lexer = new NginxLexer('events { worker_connections 1024; }', 'nginx.conf');
 * const { tokens, errors } = lexer.tokenize();
 * ```
 */
export class NginxLexer {
  private readonly input: string;
  private readonly filePath: string;
  private readonly includeComments: boolean;
  private pos: number = 0;
  private line: number = 1;
  private readonly tokens: NginxToken[] = [];
  private readonly errors: ParseError[] = [];

  constructor(input: string, filePath: string = '<input>', options: Partial<LexerOptions> = {}) {
    this.input = input;
    this.filePath = filePath;
    this.includeComments = options.includeComments ?? false;
  }

  /**
   * Tokenize the entire input
   */
  tokenize(): LexerResult {
    while (this.pos < this.input.length) {
      this.nextToken();
    }

    return {
      tokens: this.tokens,
      errors: this.errors,
    };
  }

  /**
   * Read the token starting at the current position
   */
  private nextToken(): void {
    const char = this.current();

    if (isWhitespace(char)) {
      this.advance();
      return;
    }

    if (char === '#') {
      this.readComment();
      return;
    }

    if (char === '"' || char === "'") {
      this.readQuoted(char);
      return;
    }

    const delimiter = DELIMITERS[char];
    if (delimiter) {
      this.push(delimiter, char, this.line);
      this.advance();
      return;
    }

    this.readWord();
  }

  // ============================================================================
  // Token Reading Methods
  // ============================================================================

  /**
   * Read a comment up to (not including) the end of the line
   */
  private readComment(): void {
    const line = this.line;
    const start = this.pos;
    while (this.pos < this.input.length && this.current() !== '\n') {
      this.advance();
    }
    if (this.includeComments) {
      this.push('comment', this.input.slice(start, this.pos), line);
    }
  }

  /**
   * Read a quoted string. Only the matching quote is unescaped; other
   * escape sequences stay verbatim.
   */
  private readQuoted(quote: string): void {
    const line = this.line;
    let value = '';
    let closed = false;
    this.advance(); // Skip opening quote

    while (this.pos < this.input.length) {
      const char = this.current();

      if (char === '\\' && this.pos + 1 < this.input.length) {
        const escaped = this.peek();
        value += escaped === quote ? quote : char + escaped;
        this.advance();
        this.advance();
        continue;
      }

      if (char === quote) {
        this.advance();
        closed = true;
        break;
      }

      value += char;
      this.advance();
    }

    if (!closed) {
      this.errors.push(
        createParseError(
          'UnterminatedString',
          ParseErrorMessages.unterminatedString(quote),
          this.filePath,
          line
        )
      );
    }

    this.push('quoted', value, line);
  }

  /**
   * Read a bare word. Quotes inside a word are ordinary characters,
   * a backslash protects the next character and `${...}` is kept whole.
   */
  private readWord(): void {
    const line = this.line;
    let value = '';

    while (this.pos < this.input.length) {
      const char = this.current();

      if (char === '\\' && this.pos + 1 < this.input.length) {
        value += char + this.peek();
        this.advance();
        this.advance();
        continue;
      }

      if (isWhitespace(char)) {
        break;
      }

      if (char === '{' && value.endsWith('$')) {
        value += this.readParameterExpansion();
        continue;
      }

      if (char in DELIMITERS) {
        break;
      }

      value += char;
      this.advance();
    }

    this.push('word', value, line);
  }

  /**
   * Read `{name}` after a `$`, stopping at the closing brace or whitespace
   */
  private readParameterExpansion(): string {
    let value = '';
    while (this.pos < this.input.length && !isWhitespace(this.current())) {
      const char = this.current();
      value += char;
      this.advance();
      if (char === '}') {
        break;
      }
    }
    return value;
  }

  // ============================================================================
  // Helper Methods
  // ============================================================================

  private current(): string {
    return this.input.charAt(this.pos);
  }

  private peek(): string {
    return this.input.charAt(this.pos + 1);
  }

  /**
   * Advance one character, counting lines
   */
  private advance(): void {
    if (this.input.charAt(this.pos) === '\n') {
      this.line++;
    }
    this.pos++;
  }

  private push(kind: NginxTokenKind, value: string, line: number): void {
    this.tokens.push({ kind, value, file: this.filePath, line });
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r' || char === '\f' || char === '\v';
}

/**
 * Tokenize configuration text
 */
export function tokenize(
  text: string,
  filename: string,
  options: Partial<LexerOptions> = {}
): LexerResult {
  return new NginxLexer(text, filename, options).tokenize();
}

/**
 * Whether a token can be a directive name or argument
 */
export function isValueToken(token: NginxToken): boolean {
  return token.kind === 'word' || token.kind === 'quoted';
}
