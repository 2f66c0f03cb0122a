/**
 * NGINX Block Parser Unit Tests
 * @module tests/parsers/nginx/block-parser.test
 *
 * Tests for building directive trees from tokens, including structural
 * error recovery and comment placement.
 */

import { describe, it, expect } from 'vitest';
import { BlockParser, parseTokens, stripIfParentheses } from '../../../src/parsers/nginx/block-parser';
import { tokenize } from '../../../src/parsers/nginx/nginx-lexer';

function parse(text: string, includeComments: boolean = false) {
  const { tokens } = tokenize(text, 'test.conf', { includeComments });
  return parseTokens(tokens, 'test.conf');
}

// ============================================================================
// Tree Construction Tests
// ============================================================================

describe('BlockParser', () => {
  describe('tree construction', () => {
    it('should parse a block with a simple directive', () => {
      const result = parse('events { worker_connections 1024; }');

      expect(result.errors).toEqual([]);
      expect(result.nodes).toEqual([
        {
          directive: 'events',
          args: [],
          file: 'test.conf',
          line: 1,
          block: [{ directive: 'worker_connections', args: ['1024'], file: 'test.conf', line: 1 }],
        },
      ]);
    });

    it('should distinguish an empty block from no block', () => {
      const result = parse('http {}\npid /run/nginx.pid;');

      expect(result.nodes[0].block).toEqual([]);
      expect(result.nodes[1].block).toBeUndefined();
      expect('block' in result.nodes[1]).toBe(false);
    });

    it('should keep quoted arguments as single arguments', () => {
      const result = parse('add_header X-Test "a b";');

      expect(result.nodes[0].args).toEqual(['X-Test', 'a b']);
    });

    it('should record the line each directive starts on', () => {
      const result = parse('user nginx;\n\nevents {\n  worker_connections 1;\n}\n');

      expect(result.nodes.map(n => [n.directive, n.line])).toEqual([
        ['user', 1],
        ['events', 3],
      ]);
      expect(result.nodes[1].block?.[0].line).toBe(4);
    });

    it('should parse deeply nested blocks', () => {
      const result = parse('http { server { location / { location /a { return 204; } } } }');

      const inner = result.nodes[0].block?.[0].block?.[0].block?.[0];
      expect(inner?.directive).toBe('location');
      expect(inner?.args).toEqual(['/a']);
      expect(inner?.block).toEqual([{ directive: 'return', args: ['204'], file: 'test.conf', line: 1 }]);
    });

    it('should strip the parentheses of if conditions', () => {
      const result = parse('if ($request_method = POST) { return 405; }');

      expect(result.nodes[0].args).toEqual(['$request_method', '=', 'POST']);
    });

    it('should strip free-standing if parentheses', () => {
      const result = parse('if ( $slow ) { limit_rate 10k; }');

      expect(result.nodes[0].args).toEqual(['$slow']);
    });
  });

  // ============================================================================
  // Error Recovery Tests
  // ============================================================================

  describe('error recovery', () => {
    it('should report one unterminated block per open level, innermost first', () => {
      const result = parse('http {\n  server {\n    listen 80;\n');

      expect(result.errors).toEqual([
        {
          kind: 'UnterminatedBlock',
          message: 'unexpected end of file, expecting "}" to close "server" block',
          file: 'test.conf',
          line: 2,
        },
        {
          kind: 'UnterminatedBlock',
          message: 'unexpected end of file, expecting "}" to close "http" block',
          file: 'test.conf',
          line: 1,
        },
      ]);
      expect(result.nodes[0].block?.[0].block).toEqual([
        { directive: 'listen', args: ['80'], file: 'test.conf', line: 3 },
      ]);
    });

    it('should keep directives before an unmatched opening brace', () => {
      const result = parse('user nginx;\nhttp {\n  sendfile on;\n');

      expect(result.errors.map(e => [e.kind, e.line])).toEqual([['UnterminatedBlock', 2]]);
      expect(result.nodes.map(n => n.directive)).toEqual(['user', 'http']);
      expect(result.nodes[1].block?.map(n => n.directive)).toEqual(['sendfile']);
    });

    it('should skip an unexpected closing brace and continue', () => {
      const result = parse('a 1;\n}\nb 2;');

      expect(result.errors).toEqual([
        { kind: 'UnexpectedClosingBrace', message: 'unexpected "}"', file: 'test.conf', line: 2 },
      ]);
      expect(result.nodes.map(n => n.directive)).toEqual(['a', 'b']);
    });

    it('should report a directive closed by a brace instead of a semicolon', () => {
      const result = parse('events { worker_connections 1024 }\nuser nginx;');

      expect(result.errors).toEqual([
        {
          kind: 'MissingTerminator',
          message: 'directive "worker_connections" is not terminated by ";"',
          file: 'test.conf',
          line: 1,
        },
      ]);
      expect(result.nodes.map(n => n.directive)).toEqual(['events', 'user']);
      expect(result.nodes[0].block?.[0].args).toEqual(['1024']);
    });

    it('should keep a directive cut off by the end of input', () => {
      const result = parse('worker_processes 4');

      expect(result.nodes).toEqual([{ directive: 'worker_processes', args: ['4'], file: 'test.conf', line: 1 }]);
      expect(result.errors).toEqual([
        {
          kind: 'UnexpectedEndOfFile',
          message: 'unexpected end of file, expecting ";" or "}" after "worker_processes"',
          file: 'test.conf',
          line: 1,
        },
      ]);
    });

    it('should report a stray semicolon', () => {
      const result = parse('; a 1;');

      expect(result.errors.map(e => [e.kind, e.message])).toEqual([['UnexpectedToken', 'unexpected ";"']]);
      expect(result.nodes.map(n => n.directive)).toEqual(['a']);
    });

    it('should discard the contents of a block without a directive', () => {
      const result = parse('{ a 1; }\nb 2;');

      expect(result.errors.map(e => [e.kind, e.message, e.line])).toEqual([['UnexpectedToken', 'unexpected "{"', 1]]);
      expect(result.nodes.map(n => n.directive)).toEqual(['b']);
    });

    it('should report an unterminated anonymous block without a directive name', () => {
      const result = parse('{ a 1;');

      expect(result.errors.map(e => e.message)).toEqual([
        'unexpected "{"',
        'unexpected end of file, expecting "}"',
      ]);
    });
  });

  // ============================================================================
  // Comment Tests
  // ============================================================================

  describe('comments', () => {
    it('should produce comment nodes when comments are tokenized', () => {
      const result = parse('# top\na 1; # after a\n', true);

      expect(result.nodes).toEqual([
        { directive: '#', args: [], file: 'test.conf', line: 1, comment: ' top' },
        { directive: 'a', args: ['1'], file: 'test.conf', line: 2 },
        { directive: '#', args: [], file: 'test.conf', line: 2, comment: ' after a' },
      ]);
    });

    it('should place comments between arguments after the directive', () => {
      const result = parse('a 1 # mid\n  2;', true);

      expect(result.nodes).toEqual([
        { directive: 'a', args: ['1', '2'], file: 'test.conf', line: 1 },
        { directive: '#', args: [], file: 'test.conf', line: 1, comment: ' mid' },
      ]);
    });

    it('should keep comments inside blocks', () => {
      const result = parse('events {\n  # tuning\n  worker_connections 512;\n}', true);

      expect(result.nodes[0].block?.map(n => n.directive)).toEqual(['#', 'worker_connections']);
      expect(result.nodes[0].block?.[0].comment).toBe(' tuning');
    });
  });

  it('should be usable directly with a file path', () => {
    const { tokens } = tokenize('a 1;', 'x.conf');
    const result = new BlockParser('x.conf').parse(tokens);

    expect(result.nodes[0].file).toBe('x.conf');
  });
});

// ============================================================================
// Utility Function Tests
// ============================================================================

describe('stripIfParentheses', () => {
  it('should remove attached parentheses', () => {
    expect(stripIfParentheses(['($a', '=', 'b)'])).toEqual(['$a', '=', 'b']);
  });

  it('should drop detached parentheses', () => {
    expect(stripIfParentheses(['(', '$a', ')'])).toEqual(['$a']);
  });

  it('should leave arguments without parentheses alone', () => {
    expect(stripIfParentheses(['$a'])).toEqual(['$a']);
    expect(stripIfParentheses([])).toEqual([]);
  });
});
