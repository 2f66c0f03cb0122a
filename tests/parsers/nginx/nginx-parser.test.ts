/**
 * NGINX Config Parser Tests
 * @module tests/parsers/nginx/nginx-parser.test
 *
 * End-to-end tests for the parser facade: both projections, include
 * handling through the in-memory file system, filtering and option errors.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import {
  NginxConfigParser,
  createNginxParser,
  parseNginxConfig,
  parseNginxString,
} from '../../../src/parsers/nginx/nginx-parser';
import { ConfigValidationError } from '../../../src/parsers/nginx/config';
import { isReadableDocument, isTechnicalDocument } from '../../../src/parsers/nginx/types';
import type {
  ParseDocument,
  ReadableDocument,
  TechnicalDirective,
  TechnicalDocument,
} from '../../../src/parsers/nginx/types';
import { InMemoryFileSystem, createInMemoryFileSystem } from '../../mocks/file-system.mock';
import {
  COMMENTED,
  EVENTS_ONLY,
  MAIN_CONFIG,
  MIME_TYPES,
  SITES_ROOT,
  SITE_A,
  SITE_B,
  TWO_SERVERS,
  UNCLOSED_HTTP_SERVER,
} from './fixtures/sample-configs';

// ============================================================================
// Helpers
// ============================================================================

const ROOT = '/etc/nginx/nginx.conf';

function readable(doc: ParseDocument): ReadableDocument {
  if (!isReadableDocument(doc)) {
    throw new Error('expected the readable projection');
  }
  return doc;
}

function technical(doc: ParseDocument): TechnicalDocument {
  if (!isTechnicalDocument(doc)) {
    throw new Error('expected the technical projection');
  }
  return doc;
}

function directiveNames(nodes: readonly TechnicalDirective[]): string[] {
  return nodes.flatMap(node => [node.directive, ...directiveNames(node.block ?? [])]);
}

// ============================================================================
// Scenario Tests
// ============================================================================

describe('NginxConfigParser', () => {
  let fileSystem: InMemoryFileSystem;
  let parser: NginxConfigParser;

  beforeEach(() => {
    fileSystem = createInMemoryFileSystem({
      [ROOT]: MAIN_CONFIG,
      '/etc/nginx/mime.types': MIME_TYPES,
    });
    parser = new NginxConfigParser({}, { fileSystem });
  });

  describe('readable projection', () => {
    it('should project a simple block', () => {
      const doc = readable(parser.parseString(EVENTS_ONLY));

      expect(doc.status).toBe('ok');
      expect(doc.errors).toEqual([]);
      expect(doc.config).toEqual({ events: { worker_connections: '1024' } });
    });

    it('should keep repeated server blocks in source order', () => {
      const doc = readable(parser.parseString(TWO_SERVERS));

      expect(doc.config).toEqual({ http: { server: [{ listen: '80' }, { listen: '8080' }] } });
    });

    it('should merge a full configuration with its includes', () => {
      const doc = readable(parser.parseFile(ROOT));

      expect(doc.status).toBe('ok');
      expect(doc.config).toEqual({
        user: 'nginx',
        worker_processes: 'auto',
        events: { worker_connections: '1024' },
        http: {
          types: { 'text/html': ['html', 'htm'], 'application/json': 'json' },
          default_type: 'application/octet-stream',
          sendfile: 'on',
          server: [
            {
              listen: '80',
              server_name: ['example.com', 'www.example.com'],
              ssl_certificate_key: '/etc/ssl/private/example.key',
              location: [
                { match: '/', root: '/var/www/html', index: 'index.html' },
                { match: '/api', proxy_pass: 'http://backend' },
              ],
            },
          ],
        },
      });
      expect(doc.info).toEqual({
        mainFile: ROOT,
        includedFiles: ['/etc/nginx/mime.types'],
        totalFilesProcessed: 2,
      });
    });

    it('should keep comments when asked to', () => {
      const doc = readable(parser.parseString(COMMENTED, 'nginx.conf', { includeComments: true }));

      expect(doc.config).toEqual({
        '#0': 'main configuration',
        worker_processes: '2',
        '#2': 'inline note',
        events: { '#0': 'tuning', worker_connections: '512' },
      });
    });
  });

  // ============================================================================
  // Malformed Input Tests
  // ============================================================================

  describe('malformed input', () => {
    it('should report one unterminated block per unclosed level and keep partial output', () => {
      const doc = readable(parser.parseString(UNCLOSED_HTTP_SERVER));

      expect(doc.status).toBe('failed');
      expect(doc.errors).toEqual([
        {
          error: 'unexpected end of file, expecting "}" to close "server" block',
          file: 'nginx.conf',
          line: 1,
        },
        {
          error: 'unexpected end of file, expecting "}" to close "http" block',
          file: 'nginx.conf',
          line: 1,
        },
      ]);
      expect(doc.config).toEqual({ http: { server: [{ listen: '80' }] } });
    });

    it('should keep every directive before a single unmatched brace', () => {
      const doc = readable(parser.parseString('user nginx;\nworker_processes 2;\nevents {\n  worker_connections 8;\n'));

      expect(doc.status).toBe('failed');
      expect(doc.errors).toHaveLength(1);
      expect(doc.config).toEqual({
        user: 'nginx',
        worker_processes: '2',
        events: { worker_connections: '8' },
      });
    });

    it('should report a missing root file as data', () => {
      const doc = technical(parser.parseFile('/etc/nginx/missing.conf', { technicalFormat: true }));

      expect(doc).toEqual({
        format: 'technical',
        status: 'failed',
        errors: [{ error: 'file not found: /etc/nginx/missing.conf', file: '/etc/nginx/missing.conf', line: 0 }],
        config: [
          {
            file: '/etc/nginx/missing.conf',
            status: 'failed',
            errors: [{ error: 'file not found: /etc/nginx/missing.conf', line: 0 }],
            parsed: [],
          },
        ],
      });
    });

    it('should keep parsing siblings of a broken include', () => {
      fileSystem
        .addFile('/etc/nginx/conf.d/a.conf', 'gzip on;\n}\n')
        .addFile('/etc/nginx/conf.d/b.conf', 'sendfile on;');

      const doc = readable(parser.parseString('http { include conf.d/*.conf; }', ROOT));

      expect(doc.status).toBe('failed');
      expect(doc.errors).toEqual([{ error: 'unexpected "}"', file: '/etc/nginx/conf.d/a.conf', line: 2 }]);
      expect(doc.config).toEqual({ http: { gzip: 'on', sendfile: 'on' } });
    });
  });

  // ============================================================================
  // Include Tests
  // ============================================================================

  describe('includes', () => {
    beforeEach(() => {
      fileSystem
        .addFile(ROOT, SITES_ROOT)
        .addFile('/etc/nginx/sites-enabled/b.conf', SITE_B)
        .addFile('/etc/nginx/sites-enabled/a.conf', SITE_A);
    });

    it('should list glob matches as separate records in lexicographic order', () => {
      const doc = technical(parser.parseFile(ROOT, { technicalFormat: true }));

      expect(doc.config.map(record => record.file)).toEqual([
        ROOT,
        '/etc/nginx/sites-enabled/a.conf',
        '/etc/nginx/sites-enabled/b.conf',
      ]);
      expect(doc.config[0].parsed[0].block).toEqual([
        { directive: 'include', line: 2, args: ['sites-enabled/*.conf'], includes: [1, 2] },
      ]);
    });

    it('should merge glob matches inline at the include position', () => {
      const doc = readable(parser.parseFile(ROOT));

      expect(doc.config).toEqual({
        http: {
          server: [
            { listen: '80', server_name: 'a.example.com' },
            { listen: '81', server_name: 'b.example.com' },
          ],
        },
      });
      expect(doc.info.includedFiles).toEqual([
        '/etc/nginx/sites-enabled/a.conf',
        '/etc/nginx/sites-enabled/b.conf',
      ]);
    });

    it('should splice glob matches into one record when combining', () => {
      const doc = technical(parser.parseFile(ROOT, { technicalFormat: true, combineIncludes: true }));

      expect(doc.config).toHaveLength(1);
      expect(doc.config[0].parsed[0].block?.map(node => [node.file, node.directive])).toEqual([
        ['/etc/nginx/sites-enabled/a.conf', 'server'],
        ['/etc/nginx/sites-enabled/b.conf', 'server'],
      ]);
    });

    it('should list a file included twice only once', () => {
      fileSystem.addFile(ROOT, 'include b.conf;\ninclude b.conf;\n').addFile('/etc/nginx/b.conf', 'gzip on;');

      const doc = technical(parser.parseFile(ROOT, { technicalFormat: true }));

      expect(doc.config.map(record => record.file)).toEqual([ROOT, '/etc/nginx/b.conf']);
    });

    it('should leave includes unexpanded in single-file mode', () => {
      const doc = readable(parser.parseFile(ROOT, { singleFile: true }));

      expect(doc.config).toEqual({ http: { include: 'sites-enabled/*.conf' } });
      expect(doc.info.totalFilesProcessed).toBe(1);
    });

    it('should resolve includes against the base directory', () => {
      fileSystem.addFile('/srv/extra.conf', 'gzip off;');

      const doc = readable(
        parseNginxString('include extra.conf;', '/tmp/nginx.conf', { baseDir: '/srv' }, { fileSystem })
      );

      expect(doc.config).toEqual({ gzip: 'off' });
    });
  });

  // ============================================================================
  // Filtering Tests
  // ============================================================================

  describe('filtering', () => {
    it('should remove ignored directives at every depth and in included files', () => {
      const doc = technical(
        parser.parseFile(ROOT, { technicalFormat: true, ignoreDirectives: ['ssl_certificate_key', 'text/html'] })
      );

      const names = doc.config.flatMap(record => directiveNames(record.parsed));
      expect(names).not.toContain('ssl_certificate_key');
      expect(names).not.toContain('text/html');
      expect(names).toContain('application/json');
    });

    it('should fail strict parses with unknown directives', () => {
      const doc = readable(parser.parseString('user nginx;\nfoo_bar 1;', 'nginx.conf', { strict: true }));

      expect(doc.status).toBe('failed');
      expect(doc.errors).toEqual([{ error: 'unknown directive "foo_bar"', file: 'nginx.conf', line: 2 }]);
      expect(doc.config).toEqual({ user: 'nginx' });
    });

    it('should accept a valid configuration with every check enabled', () => {
      const doc = parser.parseFile(ROOT, { strict: true, checkContext: true, checkArguments: true });

      expect(doc.status).toBe('ok');
      expect(doc.errors).toEqual([]);
    });
  });

  // ============================================================================
  // Tree Reuse Tests
  // ============================================================================

  describe('parseTree and project', () => {
    it('should project one tree with different options without changing it', () => {
      const files = parser.parseTree(ROOT);

      const filtered = readable(parser.project(files, { ignoreDirectives: ['user'] }));
      const unfiltered = readable(parser.project(files));

      expect(filtered.config.user).toBeUndefined();
      expect(unfiltered.config.user).toBe('nginx');
      expect(files[0].parsed[0].directive).toBe('user');
    });

    it('should produce identical output for repeated projections', () => {
      const files = parser.parseTree(ROOT);

      expect(JSON.stringify(parser.project(files))).toBe(JSON.stringify(parser.project(files)));
      expect(JSON.stringify(parser.parseFile(ROOT))).toBe(JSON.stringify(parser.parseFile(ROOT)));
    });

    it('should parse root content given in memory', () => {
      const files = parser.parseTree(ROOT, undefined, 'include mime.types;');

      expect(files.map(file => file.file)).toEqual([ROOT, '/etc/nginx/mime.types']);
    });
  });

  // ============================================================================
  // Options Tests
  // ============================================================================

  describe('options', () => {
    it('should reject invalid constructor options', () => {
      expect(() => new NginxConfigParser({ maxIncludeDepth: -1 })).toThrow(ConfigValidationError);
    });

    it('should reject invalid per-call options', () => {
      expect(() => parser.parseString('user nginx;', 'nginx.conf', { maxIncludeDepth: 1.5 })).toThrow(
        ConfigValidationError
      );
    });

    it('should layer per-call options over constructor options', () => {
      const technicalParser = createNginxParser({ technicalFormat: true }, { fileSystem });

      expect(isTechnicalDocument(technicalParser.parseString('user nginx;'))).toBe(true);
      expect(isReadableDocument(technicalParser.parseString('user nginx;', 'nginx.conf', { technicalFormat: false }))).toBe(
        true
      );
    });
  });

  // ============================================================================
  // Detection Tests
  // ============================================================================

  describe('canParse', () => {
    it('should accept nginx.conf by name', () => {
      expect(parser.canParse('/etc/nginx/nginx.conf')).toBe(true);
      expect(parser.canParse('NGINX.CONF')).toBe(true);
    });

    it('should accept other .conf files with NGINX blocks', () => {
      expect(parser.canParse('/etc/nginx/sites-enabled/a.conf', SITE_A)).toBe(true);
      expect(parser.canParse('site.conf', 'location /api {\n  proxy_pass http://b;\n}')).toBe(true);
    });

    it('should reject other files', () => {
      expect(parser.canParse('app.conf', 'key = value')).toBe(false);
      expect(parser.canParse('site.conf')).toBe(false);
      expect(parser.canParse('nginx.yaml', 'http {')).toBe(false);
    });

    it('should describe itself', () => {
      expect(parser.name).toBe('nginx-conf');
      expect(parser.supportedExtensions).toEqual(['.conf']);
    });
  });

  // ============================================================================
  // Logging Tests
  // ============================================================================

  describe('logging', () => {
    it('should log the lifecycle of a parse', () => {
      const lines: string[] = [];
      const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });

      parseNginxConfig(ROOT, { singleFile: true }, { fileSystem, logger });

      const events = lines.map(line => JSON.parse(line).event);
      expect(events).toEqual(['nginx_parse_start', 'nginx_file_parsed', 'nginx_parse_complete', 'performance_metric']);
    });

    it('should log failed parses as warnings', () => {
      const lines: string[] = [];
      const logger = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) });

      parseNginxString(UNCLOSED_HTTP_SERVER, 'nginx.conf', {}, { logger });

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({ event: 'nginx_parse_complete', status: 'failed', errorCount: 2 });
    });
  });
});
