#!/usr/bin/env node
/**
 * NGINX Config Parse CLI
 * @module cli
 *
 * Command line entry point used by the discovery playbooks. Parses one
 * root configuration file and prints a JSON result on stdout:
 *
 *   { "changed": false, "config": <document>, "errors": [...] }
 *
 * Usage problems print `{ "failed": true, "msg": ..., "changed": false, "config": {} }`.
 *
 * Exit codes:
 *   0  parsed (whatever the document status, unless --fail-on-error)
 *   1  root path missing or not a file, unexpected failure, or a failed
 *      parse with --fail-on-error
 *   2  invalid options
 */

import * as path from 'path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { getErrorMessage, wrapError } from './errors';
import { setLogLevel } from './logging';
import { createNginxParser } from './parsers/nginx/nginx-parser';
import { ConfigFileSystem, nodeFileSystem } from './parsers/nginx/file-system';
import { NginxParserOptionsInput } from './parsers/nginx/config';

// ============================================================================
// CLI Types
// ============================================================================

/**
 * Process boundary of the CLI, replaceable in tests
 */
export interface CliIO {
  /** File access (default: the local disk) */
  fileSystem?: ConfigFileSystem;
  /** Standard output */
  readonly write?: (text: string) => void;
  /** Standard error */
  readonly writeError?: (text: string) => void;
}

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const CliOptionsSchema = z.object({
  includeComments: z.boolean().default(false),
  singleFile: z.boolean().default(false),
  ignore: z.array(z.string()).default([]),
  strict: z.boolean().default(false),
  combine: z.boolean().default(false),
  technical: z.boolean().default(false),
  baseDir: z.string().optional(),
  maxIncludeDepth: z.number().optional(),
  allowIncludeRepeats: z.boolean().default(false),
  includeDirectories: z.boolean().default(false),
  followSymlinks: z.boolean().default(false),
  checkContext: z.boolean().default(false),
  checkArguments: z.boolean().default(false),
  compact: z.boolean().default(false),
  failOnError: z.boolean().default(false),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

type CliOptions = z.infer<typeof CliOptionsSchema>;

// ============================================================================
// Program
// ============================================================================

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function toParserOptions(cli: CliOptions): NginxParserOptionsInput {
  return {
    includeComments: cli.includeComments,
    singleFile: cli.singleFile,
    ignoreDirectives: cli.ignore,
    strict: cli.strict,
    combineIncludes: cli.combine,
    technicalFormat: cli.technical,
    baseDir: cli.baseDir,
    maxIncludeDepth: cli.maxIncludeDepth,
    allowIncludeRepeats: cli.allowIncludeRepeats,
    includeDirectories: cli.includeDirectories,
    followSymlinks: cli.followSymlinks,
    checkContext: cli.checkContext,
    checkArguments: cli.checkArguments,
  };
}

/**
 * Build the command. `setExitCode` receives the exit code of the action.
 */
export function createProgram(io: CliIO = {}, setExitCode: (code: number) => void = () => undefined): Command {
  const fileSystem = io.fileSystem ?? nodeFileSystem;
  const write = io.write ?? ((text: string) => process.stdout.write(text));
  const writeError = io.writeError ?? ((text: string) => process.stderr.write(text));

  const program = new Command();

  program
    .name('nginx-config-parse')
    .description('Parse an NGINX configuration tree into a JSON document')
    .version('1.0.0')
    .argument('<path>', 'root configuration file')
    .option('--include-comments', 'keep comments in the output')
    .option('--single-file', 'do not expand include directives')
    .option('--ignore <name...>', 'directive names to drop from the output')
    .option('--strict', 'report directives missing from the registry')
    .option('--combine', 'technical format: splice includes into one file record')
    .option('--technical', 'emit the per-file technical format')
    .option('--base-dir <dir>', 'directory relative includes resolve against')
    .option('--max-include-depth <n>', 'maximum include chain length', parseInteger)
    .option('--allow-include-repeats', 'parse a file again each time it is included')
    .option('--include-directories', 'include every file of a directory named by an include')
    .option('--follow-symlinks', 'descend into symlinked directories while expanding globs')
    .option('--check-context', 'report directives used outside their allowed context')
    .option('--check-arguments', 'report directives with invalid arguments')
    .option('--compact', 'print JSON on a single line')
    .option('--fail-on-error', 'exit with 1 when the parse failed')
    .option('--log-level <level>', `log level (${LOG_LEVELS.join(', ')})`)
    .configureOutput({
      writeOut: text => write(text),
      writeErr: text => writeError(text),
    })
    .exitOverride()
    .action((target: string, rawOptions: unknown) => {
      const printJson = (value: unknown, compact: boolean): void => {
        write(`${compact ? JSON.stringify(value) : JSON.stringify(value, null, 2)}\n`);
      };
      const fail = (msg: string, code: number, compact: boolean): void => {
        printJson({ failed: true, msg, changed: false, config: {} }, compact);
        setExitCode(code);
      };

      const parsedOptions = CliOptionsSchema.safeParse(rawOptions);
      if (!parsedOptions.success) {
        const details = parsedOptions.error.issues
          .map(issue => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ');
        fail(`Invalid options: ${details}`, 2, false);
        return;
      }

      const cli = parsedOptions.data;
      if (cli.logLevel) {
        setLogLevel(cli.logLevel);
      }

      try {
        const entryType = fileSystem.getEntryType(path.resolve(target));
        if (entryType === null) {
          fail(`File not found: ${target}`, 1, cli.compact);
          return;
        }
        if (entryType !== 'file') {
          fail(`Path is not a file: ${target}`, 1, cli.compact);
          return;
        }

        const parser = createNginxParser(toParserOptions(cli), { fileSystem });
        const document = parser.parseFile(target);

        printJson({ changed: false, config: document, errors: document.errors }, cli.compact);
        setExitCode(cli.failOnError && document.status === 'failed' ? 1 : 0);
      } catch (error) {
        const failure = wrapError(error, `Failed to parse nginx configuration: ${getErrorMessage(error)}`);
        fail(failure.message, failure.exitCode, cli.compact);
      }
    });

  return program;
}

/**
 * Run the CLI on user arguments (without the node and script entries)
 *
 * @returns Process exit code
 */
export function runCli(argv: readonly string[], io: CliIO = {}): number {
  let exitCode = 0;
  const program = createProgram(io, code => {
    exitCode = code;
  });

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit with 0; usage mistakes with 2
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }

  return exitCode;
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
