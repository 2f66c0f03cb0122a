/**
 * NGINX Parser Configuration
 * @module parsers/nginx/config
 *
 * Validated option bag for the NGINX parser. Invalid options are a
 * programmer error and throw ConfigValidationError; malformed configuration
 * files never do.
 *
 * @example
 * ```typescript
 * import { createNginxParserConfig, CONFIG_PRESETS } from './config';
 *
 * // Defaults: readable projection, includes expanded, lenient parsing
 * const config = createNginxParserConfig();
 *
 * // Redact secrets and validate strictly
 * const strictConfig = createNginxParserConfig({
 *   ...CONFIG_PRESETS.strict,
 *   ignoreDirectives: ['ssl_certificate_key', 'auth_basic_user_file'],
 * });
 * ```
 */

import { z } from 'zod';
import { BaseError } from '../../errors';

// ============================================================================
// Schema
// ============================================================================

/**
 * Option bag schema. Unknown keys are rejected.
 */
export const NginxParserOptionsSchema = z.object({
  /** Keep comments in the output */
  includeComments: z.boolean().default(false),
  /** Parse only the root file; include directives stay unexpanded */
  singleFile: z.boolean().default(false),
  /** Directive names removed from the output (case-sensitive) */
  ignoreDirectives: z.array(z.string().min(1)).default([]),
  /** Report directives missing from the registry as errors */
  strict: z.boolean().default(false),
  /** Technical projection only: splice includes into a single file record */
  combineIncludes: z.boolean().default(false),
  /** Emit the technical projection instead of the readable one */
  technicalFormat: z.boolean().default(false),
  /** Directory relative include paths resolve against (default: root file's directory) */
  baseDir: z.string().min(1).optional(),
  /** Parse a file again each time it is included */
  allowIncludeRepeats: z.boolean().default(false),
  /** Include every file of a directory named by an include */
  includeDirectories: z.boolean().default(false),
  /** Descend into symlinked directories while expanding globs */
  followSymlinks: z.boolean().default(false),
  /** Maximum length of an include chain below the root file */
  maxIncludeDepth: z.number().int().min(0).max(100).default(10),
  /** Report directives used outside their allowed context */
  checkContext: z.boolean().default(false),
  /** Report directives with the wrong number or shape of arguments */
  checkArguments: z.boolean().default(false),
}).strict();

/**
 * Fully populated parser options
 */
export type NginxParserOptions = z.infer<typeof NginxParserOptionsSchema>;

/**
 * Options as accepted from callers (every field optional)
 */
export type NginxParserOptionsInput = z.input<typeof NginxParserOptionsSchema>;

// ============================================================================
// Validation
// ============================================================================

/**
 * Validation error details for a specific option.
 */
export interface ConfigValidationIssue {
  /** The option path that failed validation */
  readonly field: string;
  /** Human-readable error message */
  readonly message: string;
}

/**
 * Error thrown when the option bag is invalid.
 */
export class ConfigValidationError extends BaseError {
  /** The validation issues that caused the error */
  readonly issues: readonly ConfigValidationIssue[];

  constructor(issues: readonly ConfigValidationIssue[]) {
    const summary = issues.map(i => `${i.field}: ${i.message}`).join('; ');
    super(`NGINX parser configuration validation failed: ${summary}`, 'CONFIG_VALIDATION_ERROR', {
      details: { issues },
    });
    this.issues = issues;
  }
}

/**
 * Validate an option bag without throwing.
 *
 * @returns Validation issues (empty if valid)
 */
export function validateConfig(input: unknown): ConfigValidationIssue[] {
  const result = NginxParserOptionsSchema.safeParse(input ?? {});
  if (result.success) {
    return [];
  }
  return toIssues(result.error);
}

function toIssues(error: z.ZodError): ConfigValidationIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

// ============================================================================
// Configuration Factory
// ============================================================================

/**
 * Default option values
 */
export const DEFAULT_NGINX_PARSER_CONFIG: NginxParserOptions = NginxParserOptionsSchema.parse({});

/**
 * Create a complete, validated configuration from optional overrides.
 *
 * @throws ConfigValidationError when an option is invalid
 */
export function createNginxParserConfig(overrides?: NginxParserOptionsInput): NginxParserOptions {
  const result = NginxParserOptionsSchema.safeParse(overrides ?? {});
  if (!result.success) {
    throw new ConfigValidationError(toIssues(result.error));
  }
  return result.data;
}

/**
 * Layer overrides on top of an existing configuration.
 *
 * @throws ConfigValidationError when the merged options are invalid
 */
export function mergeConfig(
  base: NginxParserOptions,
  overrides?: NginxParserOptionsInput
): NginxParserOptions {
  if (!overrides) {
    return base;
  }
  return createNginxParserConfig({ ...base, ...overrides });
}

// ============================================================================
// Configuration Presets
// ============================================================================

/**
 * Preset configurations for common use cases.
 */
export const CONFIG_PRESETS = {
  /** Readable projection, lenient parsing */
  default: DEFAULT_NGINX_PARSER_CONFIG,

  /** Technical projection with comments, for provenance audits */
  audit: createNginxParserConfig({
    technicalFormat: true,
    includeComments: true,
  }),

  /** Production validation: unknown, misplaced and malformed directives fail the parse */
  strict: createNginxParserConfig({
    strict: true,
    checkContext: true,
    checkArguments: true,
  }),

  /** Conservative limits for configuration trees of unknown origin */
  safe: createNginxParserConfig({
    maxIncludeDepth: 3,
    allowIncludeRepeats: false,
    includeDirectories: false,
    followSymlinks: false,
    ignoreDirectives: ['ssl_certificate_key', 'ssl_password_file', 'auth_basic_user_file'],
  }),
} as const;

export type ConfigPresetName = keyof typeof CONFIG_PRESETS;

/**
 * Get a preset configuration by name.
 */
export function getConfigPreset(name: ConfigPresetName): NginxParserOptions {
  return CONFIG_PRESETS[name];
}

// ============================================================================
// Environment-based Configuration
// ============================================================================

/**
 * Create configuration from environment variables.
 *
 * Supported environment variables:
 * - NGINX_PARSER_MAX_INCLUDE_DEPTH
 * - NGINX_PARSER_INCLUDE_COMMENTS
 * - NGINX_PARSER_SINGLE_FILE
 * - NGINX_PARSER_STRICT
 * - NGINX_PARSER_TECHNICAL_FORMAT
 * - NGINX_PARSER_FOLLOW_SYMLINKS
 * - NGINX_PARSER_IGNORE_DIRECTIVES (comma separated)
 *
 * Precedence: defaults < environment < explicit overrides.
 */
export function createConfigFromEnv(
  overrides?: NginxParserOptionsInput,
  env: NodeJS.ProcessEnv = process.env
): NginxParserOptions {
  const envOverrides: NginxParserOptionsInput = {};

  if (env.NGINX_PARSER_MAX_INCLUDE_DEPTH) {
    const value = parseInt(env.NGINX_PARSER_MAX_INCLUDE_DEPTH, 10);
    if (!isNaN(value)) {
      envOverrides.maxIncludeDepth = value;
    }
  }

  const flag = (value: string | undefined): boolean | undefined =>
    value === undefined || value === '' ? undefined : value.toLowerCase() === 'true';

  envOverrides.includeComments = flag(env.NGINX_PARSER_INCLUDE_COMMENTS);
  envOverrides.singleFile = flag(env.NGINX_PARSER_SINGLE_FILE);
  envOverrides.strict = flag(env.NGINX_PARSER_STRICT);
  envOverrides.technicalFormat = flag(env.NGINX_PARSER_TECHNICAL_FORMAT);
  envOverrides.followSymlinks = flag(env.NGINX_PARSER_FOLLOW_SYMLINKS);

  if (env.NGINX_PARSER_IGNORE_DIRECTIVES) {
    envOverrides.ignoreDirectives = env.NGINX_PARSER_IGNORE_DIRECTIVES
      .split(',')
      .map(name => name.trim())
      .filter(name => name.length > 0);
  }

  // Unset variables stay undefined and fall back to the schema defaults
  return createNginxParserConfig({ ...envOverrides, ...overrides });
}
