/**
 * Code generation options
 * Typed settings with defaults, validated once into an immutable ResolvedOptions value
 * that every pipeline stage receives explicitly.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors';
import { SCALAR_KINDS, ScalarKind } from '../core/schema';
import { ExternPathMap, ExternPathRule, PathMatcher } from './pathMatcher';
import { LogLevelName } from './logger';
import { OUTPUT } from './constants';
import { getErrorMessage } from './utils';

export type BytesRepresentation = 'uint8array' | 'buffer';
export type LongRepresentation = 'bigint' | 'string' | 'number';
export type ImportExtension = '' | '.js';

export type TypeSelector = 'message' | 'enum' | 'oneof';
export type FieldSelector = ScalarKind | 'message' | 'enum' | 'map' | 'oneof';

export interface AttributeRule<S extends string> {
  path: string;
  /** Line emitted verbatim above the matching declaration or property */
  attribute: string;
  /** Restrict the rule to these kinds; all kinds when omitted */
  selectors?: S[];
}

export interface CodegenOptions {
  externPaths?: ExternPathRule[];
  compileWellKnownTypes?: boolean;
  boxed?: string[];
  bytes?: BytesRepresentation;
  longType?: LongRepresentation;
  nativeMaps?: string[];
  typeAttributes?: AttributeRule<TypeSelector>[];
  fieldAttributes?: AttributeRule<FieldSelector>[];
  disableComments?: string[];
  stripEnumPrefix?: boolean;
  importExtension?: ImportExtension;
  includeFile?: string;
  logLevel?: LogLevelName;
}

export const defaultOptions = {
  externPaths: [],
  compileWellKnownTypes: false,
  boxed: [],
  bytes: 'uint8array',
  longType: 'bigint',
  nativeMaps: [],
  typeAttributes: [],
  fieldAttributes: [],
  disableComments: [],
  stripEnumPrefix: true,
  importExtension: ''
} satisfies CodegenOptions;

export interface ResolvedOptions {
  readonly externPaths: ExternPathMap;
  readonly compileWellKnownTypes: boolean;
  readonly boxed: PathMatcher<true>;
  readonly bytes: BytesRepresentation;
  readonly longType: LongRepresentation;
  readonly nativeMaps: PathMatcher<true>;
  readonly typeAttributes: PathMatcher<AttributeRule<TypeSelector>>;
  readonly fieldAttributes: PathMatcher<AttributeRule<FieldSelector>>;
  readonly disableComments: PathMatcher<true>;
  readonly stripEnumPrefix: boolean;
  readonly importExtension: ImportExtension;
  readonly includeFile?: string;
  readonly logLevel?: LogLevelName;
}

const BYTES_REPRESENTATIONS: readonly BytesRepresentation[] = ['uint8array', 'buffer'];
const LONG_REPRESENTATIONS: readonly LongRepresentation[] = ['bigint', 'string', 'number'];
const IMPORT_EXTENSIONS: readonly ImportExtension[] = ['', '.js'];
const TYPE_SELECTORS: readonly TypeSelector[] = ['message', 'enum', 'oneof'];
const FIELD_SELECTORS: readonly FieldSelector[] = [...SCALAR_KINDS, 'message', 'enum', 'map', 'oneof'];

function checkChoice<T extends string>(option: string, value: T, choices: readonly T[]): T {
  if (!choices.includes(value)) {
    throw new ConfigurationError(option, `"${value}" is not one of ${choices.map(c => `"${c}"`).join(', ')}`);
  }
  return value;
}

function matcherOf(option: string, paths: readonly string[]): PathMatcher<true> {
  return new PathMatcher<true>(option, paths.map(path => [path, true] as const));
}

function attributeMatcher<S extends string>(
  option: string,
  rules: readonly AttributeRule<S>[],
  selectors: readonly S[]
): PathMatcher<AttributeRule<S>> {
  for (const rule of rules) {
    for (const selector of rule.selectors ?? []) {
      checkChoice(option, selector, selectors);
    }
  }
  return new PathMatcher<AttributeRule<S>>(option, rules.map(rule => [rule.path, rule] as const));
}

/**
 * Validate options and build their matchers. Throws ConfigurationError before any
 * descriptor is looked at.
 */
export function resolveOptions(options: CodegenOptions = {}): ResolvedOptions {
  const includeFile = options.includeFile;
  if (includeFile !== undefined && !/^[A-Za-z0-9_.-]+\.ts$/.test(includeFile)) {
    throw new ConfigurationError('includeFile', `"${includeFile}" must be a plain file name ending in ${OUTPUT.EXTENSION}`);
  }

  const resolved: ResolvedOptions = {
    externPaths: new ExternPathMap(options.externPaths ?? defaultOptions.externPaths),
    compileWellKnownTypes: options.compileWellKnownTypes ?? defaultOptions.compileWellKnownTypes,
    boxed: matcherOf('boxed', options.boxed ?? defaultOptions.boxed),
    bytes: checkChoice('bytes', options.bytes ?? defaultOptions.bytes, BYTES_REPRESENTATIONS),
    longType: checkChoice('longType', options.longType ?? defaultOptions.longType, LONG_REPRESENTATIONS),
    nativeMaps: matcherOf('nativeMaps', options.nativeMaps ?? defaultOptions.nativeMaps),
    typeAttributes: attributeMatcher('typeAttributes', options.typeAttributes ?? defaultOptions.typeAttributes, TYPE_SELECTORS),
    fieldAttributes: attributeMatcher('fieldAttributes', options.fieldAttributes ?? defaultOptions.fieldAttributes, FIELD_SELECTORS),
    disableComments: matcherOf('disableComments', options.disableComments ?? defaultOptions.disableComments),
    stripEnumPrefix: options.stripEnumPrefix ?? defaultOptions.stripEnumPrefix,
    importExtension: checkChoice('importExtension', options.importExtension ?? defaultOptions.importExtension, IMPORT_EXTENSIONS),
    includeFile,
    logLevel: options.logLevel
  };

  return Object.freeze(resolved);
}

const pathList = z.array(z.string());

const optionsFileSchema = z.object({
  externPaths: z.array(z.object({
    protoPath: z.string(),
    module: z.string().optional(),
    typeName: z.string().optional()
  }).strict()).optional(),
  compileWellKnownTypes: z.boolean().optional(),
  boxed: pathList.optional(),
  bytes: z.enum(['uint8array', 'buffer']).optional(),
  longType: z.enum(['bigint', 'string', 'number']).optional(),
  nativeMaps: pathList.optional(),
  typeAttributes: z.array(z.object({
    path: z.string(),
    attribute: z.string(),
    selectors: z.array(z.enum(['message', 'enum', 'oneof'])).optional()
  }).strict()).optional(),
  fieldAttributes: z.array(z.object({
    path: z.string(),
    attribute: z.string(),
    selectors: z.array(z.enum([
      'double', 'float', 'int32', 'int64', 'uint32', 'uint64', 'sint32', 'sint64',
      'fixed32', 'fixed64', 'sfixed32', 'sfixed64', 'bool', 'string', 'bytes',
      'message', 'enum', 'map', 'oneof'
    ])).optional()
  }).strict()).optional(),
  disableComments: pathList.optional(),
  stripEnumPrefix: z.boolean().optional(),
  importExtension: z.enum(['', '.js']).optional(),
  includeFile: z.string().optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug', 'verbose']).optional()
}).strict();

/**
 * Parse options from an already-decoded JSON value
 */
export function parseOptions(value: unknown): CodegenOptions {
  const result = optionsFileSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const option = issue && issue.path.length > 0 ? issue.path.join('.') : 'options';
    throw new ConfigurationError(option, issue?.message ?? 'invalid options');
  }
  return result.data;
}

/**
 * Read a JSON options file
 */
export function loadOptionsFile(filePath: string): CodegenOptions {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError('file', `cannot read ${filePath}: ${getErrorMessage(error)}`);
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError('file', `${filePath} is not valid JSON: ${getErrorMessage(error)}`);
  }
  return parseOptions(value);
}
