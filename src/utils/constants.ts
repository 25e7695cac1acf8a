/**
 * Constants for the descriptor compiler
 * Centralized location for generated-code conventions
 */

/**
 * Output unit naming
 */
export const OUTPUT = {
  /** File extension of every generated unit */
  EXTENSION: '.ts',
  /** Base name of the unit holding declarations without a package */
  EMPTY_PACKAGE_NAME: '_',
  /** Banner written at the top of every unit */
  BANNER: '// Code generated by proto-typegen. DO NOT EDIT.'
} as const;

/**
 * Generated TypeScript conventions
 */
export const CODEGEN = {
  /** Discriminant property of oneof unions */
  ONEOF_DISCRIMINANT: '$case',
  /** Suffix of the number-to-canonical-name table emitted beside each enum */
  ENUM_NAME_TABLE_SUFFIX: '_name',
  /** Suffix of the name-to-number table emitted beside each enum */
  ENUM_VALUE_TABLE_SUFFIX: '_value',
  /** Indentation unit */
  INDENT: '  '
} as const;

/**
 * Package of the well-known types
 */
export const WELL_KNOWN_PACKAGE = 'google.protobuf';
