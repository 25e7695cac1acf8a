/**
 * Shared naming utilities
 * Convert schema names into TypeScript identifiers
 *
 * Schema style conventions:
 * - Messages/Enums: PascalCase (e.g., MyMessage, StatusCode)
 * - Fields: snake_case (e.g., user_name, created_at)
 * - Enum values: SCREAMING_SNAKE_CASE (e.g., STATUS_OK, UNKNOWN_VALUE)
 */

const RESERVED_WORDS = new Set([
  'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default', 'delete',
  'do', 'else', 'enum', 'export', 'extends', 'false', 'finally', 'for', 'function', 'if',
  'import', 'in', 'instanceof', 'new', 'null', 'return', 'super', 'switch', 'this', 'throw',
  'true', 'try', 'typeof', 'var', 'void', 'while', 'with', 'implements', 'interface', 'let',
  'package', 'private', 'protected', 'public', 'static', 'yield', 'await', 'any', 'boolean',
  'number', 'string', 'symbol', 'never', 'unknown', 'object', 'bigint', 'undefined', 'type'
]);

/**
 * Check if a name can be used as a TypeScript identifier
 */
export function isValidIdentifier(name: string): boolean {
  return /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(name);
}

/**
 * Convert a name to PascalCase
 */
export function toPascalCase(name: string): string {
  // Handle snake_case
  if (name.includes('_')) {
    return name
      .split('_')
      .filter(part => part.length > 0)
      .map(part => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
      .join('');
  }
  // Handle camelCase or already PascalCase
  return name.charAt(0).toUpperCase() + name.slice(1);
}

/**
 * Convert a field name to lowerCamelCase ("user_name" -> "userName", "field_2" -> "field2")
 */
export function toLowerCamelCase(name: string): string {
  let result = '';
  let upperNext = false;
  for (const char of name) {
    if (char === '_') {
      upperNext = true;
      continue;
    }
    result += upperNext ? char.toUpperCase() : char;
    upperNext = false;
  }
  return result.charAt(0).toLowerCase() + result.slice(1);
}

/**
 * Convert a name to snake_case, keeping acronyms together ("HTTPMethod" -> "http_method")
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

/**
 * Convert a name to SCREAMING_SNAKE_CASE
 */
export function toScreamingSnakeCase(name: string): string {
  return toSnakeCase(name).toUpperCase();
}

/**
 * Suffix names that would collide with reserved words when used as bindings
 */
export function escapeReservedWord(name: string): string {
  return RESERVED_WORDS.has(name) ? `${name}_` : name;
}

/**
 * Global types that generated declarations refer to
 */
const GENERATED_GLOBALS = new Set(['Date', 'Record', 'Readonly', 'Map', 'Uint8Array', 'Buffer']);

/**
 * Escape a declaration name that is a reserved word or would shadow a global the
 * generated code relies on
 */
export function escapeDeclarationName(name: string): string {
  return RESERVED_WORDS.has(name) || GENERATED_GLOBALS.has(name) ? `${name}_` : name;
}

/**
 * Hoisted identifier for a declaration nested inside messages ("Outer.Inner" -> "Outer_Inner")
 */
export function hoistedIdentifier(localPath: string): string {
  return localPath.split('.').join('_');
}
