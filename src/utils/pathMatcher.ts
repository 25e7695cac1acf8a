/**
 * Path matchers for per-type and per-field options
 *
 * Keys:
 * - "."          matches every path
 * - ".pkg.Msg"   matches that fully-qualified name and everything declared below it
 * - "Msg.field"  matches any path ending with those segments
 */

import { ConfigurationError } from '../core/errors';

const SEGMENT = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Split and check a dotted path, throwing ConfigurationError for empty or illegal segments
 */
export function parsePathKey(option: string, key: string): string[] {
  if (key === '.') {
    return [];
  }
  const body = key.startsWith('.') ? key.slice(1) : key;
  const segments = body.split('.');
  if (body.length === 0 || segments.some(segment => !SEGMENT.test(segment))) {
    throw new ConfigurationError(option, `malformed path "${key}"`);
  }
  return segments;
}

export class PathMatcher<T> {
  private readonly entries = new Map<string, T[]>();

  constructor(private readonly option: string, entries: Iterable<readonly [string, T]> = []) {
    for (const [key, value] of entries) {
      this.insert(key, value);
    }
  }

  insert(key: string, value: T): void {
    parsePathKey(this.option, key);
    const values = this.entries.get(key);
    if (values) {
      values.push(value);
    } else {
      this.entries.set(key, [value]);
    }
  }

  /**
   * Every value whose key matches `fullName` (given without a leading dot): the exact
   * name first, then enclosing prefixes from longest to shortest, then suffixes from
   * longest to shortest, then the catch-all.
   */
  matches(fullName: string): T[] {
    if (this.entries.size === 0) {
      return [];
    }
    const results: T[] = [];
    for (const key of candidateKeys(fullName)) {
      const values = this.entries.get(key);
      if (values) {
        results.push(...values);
      }
    }
    return results;
  }

  first(fullName: string): T | undefined {
    return this.matches(fullName)[0];
  }

  has(fullName: string): boolean {
    return this.matches(fullName).length > 0;
  }

  get size(): number {
    return this.entries.size;
  }
}

function candidateKeys(fullName: string): string[] {
  const segments = fullName.split('.');
  const keys: string[] = [`.${fullName}`];
  for (let i = segments.length - 1; i > 0; i--) {
    keys.push(`.${segments.slice(0, i).join('.')}`);
  }
  for (let i = 0; i < segments.length; i++) {
    keys.push(segments.slice(i).join('.'));
  }
  keys.push('.');
  return keys;
}

export interface ExternPathRule {
  /** Absolute package or type path, e.g. ".acme.money" or ".acme.money.Amount" */
  protoPath: string;
  /** Module the external declarations are imported from; global types omit it */
  module?: string;
  /** External name for the matched path; remaining nested segments are appended with "_" */
  typeName?: string;
}

export interface ExternMatch {
  rule: ExternPathRule;
  /** Segments of the type name below the matched rule */
  remainder: string[];
}

/**
 * Extern-path rules with longest-prefix matching over name segments
 */
export class ExternPathMap {
  private readonly rules = new Map<string, ExternPathRule>();

  constructor(rules: readonly ExternPathRule[] = []) {
    for (const rule of rules) {
      this.add(rule);
    }
  }

  lookup(fullName: string): ExternMatch | undefined {
    if (this.rules.size === 0) {
      return undefined;
    }
    const segments = fullName.split('.');
    for (let i = segments.length; i > 0; i--) {
      const rule = this.rules.get(segments.slice(0, i).join('.'));
      if (rule) {
        return { rule, remainder: segments.slice(i) };
      }
    }
    return undefined;
  }

  get size(): number {
    return this.rules.size;
  }

  private add(rule: ExternPathRule): void {
    if (!rule.protoPath.startsWith('.') || rule.protoPath === '.') {
      throw new ConfigurationError(
        'externPaths',
        `"${rule.protoPath}" must be an absolute package or type path such as ".acme.money"`
      );
    }
    const key = parsePathKey('externPaths', rule.protoPath).join('.');

    if (!rule.module && !rule.typeName) {
      throw new ConfigurationError('externPaths', `"${rule.protoPath}" names neither a module nor a type`);
    }
    if (rule.typeName !== undefined && !SEGMENT.test(rule.typeName)) {
      throw new ConfigurationError('externPaths', `"${rule.typeName}" is not a valid type name`);
    }

    const existing = this.rules.get(key);
    if (existing && (existing.module !== rule.module || existing.typeName !== rule.typeName)) {
      throw new ConfigurationError('externPaths', `conflicting rules for "${rule.protoPath}"`);
    }
    this.rules.set(key, rule);
  }
}
