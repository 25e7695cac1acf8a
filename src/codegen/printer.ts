/**
 * TypeScript printer
 * Renders type expressions and declarations to source text. Cross-unit references are
 * registered with an ImportTracker as they are printed, so a unit's import list is
 * exactly what its text uses.
 */

import { CODEGEN, OUTPUT } from '../utils/constants';
import { ImportExtension } from '../utils/options';
import { escapeReservedWord, isValidIdentifier } from '../shared/namingUtils';
import { escapeBlockComment } from '../shared/textUtils';
import {
  Declaration,
  EnumDeclaration,
  InterfaceDeclaration,
  PropertyDeclaration,
  TypeExpr,
  UnionDeclaration,
  isAbsentable
} from './typeExpr';

const INDENT = CODEGEN.INDENT;

/**
 * Base name of the unit generated for `pkg` ("a.b" -> "a.b", "" -> "_")
 */
export function unitBaseName(pkg: string): string {
  return pkg || OUTPUT.EMPTY_PACKAGE_NAME;
}

export interface ImportEntry {
  alias: string;
  specifier: string;
}

export class ImportTracker {
  private readonly bySpecifier = new Map<string, string>();
  private readonly taken: Set<string>;

  /**
   * @param pkg package of the unit being printed; references into it need no import
   * @param reserved identifiers declared by the unit, which aliases must not shadow
   */
  constructor(
    readonly pkg: string,
    private readonly extension: ImportExtension,
    reserved: Iterable<string> = []
  ) {
    this.taken = new Set(reserved);
  }

  packageAlias(pkg: string): string {
    const base = pkg ? pkg.split('.').join('_') : OUTPUT.EMPTY_PACKAGE_NAME;
    return this.aliasFor(`./${unitBaseName(pkg)}${this.extension}`, escapeReservedWord(base));
  }

  moduleAlias(module: string): string {
    let base = module.replace(/[^A-Za-z0-9_$]/g, '_').replace(/^_+/, '');
    if (!isValidIdentifier(base)) {
      base = `_${base}`;
    }
    return this.aliasFor(module, escapeReservedWord(base));
  }

  /**
   * Copy whose registrations can be merged back or discarded
   */
  fork(): ImportTracker {
    const copy = new ImportTracker(this.pkg, this.extension, this.taken);
    for (const [specifier, alias] of this.bySpecifier) {
      copy.bySpecifier.set(specifier, alias);
    }
    return copy;
  }

  merge(other: ImportTracker): void {
    for (const [specifier, alias] of other.bySpecifier) {
      this.bySpecifier.set(specifier, alias);
      this.taken.add(alias);
    }
  }

  /**
   * Registered imports, sorted by alias
   */
  entries(): ImportEntry[] {
    return [...this.bySpecifier]
      .map(([specifier, alias]) => ({ alias, specifier }))
      .sort((a, b) => (a.alias < b.alias ? -1 : a.alias > b.alias ? 1 : 0));
  }

  render(typeOnly = true): string[] {
    const keyword = typeOnly ? 'import type' : 'import';
    return this.entries().map(({ alias, specifier }) => `${keyword} * as ${alias} from '${specifier}';`);
  }

  private aliasFor(specifier: string, base: string): string {
    const existing = this.bySpecifier.get(specifier);
    if (existing) {
      return existing;
    }
    let alias = base;
    for (let n = 2; this.taken.has(alias); n++) {
      alias = `${base}_${n}`;
    }
    this.taken.add(alias);
    this.bySpecifier.set(specifier, alias);
    return alias;
  }
}

function stripAbsent(type: TypeExpr): TypeExpr {
  let current = type;
  while (current.kind === 'optional' || current.kind === 'indirect') {
    current = current.kind === 'optional' ? current.inner : current.target;
  }
  return current;
}

export function renderType(type: TypeExpr, imports: ImportTracker): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'declared':
      return type.package === imports.pkg
        ? type.identifier
        : `${imports.packageAlias(type.package)}.${type.identifier}`;
    case 'external':
      return type.module ? `${imports.moduleAlias(type.module)}.${type.identifier}` : type.identifier;
    case 'object':
      if (type.members.length === 0) {
        return 'Record<string, never>';
      }
      return `{ ${type.members.map(member => `${propertyKey(member.name)}: ${renderType(member.type, imports)}`).join('; ')} }`;
    case 'indirect':
    case 'optional':
      return `${renderType(stripAbsent(type), imports)} | undefined`;
    case 'array': {
      const element = renderType(type.element, imports);
      return isAbsentable(type.element) ? `(${element})[]` : `${element}[]`;
    }
    case 'map': {
      const value = renderType(type.value, imports);
      return type.container === 'map'
        ? `Map<${renderType(type.key, imports)}, ${value}>`
        : `{ [key: string]: ${value} }`;
    }
    default: {
      const unreachable: never = type;
      throw new Error(`Unknown type expression: ${JSON.stringify(unreachable)}`);
    }
  }
}

function propertyKey(name: string): string {
  return isValidIdentifier(name) ? name : `'${name}'`;
}

/**
 * JSDoc block for `doc`; single lines stay on one line
 */
export function renderDoc(doc: readonly string[], indent = ''): string[] {
  if (doc.length === 0) {
    return [];
  }
  const [only] = doc;
  if (doc.length === 1 && only !== undefined) {
    return [`${indent}/** ${escapeBlockComment(only)} */`];
  }
  return [
    `${indent}/**`,
    ...doc.map(line => (line ? `${indent} * ${escapeBlockComment(line)}` : `${indent} *`)),
    `${indent} */`
  ];
}

function renderMember(property: PropertyDeclaration, imports: ImportTracker): string {
  const key = propertyKey(property.name);
  return isAbsentable(property.type)
    ? `${key}?: ${renderType(property.type, imports)}`
    : `${key}: ${renderType(property.type, imports)}`;
}

function renderInterface(decl: InterfaceDeclaration, imports: ImportTracker): string[] {
  const head = [...renderDoc(decl.doc), ...decl.attributes];
  if (decl.properties.length === 0) {
    return [...head, `export interface ${decl.identifier} {}`];
  }
  const body = decl.properties.flatMap(property => [
    ...renderDoc(property.doc, INDENT),
    ...property.attributes.map(attribute => `${INDENT}${attribute}`),
    `${INDENT}${renderMember(property, imports)};`
  ]);
  return [...head, `export interface ${decl.identifier} {`, ...body, '}'];
}

function numberKey(value: number): string {
  return value < 0 ? `'${value}'` : String(value);
}

function renderEnum(decl: EnumDeclaration): string[] {
  const id = decl.identifier;
  const lines = [...renderDoc(decl.doc), ...decl.attributes];
  lines.push(`export enum ${id} {`);
  for (const member of decl.members) {
    lines.push(...renderDoc(member.doc, INDENT), `${INDENT}${member.name} = ${member.number},`);
  }
  lines.push('}');

  const canonical = new Map<number, string>();
  for (const member of decl.members) {
    if (!canonical.has(member.number)) {
      canonical.set(member.number, member.protoName);
    }
  }

  lines.push('', `export const ${id}${CODEGEN.ENUM_NAME_TABLE_SUFFIX}: Readonly<Record<number, string>> = {`);
  for (const [number, name] of canonical) {
    lines.push(`${INDENT}${numberKey(number)}: '${name}',`);
  }
  lines.push('};');

  lines.push('', `export const ${id}${CODEGEN.ENUM_VALUE_TABLE_SUFFIX}: Readonly<Record<string, ${id}>> = {`);
  for (const member of decl.members) {
    lines.push(`${INDENT}${member.protoName}: ${id}.${member.name},`);
  }
  lines.push('};');
  return lines;
}

function renderUnion(decl: UnionDeclaration, imports: ImportTracker): string[] {
  const head = [...renderDoc(decl.doc), ...decl.attributes];
  if (decl.variants.length === 0) {
    return [...head, `export type ${decl.identifier} = never;`];
  }
  const lines = [...head, `export type ${decl.identifier} =`];
  decl.variants.forEach((variant, i) => {
    const terminator = i === decl.variants.length - 1 ? ';' : '';
    lines.push(
      ...renderDoc(variant.property.doc, INDENT),
      ...variant.property.attributes.map(attribute => `${INDENT}${attribute}`),
      `${INDENT}| { ${CODEGEN.ONEOF_DISCRIMINANT}: '${variant.caseName}'; ${renderMember(variant.property, imports)} }${terminator}`
    );
  });
  return lines;
}

export function renderDeclaration(decl: Declaration, imports: ImportTracker): string[] {
  switch (decl.kind) {
    case 'interface':
      return renderInterface(decl, imports);
    case 'enum':
      return renderEnum(decl);
    case 'union':
      return renderUnion(decl, imports);
  }
}

/**
 * Identifiers a declaration introduces into its unit
 */
export function declaredIdentifiers(decl: Declaration): string[] {
  if (decl.kind === 'enum') {
    return [
      decl.identifier,
      `${decl.identifier}${CODEGEN.ENUM_NAME_TABLE_SUFFIX}`,
      `${decl.identifier}${CODEGEN.ENUM_VALUE_TABLE_SUFFIX}`
    ];
  }
  return [decl.identifier];
}
