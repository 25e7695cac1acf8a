/**
 * Type Mapper
 * Pure mapping from resolved schema entities to TypeScript type expressions and
 * declarations. Reads the frozen index only.
 *
 * Precedence for a referenced type: extern paths, then well-known types, then the
 * generated declaration.
 */

import {
  Comments,
  EnumDecl,
  FieldDecl,
  MessageDecl,
  OneofDecl,
  ResolvedType,
  ScalarKind,
  TypeDecl,
  qualify
} from '../core/schema';
import { ResolvedSchema } from '../core/resolver';
import { DuplicateNameError, UnresolvedReferenceError } from '../core/errors';
import { FieldSelector, ResolvedOptions, TypeSelector } from '../utils/options';
import {
  escapeDeclarationName,
  hoistedIdentifier,
  isValidIdentifier,
  toLowerCamelCase,
  toPascalCase,
  toScreamingSnakeCase
} from '../shared/namingUtils';
import { commentBodyLines } from '../shared/textUtils';
import { logger } from '../utils/logger';
import { scalarDefault, scalarType } from './scalars';
import { wellKnownType } from './wellKnownTypes';
import {
  Declaration,
  EnumDeclaration,
  InterfaceDeclaration,
  PropertyDeclaration,
  TypeExpr,
  UnionDeclaration,
  optional,
  primitive
} from './typeExpr';

interface DocExtras {
  deprecated?: boolean;
  defaultValue?: string;
}

export class TypeMapper {
  constructor(
    private readonly schema: ResolvedSchema,
    private readonly options: ResolvedOptions
  ) {
    if (!schema.index.isFrozen()) {
      throw new Error('Type mapping requires a frozen descriptor index; run the cycle breaker first');
    }
  }

  /**
   * Identifier of a generated declaration inside its package unit ("Outer.Inner" -> "Outer_Inner")
   */
  identifierOf(decl: TypeDecl): string {
    const pkg = decl.file.package;
    const local = pkg ? decl.fullName.slice(pkg.length + 1) : decl.fullName;
    return escapeDeclarationName(hoistedIdentifier(local));
  }

  oneofIdentifier(oneof: OneofDecl): string {
    return `${this.identifierOf(oneof.message)}_${toPascalCase(oneof.name)}`;
  }

  /**
   * Whether `decl` gets a declaration of its own (extern, mapped well-known and
   * map-entry types do not)
   */
  isGenerated(decl: TypeDecl): boolean {
    if (decl.kind === 'message' && decl.isMapEntry) {
      return false;
    }
    return !this.options.externPaths.lookup(decl.fullName) && !wellKnownType(decl.fullName, this.options);
  }

  typeOf(decl: TypeDecl): TypeExpr {
    const extern = this.options.externPaths.lookup(decl.fullName);
    if (extern) {
      const { rule, remainder } = extern;
      const segments = rule.typeName ? [rule.typeName, ...remainder] : remainder;
      return {
        kind: 'external',
        module: rule.module,
        identifier: segments.length > 0 ? segments.join('_') : decl.name
      };
    }

    const wellKnown = wellKnownType(decl.fullName, this.options);
    if (wellKnown) {
      return wellKnown;
    }

    return {
      kind: 'declared',
      fullName: decl.fullName,
      package: decl.file.package,
      identifier: this.identifierOf(decl)
    };
  }

  /**
   * Type of a message property for `field`, presence and indirection included
   */
  mapField(field: FieldDecl): TypeExpr {
    const resolved = this.resolvedType(field);
    if (resolved.kind === 'map') {
      return this.mapType(field, resolved.key, resolved.value);
    }

    if (field.cardinality === 'repeated') {
      return { kind: 'array', element: this.elementType(resolved) };
    }
    const element = this.valueType(resolved);
    if (field.needsIndirection) {
      return { kind: 'indirect', target: element };
    }
    if (resolved.kind === 'message' || !field.explicitPresence) {
      return element;
    }
    return optional(element);
  }

  /**
   * Payload type of a oneof member; the union itself carries presence
   */
  mapVariant(field: FieldDecl): TypeExpr {
    const element = this.elementType(this.resolvedType(field));
    return field.needsIndirection ? { kind: 'indirect', target: element } : element;
  }

  mapMethodType(message: MessageDecl): TypeExpr {
    return this.typeOf(message);
  }

  /**
   * Interface for `message` followed by the union aliases of its oneofs
   */
  mapMessage(message: MessageDecl): Declaration[] {
    const properties: PropertyDeclaration[] = [];
    const unions: UnionDeclaration[] = [];
    const emitted = new Set<OneofDecl>();

    for (const field of message.fields) {
      const oneof = field.oneof;
      if (oneof && !oneof.synthetic) {
        if (!emitted.has(oneof)) {
          emitted.add(oneof);
          properties.push(this.oneofProperty(oneof));
          unions.push(this.mapOneof(oneof));
        }
        continue;
      }
      properties.push(this.fieldProperty(field));
    }

    checkPropertyNames(message, properties);

    const declaration: InterfaceDeclaration = {
      kind: 'interface',
      identifier: this.identifierOf(message),
      fullName: message.fullName,
      doc: this.doc(message.fullName, message.comments, { deprecated: message.deprecated }),
      attributes: this.typeAttributes(message.fullName, 'message'),
      properties
    };
    return [declaration, ...unions];
  }

  mapOneof(oneof: OneofDecl): UnionDeclaration {
    return {
      kind: 'union',
      identifier: this.oneofIdentifier(oneof),
      fullName: oneof.fullName,
      doc: this.doc(oneof.fullName, oneof.comments),
      attributes: this.typeAttributes(oneof.fullName, 'oneof'),
      variants: oneof.fields.map(field => ({
        caseName: field.name,
        property: {
          name: toLowerCamelCase(field.name),
          protoName: field.name,
          fullName: field.fullName,
          type: this.mapVariant(field),
          doc: this.doc(field.fullName, field.comments, { deprecated: field.deprecated }),
          attributes: this.fieldAttributes(field.fullName, this.fieldSelector(field))
        }
      }))
    };
  }

  mapEnum(decl: EnumDecl): EnumDeclaration {
    const names = this.enumMemberNames(decl);
    return {
      kind: 'enum',
      identifier: this.identifierOf(decl),
      fullName: decl.fullName,
      doc: this.doc(decl.fullName, decl.comments, { deprecated: decl.deprecated }),
      attributes: this.typeAttributes(decl.fullName, 'enum'),
      members: decl.values.map((value, i) => ({
        name: names[i] ?? value.name,
        protoName: value.name,
        number: value.number,
        doc: this.doc(`${decl.fullName}.${value.name}`, value.comments, { deprecated: value.deprecated })
      }))
    };
  }

  /**
   * Member names with the "ENUM_NAME_" prefix removed, unless disabled or unless
   * stripping would leave an invalid or repeated identifier
   */
  enumMemberNames(decl: EnumDecl): string[] {
    const original = decl.values.map(value => value.name);
    if (!this.options.stripEnumPrefix) {
      return original;
    }
    const prefix = `${toScreamingSnakeCase(decl.name)}_`;
    const stripped = original.map(name => (name.startsWith(prefix) ? name.slice(prefix.length) : name));
    const valid = stripped.every(isValidIdentifier) && new Set(stripped).size === new Set(original).size;
    return valid ? stripped : original;
  }

  private fieldProperty(field: FieldDecl): PropertyDeclaration {
    return {
      name: toLowerCamelCase(field.name),
      protoName: field.name,
      fullName: field.fullName,
      type: this.mapField(field),
      doc: this.doc(field.fullName, field.comments, {
        deprecated: field.deprecated,
        defaultValue: this.defaultValue(field)
      }),
      attributes: this.fieldAttributes(field.fullName, this.fieldSelector(field))
    };
  }

  private oneofProperty(oneof: OneofDecl): PropertyDeclaration {
    return {
      name: toLowerCamelCase(oneof.name),
      protoName: oneof.name,
      fullName: oneof.fullName,
      type: optional({
        kind: 'declared',
        fullName: oneof.fullName,
        package: oneof.message.file.package,
        identifier: this.oneofIdentifier(oneof)
      }),
      doc: this.doc(oneof.fullName, oneof.comments),
      attributes: this.fieldAttributes(oneof.fullName, 'oneof')
    };
  }

  private resolvedType(field: FieldDecl): ResolvedType {
    const resolved = this.schema.fieldTypes.get(field);
    if (!resolved) {
      throw new UnresolvedReferenceError(
        field.shape.kind === 'reference' ? field.shape.typeName : field.shape.scalar,
        field.fullName,
        field.message.file.name,
        'field was not resolved'
      );
    }
    return resolved;
  }

  private valueType(resolved: ResolvedType): TypeExpr {
    switch (resolved.kind) {
      case 'scalar':
        return scalarType(resolved.scalar, this.options);
      case 'enum':
      case 'message':
        return this.typeOf(resolved.decl);
      case 'map':
        return {
          kind: 'map',
          container: 'record',
          key: primitive('string'),
          value: this.elementType(resolved.value)
        };
    }
  }

  /**
   * Type of a value that is always present: a repeated element, a map value or a
   * selected oneof member. Wrapper types lose their optionality here.
   */
  private elementType(resolved: ResolvedType): TypeExpr {
    const type = this.valueType(resolved);
    return type.kind === 'optional' ? type.inner : type;
  }

  private mapType(field: FieldDecl, key: ScalarKind, value: ResolvedType): TypeExpr {
    const container = this.options.nativeMaps.has(field.fullName) ? 'map' : 'record';
    return {
      kind: 'map',
      container,
      key: container === 'map' ? scalarType(key, this.options) : primitive('string'),
      value: this.elementType(value)
    };
  }

  private defaultValue(field: FieldDecl): string | undefined {
    if (field.cardinality !== 'singular' || field.explicitPresence || field.needsIndirection) {
      return undefined;
    }
    const resolved = this.resolvedType(field);
    if (resolved.kind === 'scalar') {
      return scalarDefault(resolved.scalar, this.options);
    }
    if (resolved.kind === 'enum') {
      return this.enumDefault(resolved.decl);
    }
    return undefined;
  }

  private enumDefault(decl: EnumDecl): string | undefined {
    const first = decl.values[0];
    if (!first) {
      return undefined;
    }
    const type = this.typeOf(decl);
    if (type.kind === 'declared') {
      return `${type.identifier}.${this.enumMemberNames(decl)[0] ?? first.name}`;
    }
    if (type.kind === 'primitive' && type.name === 'null') {
      return 'null';
    }
    return String(first.number);
  }

  private fieldSelector(field: FieldDecl): FieldSelector {
    const resolved = this.resolvedType(field);
    return resolved.kind === 'scalar' ? resolved.scalar : resolved.kind;
  }

  private typeAttributes(fullName: string, selector: TypeSelector): string[] {
    return this.options.typeAttributes
      .matches(fullName)
      .filter(rule => !rule.selectors || rule.selectors.includes(selector))
      .map(rule => rule.attribute);
  }

  private fieldAttributes(fullName: string, selector: FieldSelector): string[] {
    return this.options.fieldAttributes
      .matches(fullName)
      .filter(rule => !rule.selectors || rule.selectors.includes(selector))
      .map(rule => rule.attribute);
  }

  private doc(fullName: string, comments: Comments, extras: DocExtras = {}): string[] {
    const lines: string[] = [];
    if (!this.options.disableComments.has(fullName)) {
      const leading = commentBodyLines(comments.leading);
      const trailing = commentBodyLines(comments.trailing);
      lines.push(...leading);
      if (leading.length > 0 && trailing.length > 0) {
        lines.push('');
      }
      lines.push(...trailing);
    }

    const tags: string[] = [];
    if (extras.defaultValue !== undefined) {
      tags.push(`@default ${extras.defaultValue}`);
    }
    if (extras.deprecated) {
      tags.push('@deprecated');
    }
    if (lines.length > 0 && tags.length > 0) {
      lines.push('');
    }
    return [...lines, ...tags];
  }
}

/**
 * Reject two fields (or a field and a oneof) that camel-case to the same property
 */
function checkPropertyNames(message: MessageDecl, properties: readonly PropertyDeclaration[]): void {
  const owners = new Map<string, string>();
  for (const property of properties) {
    const owner = owners.get(property.name);
    if (owner) {
      logger.debug(`${property.fullName} and ${owner} both generate property ${property.name}`);
      throw new DuplicateNameError(qualify(message.fullName, property.name), message.file.name);
    }
    owners.set(property.name, property.fullName);
  }
}
