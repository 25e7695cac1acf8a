/**
 * Type expressions and declarations
 * The Type Mapper produces these; the printer is the only place that turns them into text.
 */

export type PrimitiveName =
  | 'number'
  | 'bigint'
  | 'string'
  | 'boolean'
  | 'Uint8Array'
  | 'Buffer'
  | 'Date'
  | 'unknown'
  | 'null';

export interface ObjectMember {
  name: string;
  type: TypeExpr;
}

export type TypeExpr =
  | { kind: 'primitive'; name: PrimitiveName }
  /** A declaration generated into the unit of `package` */
  | { kind: 'declared'; fullName: string; package: string; identifier: string }
  /** A type owned elsewhere; global when `module` is absent */
  | { kind: 'external'; module?: string; identifier: string }
  /** Inline object type; no members renders as an empty record */
  | { kind: 'object'; members: ObjectMember[] }
  /** Reference to a value stored out of line (breaks a containment cycle) */
  | { kind: 'indirect'; target: TypeExpr }
  | { kind: 'optional'; inner: TypeExpr }
  | { kind: 'array'; element: TypeExpr }
  | { kind: 'map'; container: 'record' | 'map'; key: TypeExpr; value: TypeExpr };

export const primitive = (name: PrimitiveName): TypeExpr => ({ kind: 'primitive', name });

export const optional = (inner: TypeExpr): TypeExpr => ({ kind: 'optional', inner });

/**
 * Whether a property of this type is rendered with `?`
 */
export function isAbsentable(type: TypeExpr): boolean {
  return type.kind === 'optional' || type.kind === 'indirect';
}

export interface PropertyDeclaration {
  /** Property name in the generated interface */
  name: string;
  /** Name of the schema field or oneof */
  protoName: string;
  fullName: string;
  type: TypeExpr;
  doc: string[];
  attributes: string[];
}

export interface InterfaceDeclaration {
  kind: 'interface';
  identifier: string;
  fullName: string;
  doc: string[];
  attributes: string[];
  properties: PropertyDeclaration[];
}

export interface EnumMember {
  name: string;
  protoName: string;
  number: number;
  doc: string[];
}

export interface EnumDeclaration {
  kind: 'enum';
  identifier: string;
  fullName: string;
  doc: string[];
  attributes: string[];
  members: EnumMember[];
}

export interface UnionVariant {
  /** Discriminant value: the schema field name */
  caseName: string;
  property: PropertyDeclaration;
}

export interface UnionDeclaration {
  kind: 'union';
  identifier: string;
  fullName: string;
  doc: string[];
  attributes: string[];
  variants: UnionVariant[];
}

export type Declaration = InterfaceDeclaration | EnumDeclaration | UnionDeclaration;
