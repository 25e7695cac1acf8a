/**
 * Indexed schema model
 * Declarations are handles into the index; references between them are resolved
 * separately so the graph never relies on object aliasing for cycles.
 */

export type ScalarKind =
  | 'double'
  | 'float'
  | 'int32'
  | 'int64'
  | 'uint32'
  | 'uint64'
  | 'sint32'
  | 'sint64'
  | 'fixed32'
  | 'fixed64'
  | 'sfixed32'
  | 'sfixed64'
  | 'bool'
  | 'string'
  | 'bytes';

// Built-in protobuf types
export const SCALAR_KINDS: readonly ScalarKind[] = [
  'double',
  'float',
  'int32',
  'int64',
  'uint32',
  'uint64',
  'sint32',
  'sint64',
  'fixed32',
  'fixed64',
  'sfixed32',
  'sfixed64',
  'bool',
  'string',
  'bytes'
];

export const MAP_KEY_KINDS: readonly ScalarKind[] = [
  'int32',
  'int64',
  'uint32',
  'uint64',
  'sint32',
  'sint64',
  'fixed32',
  'fixed64',
  'sfixed32',
  'sfixed64',
  'bool',
  'string'
];

export const LONG_KINDS: readonly ScalarKind[] = ['int64', 'uint64', 'sint64', 'fixed64', 'sfixed64'];

export function isScalarKind(value: string): value is ScalarKind {
  return (SCALAR_KINDS as readonly string[]).includes(value);
}

export type Syntax = 'proto2' | 'proto3';

export interface Comments {
  leading?: string;
  trailing?: string;
}

export interface FileEntry {
  name: string;
  package: string;
  syntax: Syntax;
  dependencies: string[];
  publicDependencies: string[];
  messages: MessageDecl[];
  enums: EnumDecl[];
  services: ServiceDecl[];
  /** Position of the file in the descriptor set */
  order: number;
}

export type FieldCardinality = 'singular' | 'repeated' | 'map';

export type FieldShape =
  | { kind: 'scalar'; scalar: ScalarKind }
  | { kind: 'reference'; typeName: string; declaredKind?: 'message' | 'enum' };

export interface FieldDecl {
  name: string;
  fullName: string;
  number: number;
  jsonName: string;
  message: MessageDecl;
  cardinality: FieldCardinality;
  shape: FieldShape;
  explicitPresence: boolean;
  oneof?: OneofDecl;
  /** Map-entry message backing a map field */
  mapEntry?: MessageDecl;
  /** Set by the cycle breaker; read-only once the index is frozen */
  needsIndirection: boolean;
  deprecated: boolean;
  comments: Comments;
}

export interface OneofDecl {
  name: string;
  fullName: string;
  message: MessageDecl;
  fields: FieldDecl[];
  /** Wrapper generated for a proto3 `optional` field */
  synthetic: boolean;
  comments: Comments;
}

export interface MessageDecl {
  kind: 'message';
  name: string;
  fullName: string;
  file: FileEntry;
  parent?: MessageDecl;
  fields: FieldDecl[];
  oneofs: OneofDecl[];
  nestedMessages: MessageDecl[];
  nestedEnums: EnumDecl[];
  isMapEntry: boolean;
  deprecated: boolean;
  comments: Comments;
}

export interface EnumValueDecl {
  name: string;
  number: number;
  deprecated: boolean;
  comments: Comments;
}

export interface EnumDecl {
  kind: 'enum';
  name: string;
  fullName: string;
  file: FileEntry;
  parent?: MessageDecl;
  values: EnumValueDecl[];
  deprecated: boolean;
  comments: Comments;
}

export type TypeDecl = MessageDecl | EnumDecl;

export interface MethodDecl {
  name: string;
  fullName: string;
  service: ServiceDecl;
  inputType: string;
  outputType: string;
  clientStreaming: boolean;
  serverStreaming: boolean;
  deprecated: boolean;
  comments: Comments;
}

export interface ServiceDecl {
  kind: 'service';
  name: string;
  fullName: string;
  file: FileEntry;
  methods: MethodDecl[];
  deprecated: boolean;
  comments: Comments;
}

export type ResolvedType =
  | { kind: 'scalar'; scalar: ScalarKind }
  | { kind: 'enum'; decl: EnumDecl }
  | { kind: 'message'; decl: MessageDecl }
  | { kind: 'map'; key: ScalarKind; value: ResolvedType };

/**
 * Enclosing scope of a dotted name ("a.b.C" -> "a.b")
 */
export function parentScope(fullName: string): string {
  const index = fullName.lastIndexOf('.');
  return index === -1 ? '' : fullName.slice(0, index);
}

export function qualify(scope: string, name: string): string {
  return scope ? `${scope}.${name}` : name;
}
