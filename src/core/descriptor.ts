/**
 * Descriptor set shapes
 * camelCase mirrors of the descriptor protocol messages emitted by the schema compiler.
 * Only the parts the generator reads are modelled.
 */

export type FieldDescriptorType =
  | 'TYPE_DOUBLE'
  | 'TYPE_FLOAT'
  | 'TYPE_INT64'
  | 'TYPE_UINT64'
  | 'TYPE_INT32'
  | 'TYPE_FIXED64'
  | 'TYPE_FIXED32'
  | 'TYPE_BOOL'
  | 'TYPE_STRING'
  | 'TYPE_GROUP'
  | 'TYPE_MESSAGE'
  | 'TYPE_BYTES'
  | 'TYPE_UINT32'
  | 'TYPE_ENUM'
  | 'TYPE_SFIXED32'
  | 'TYPE_SFIXED64'
  | 'TYPE_SINT32'
  | 'TYPE_SINT64';

export type FieldDescriptorLabel = 'LABEL_OPTIONAL' | 'LABEL_REQUIRED' | 'LABEL_REPEATED';

export interface FieldOptions {
  deprecated?: boolean;
  packed?: boolean;
}

export interface FieldDescriptorProto {
  name: string;
  number?: number;
  label?: FieldDescriptorLabel;
  /** Absent for references the schema compiler left unresolved */
  type?: FieldDescriptorType;
  /** Absolute (".pkg.Msg") or relative ("Msg", "Outer.Inner") reference */
  typeName?: string;
  oneofIndex?: number;
  jsonName?: string;
  proto3Optional?: boolean;
  options?: FieldOptions;
}

export interface OneofDescriptorProto {
  name: string;
}

export interface MessageOptions {
  mapEntry?: boolean;
  deprecated?: boolean;
}

export interface DescriptorProto {
  name: string;
  field?: FieldDescriptorProto[];
  nestedType?: DescriptorProto[];
  enumType?: EnumDescriptorProto[];
  oneofDecl?: OneofDescriptorProto[];
  options?: MessageOptions;
}

export interface EnumValueDescriptorProto {
  name: string;
  number: number;
  options?: { deprecated?: boolean };
}

export interface EnumDescriptorProto {
  name: string;
  value?: EnumValueDescriptorProto[];
  options?: { allowAlias?: boolean; deprecated?: boolean };
}

export interface MethodDescriptorProto {
  name: string;
  inputType: string;
  outputType: string;
  clientStreaming?: boolean;
  serverStreaming?: boolean;
  options?: { deprecated?: boolean };
}

export interface ServiceDescriptorProto {
  name: string;
  method?: MethodDescriptorProto[];
  options?: { deprecated?: boolean };
}

export interface SourceCodeLocation {
  path?: number[];
  leadingComments?: string;
  trailingComments?: string;
  leadingDetachedComments?: string[];
}

export interface SourceCodeInfo {
  location?: SourceCodeLocation[];
}

export interface FileDescriptorProto {
  name: string;
  package?: string;
  dependency?: string[];
  /** Indexes into `dependency` */
  publicDependency?: number[];
  messageType?: DescriptorProto[];
  enumType?: EnumDescriptorProto[];
  service?: ServiceDescriptorProto[];
  sourceCodeInfo?: SourceCodeInfo;
  syntax?: string;
}

export interface FileDescriptorSet {
  file: FileDescriptorProto[];
}

/**
 * Field numbers of the descriptor messages, used to build source-code-info paths
 */
export const DESCRIPTOR_PATH = {
  FILE_MESSAGE_TYPE: 4,
  FILE_ENUM_TYPE: 5,
  FILE_SERVICE: 6,
  MESSAGE_FIELD: 2,
  MESSAGE_NESTED_TYPE: 3,
  MESSAGE_ENUM_TYPE: 4,
  MESSAGE_ONEOF_DECL: 8,
  ENUM_VALUE: 2,
  SERVICE_METHOD: 2
} as const;
