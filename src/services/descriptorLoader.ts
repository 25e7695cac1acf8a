/**
 * Descriptor set loader
 * Decodes the binary FileDescriptorSet written by `protoc --descriptor_set_out` (or
 * its JSON form) and validates it into the shapes the index reads.
 */

import * as fs from 'fs';
import * as protobuf from 'protobufjs';
import { z } from 'zod';
import {
  DescriptorProto,
  EnumDescriptorProto,
  FieldDescriptorProto,
  FileDescriptorProto,
  FileDescriptorSet,
  ServiceDescriptorProto
} from '../core/descriptor';
import { DescriptorDecodeError } from '../core/errors';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/utils';

/**
 * The subset of descriptor.proto the generator reads. Field numbers match the
 * upstream definition so binary sets decode unchanged; other fields are skipped.
 */
export const DESCRIPTOR_SCHEMA = `syntax = "proto2";
package google.protobuf;

message FileDescriptorSet {
  repeated FileDescriptorProto file = 1;
}

message FileDescriptorProto {
  optional string name = 1;
  optional string package = 2;
  repeated string dependency = 3;
  repeated int32 public_dependency = 10;
  repeated DescriptorProto message_type = 4;
  repeated EnumDescriptorProto enum_type = 5;
  repeated ServiceDescriptorProto service = 6;
  optional SourceCodeInfo source_code_info = 9;
  optional string syntax = 12;
}

message DescriptorProto {
  optional string name = 1;
  repeated FieldDescriptorProto field = 2;
  repeated DescriptorProto nested_type = 3;
  repeated EnumDescriptorProto enum_type = 4;
  optional MessageOptions options = 7;
  repeated OneofDescriptorProto oneof_decl = 8;
}

message FieldDescriptorProto {
  enum Type {
    TYPE_DOUBLE = 1;
    TYPE_FLOAT = 2;
    TYPE_INT64 = 3;
    TYPE_UINT64 = 4;
    TYPE_INT32 = 5;
    TYPE_FIXED64 = 6;
    TYPE_FIXED32 = 7;
    TYPE_BOOL = 8;
    TYPE_STRING = 9;
    TYPE_GROUP = 10;
    TYPE_MESSAGE = 11;
    TYPE_BYTES = 12;
    TYPE_UINT32 = 13;
    TYPE_ENUM = 14;
    TYPE_SFIXED32 = 15;
    TYPE_SFIXED64 = 16;
    TYPE_SINT32 = 17;
    TYPE_SINT64 = 18;
  }
  enum Label {
    LABEL_OPTIONAL = 1;
    LABEL_REQUIRED = 2;
    LABEL_REPEATED = 3;
  }
  optional string name = 1;
  optional int32 number = 3;
  optional Label label = 4;
  optional Type type = 5;
  optional string type_name = 6;
  optional FieldOptions options = 8;
  optional int32 oneof_index = 9;
  optional string json_name = 10;
  optional bool proto3_optional = 17;
}

message OneofDescriptorProto {
  optional string name = 1;
}

message EnumDescriptorProto {
  optional string name = 1;
  repeated EnumValueDescriptorProto value = 2;
  optional EnumOptions options = 3;
}

message EnumValueDescriptorProto {
  optional string name = 1;
  optional int32 number = 2;
  optional EnumValueOptions options = 3;
}

message ServiceDescriptorProto {
  optional string name = 1;
  repeated MethodDescriptorProto method = 2;
  optional ServiceOptions options = 3;
}

message MethodDescriptorProto {
  optional string name = 1;
  optional string input_type = 2;
  optional string output_type = 3;
  optional MethodOptions options = 4;
  optional bool client_streaming = 5;
  optional bool server_streaming = 6;
}

message FieldOptions {
  optional bool packed = 2;
  optional bool deprecated = 3;
}

message MessageOptions {
  optional bool deprecated = 3;
  optional bool map_entry = 7;
}

message EnumOptions {
  optional bool allow_alias = 2;
  optional bool deprecated = 3;
}

message EnumValueOptions {
  optional bool deprecated = 1;
}

message ServiceOptions {
  optional bool deprecated = 33;
}

message MethodOptions {
  optional bool deprecated = 33;
}

message SourceCodeInfo {
  message Location {
    repeated int32 path = 1 [packed = true];
    optional string leading_comments = 3;
    optional string trailing_comments = 4;
  }
  repeated Location location = 1;
}
`;

let descriptorSetType: protobuf.Type | undefined;

/**
 * protobufjs type for FileDescriptorSet, parsed once
 */
export function getDescriptorSetType(): protobuf.Type {
  if (!descriptorSetType) {
    const { root } = protobuf.parse(DESCRIPTOR_SCHEMA);
    descriptorSetType = root.lookupType('google.protobuf.FileDescriptorSet');
  }
  return descriptorSetType;
}

const deprecatedOptions = z.object({ deprecated: z.boolean().optional() });

const fieldSchema: z.ZodType<FieldDescriptorProto> = z.object({
  name: z.string(),
  number: z.number().int().optional(),
  label: z.enum(['LABEL_OPTIONAL', 'LABEL_REQUIRED', 'LABEL_REPEATED']).optional(),
  type: z
    .enum([
      'TYPE_DOUBLE',
      'TYPE_FLOAT',
      'TYPE_INT64',
      'TYPE_UINT64',
      'TYPE_INT32',
      'TYPE_FIXED64',
      'TYPE_FIXED32',
      'TYPE_BOOL',
      'TYPE_STRING',
      'TYPE_GROUP',
      'TYPE_MESSAGE',
      'TYPE_BYTES',
      'TYPE_UINT32',
      'TYPE_ENUM',
      'TYPE_SFIXED32',
      'TYPE_SFIXED64',
      'TYPE_SINT32',
      'TYPE_SINT64'
    ])
    .optional(),
  typeName: z.string().optional(),
  oneofIndex: z.number().int().optional(),
  jsonName: z.string().optional(),
  proto3Optional: z.boolean().optional(),
  options: z.object({ deprecated: z.boolean().optional(), packed: z.boolean().optional() }).optional()
});

const enumSchema: z.ZodType<EnumDescriptorProto> = z.object({
  name: z.string(),
  value: z
    .array(z.object({ name: z.string(), number: z.number().int(), options: deprecatedOptions.optional() }))
    .optional(),
  options: z.object({ allowAlias: z.boolean().optional(), deprecated: z.boolean().optional() }).optional()
});

const messageSchema: z.ZodType<DescriptorProto> = z.lazy(() =>
  z.object({
    name: z.string(),
    field: z.array(fieldSchema).optional(),
    nestedType: z.array(messageSchema).optional(),
    enumType: z.array(enumSchema).optional(),
    oneofDecl: z.array(z.object({ name: z.string() })).optional(),
    options: z.object({ mapEntry: z.boolean().optional(), deprecated: z.boolean().optional() }).optional()
  })
);

const serviceSchema: z.ZodType<ServiceDescriptorProto> = z.object({
  name: z.string(),
  method: z
    .array(
      z.object({
        name: z.string(),
        inputType: z.string(),
        outputType: z.string(),
        clientStreaming: z.boolean().optional(),
        serverStreaming: z.boolean().optional(),
        options: deprecatedOptions.optional()
      })
    )
    .optional(),
  options: deprecatedOptions.optional()
});

const fileSchema: z.ZodType<FileDescriptorProto> = z.object({
  name: z.string(),
  package: z.string().optional(),
  dependency: z.array(z.string()).optional(),
  publicDependency: z.array(z.number().int()).optional(),
  messageType: z.array(messageSchema).optional(),
  enumType: z.array(enumSchema).optional(),
  service: z.array(serviceSchema).optional(),
  sourceCodeInfo: z
    .object({
      location: z
        .array(
          z.object({
            path: z.array(z.number().int()).optional(),
            leadingComments: z.string().optional(),
            trailingComments: z.string().optional()
          })
        )
        .optional()
    })
    .optional(),
  syntax: z.string().optional()
});

const fileDescriptorSetSchema: z.ZodType<FileDescriptorSet> = z.object({
  file: z.array(fileSchema)
});

/**
 * Validate an already-decoded descriptor set (for example, the JSON form)
 */
export function parseDescriptorSet(value: unknown, source?: string): FileDescriptorSet {
  const result = fileDescriptorSetSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new DescriptorDecodeError(`invalid value${where}: ${issue?.message ?? 'unknown problem'}`, source);
  }
  return result.data;
}

/**
 * Decode a binary FileDescriptorSet
 */
export function decodeDescriptorSet(bytes: Uint8Array, source?: string): FileDescriptorSet {
  const type = getDescriptorSetType();
  let decoded: Record<string, unknown>;
  try {
    const message = type.decode(bytes);
    decoded = type.toObject(message, { enums: String, longs: Number, arrays: true, defaults: false });
  } catch (error) {
    throw new DescriptorDecodeError(getErrorMessage(error), source);
  }
  const set = parseDescriptorSet(decoded, source);
  logger.debug(`Decoded descriptor set with ${set.file.length} file(s)`);
  return set;
}

/**
 * Read a descriptor set from disk: JSON when the name ends in ".json", binary otherwise
 */
export function loadDescriptorSetFile(filePath: string): FileDescriptorSet {
  let data: Buffer;
  try {
    data = fs.readFileSync(filePath);
  } catch (error) {
    throw new DescriptorDecodeError(`cannot read file: ${getErrorMessage(error)}`, filePath);
  }

  if (filePath.endsWith('.json')) {
    let value: unknown;
    try {
      value = JSON.parse(data.toString('utf-8'));
    } catch (error) {
      throw new DescriptorDecodeError(`not valid JSON: ${getErrorMessage(error)}`, filePath);
    }
    return parseDescriptorSet(value, filePath);
  }
  return decodeDescriptorSet(data, filePath);
}
