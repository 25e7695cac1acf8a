/**
 * Descriptor Index
 * Flattens a descriptor set into a catalogue of files, types and services keyed by
 * fully-qualified name. Nested declarations are registered under their dotted path.
 */

import {
  DESCRIPTOR_PATH,
  DescriptorProto,
  EnumDescriptorProto,
  FieldDescriptorProto,
  FieldDescriptorType,
  FileDescriptorProto,
  FileDescriptorSet,
  ServiceDescriptorProto
} from './descriptor';
import {
  Comments,
  EnumDecl,
  FieldDecl,
  FieldShape,
  FileEntry,
  MAP_KEY_KINDS,
  MessageDecl,
  MethodDecl,
  ScalarKind,
  ServiceDecl,
  Syntax,
  TypeDecl,
  qualify
} from './schema';
import { DuplicateNameError, InvalidMapKeyError, UnresolvedReferenceError } from './errors';
import { toLowerCamelCase } from '../shared/namingUtils';
import { logger } from '../utils/logger';
import { isDefined } from '../utils/utils';

const SCALAR_BY_DESCRIPTOR_TYPE: Partial<Record<FieldDescriptorType, ScalarKind>> = {
  TYPE_DOUBLE: 'double',
  TYPE_FLOAT: 'float',
  TYPE_INT64: 'int64',
  TYPE_UINT64: 'uint64',
  TYPE_INT32: 'int32',
  TYPE_FIXED64: 'fixed64',
  TYPE_FIXED32: 'fixed32',
  TYPE_BOOL: 'bool',
  TYPE_STRING: 'string',
  TYPE_BYTES: 'bytes',
  TYPE_UINT32: 'uint32',
  TYPE_SFIXED32: 'sfixed32',
  TYPE_SFIXED64: 'sfixed64',
  TYPE_SINT32: 'sint32',
  TYPE_SINT64: 'sint64'
};

type CommentTable = Map<string, Comments>;

type IndexedEntity = TypeDecl | ServiceDecl;

export class DescriptorIndex {
  private readonly files = new Map<string, FileEntry>();
  private readonly fileOrder: FileEntry[] = [];
  private readonly entities = new Map<string, IndexedEntity>();
  private readonly messages: MessageDecl[] = [];
  private readonly fields: FieldDecl[] = [];
  private readonly visibility = new Map<string, ReadonlySet<string>>();
  private frozen = false;

  private constructor() {}

  /**
   * Build the index for a descriptor set. The set itself is not modified.
   */
  static build(set: FileDescriptorSet): DescriptorIndex {
    const index = new DescriptorIndex();
    set.file.forEach((file, order) => index.addFile(file, order));
    logger.verboseWithContext('Indexed descriptor set', {
      stage: 'index',
      files: index.fileOrder.length,
      entities: index.entities.size
    });
    return index;
  }

  getFiles(): readonly FileEntry[] {
    return this.fileOrder;
  }

  getFile(name: string): FileEntry | undefined {
    return this.files.get(name);
  }

  getType(fullName: string): TypeDecl | undefined {
    const entity = this.entities.get(fullName);
    return entity && entity.kind !== 'service' ? entity : undefined;
  }

  getMessage(fullName: string): MessageDecl | undefined {
    const entity = this.entities.get(fullName);
    return entity?.kind === 'message' ? entity : undefined;
  }

  getEnum(fullName: string): EnumDecl | undefined {
    const entity = this.entities.get(fullName);
    return entity?.kind === 'enum' ? entity : undefined;
  }

  getService(fullName: string): ServiceDecl | undefined {
    const entity = this.entities.get(fullName);
    return entity?.kind === 'service' ? entity : undefined;
  }

  /**
   * Every message, in file order and then declaration pre-order
   */
  getMessages(): readonly MessageDecl[] {
    return this.messages;
  }

  getFields(): readonly FieldDecl[] {
    return this.fields;
  }

  getServices(): ServiceDecl[] {
    return this.fileOrder.flatMap(file => file.services);
  }

  /**
   * Names of the files whose declarations `file` may reference: itself, its direct
   * imports, and whatever those re-export through public imports.
   */
  visibleFiles(file: FileEntry): ReadonlySet<string> {
    const cached = this.visibility.get(file.name);
    if (cached) {
      return cached;
    }

    const visible = new Set<string>([file.name]);
    const pending = [...file.dependencies];
    while (pending.length > 0) {
      const name = pending.pop();
      if (name === undefined || visible.has(name)) {
        continue;
      }
      visible.add(name);
      const dependency = this.files.get(name);
      if (dependency) {
        pending.push(...dependency.publicDependencies);
      } else {
        logger.verbose(`Import "${name}" of ${file.name} is not part of the descriptor set`);
      }
    }

    this.visibility.set(file.name, visible);
    return visible;
  }

  markIndirect(field: FieldDecl): void {
    if (this.frozen) {
      throw new Error(`Cannot mark ${field.fullName} indirect: the index is frozen`);
    }
    field.needsIndirection = true;
  }

  /**
   * End the mutable phase; indirection flags are read-only afterwards
   */
  freeze(): void {
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  private addFile(proto: FileDescriptorProto, order: number): void {
    const previous = this.files.get(proto.name);
    if (previous) {
      throw new DuplicateNameError(proto.name, proto.name, previous.name);
    }

    const dependencies = proto.dependency ?? [];
    const file: FileEntry = {
      name: proto.name,
      package: proto.package ?? '',
      syntax: parseSyntax(proto.syntax),
      dependencies,
      publicDependencies: (proto.publicDependency ?? [])
        .map(i => dependencies[i])
        .filter(isDefined),
      messages: [],
      enums: [],
      services: [],
      order
    };
    this.files.set(file.name, file);
    this.fileOrder.push(file);

    const comments = buildCommentTable(proto);

    (proto.messageType ?? []).forEach((message, i) => {
      file.messages.push(
        this.addMessage(message, file, file.package, undefined, [DESCRIPTOR_PATH.FILE_MESSAGE_TYPE, i], comments)
      );
    });

    (proto.enumType ?? []).forEach((enumProto, i) => {
      file.enums.push(
        this.addEnum(enumProto, file, file.package, undefined, [DESCRIPTOR_PATH.FILE_ENUM_TYPE, i], comments)
      );
    });

    (proto.service ?? []).forEach((service, i) => {
      file.services.push(this.addService(service, file, [DESCRIPTOR_PATH.FILE_SERVICE, i], comments));
    });
  }

  private register(entity: IndexedEntity): void {
    const existing = this.entities.get(entity.fullName);
    if (existing) {
      throw new DuplicateNameError(entity.fullName, entity.file.name, existing.file.name);
    }
    this.entities.set(entity.fullName, entity);
  }

  private addMessage(
    proto: DescriptorProto,
    file: FileEntry,
    scope: string,
    parent: MessageDecl | undefined,
    path: number[],
    comments: CommentTable
  ): MessageDecl {
    const message: MessageDecl = {
      kind: 'message',
      name: proto.name,
      fullName: qualify(scope, proto.name),
      file,
      parent,
      fields: [],
      oneofs: [],
      nestedMessages: [],
      nestedEnums: [],
      isMapEntry: proto.options?.mapEntry === true,
      deprecated: proto.options?.deprecated === true,
      comments: lookupComments(comments, path)
    };
    this.register(message);
    this.messages.push(message);

    (proto.nestedType ?? []).forEach((nested, i) => {
      message.nestedMessages.push(
        this.addMessage(nested, file, message.fullName, message, [...path, DESCRIPTOR_PATH.MESSAGE_NESTED_TYPE, i], comments)
      );
    });

    (proto.enumType ?? []).forEach((nested, i) => {
      message.nestedEnums.push(
        this.addEnum(nested, file, message.fullName, message, [...path, DESCRIPTOR_PATH.MESSAGE_ENUM_TYPE, i], comments)
      );
    });

    const fieldProtos = proto.field ?? [];
    (proto.oneofDecl ?? []).forEach((oneofProto, i) => {
      message.oneofs.push({
        name: oneofProto.name,
        fullName: `${message.fullName}.${oneofProto.name}`,
        message,
        fields: [],
        synthetic: fieldProtos.some(f => f.oneofIndex === i && f.proto3Optional === true),
        comments: lookupComments(comments, [...path, DESCRIPTOR_PATH.MESSAGE_ONEOF_DECL, i])
      });
    });

    fieldProtos.forEach((fieldProto, i) => {
      const field = this.createField(fieldProto, message, lookupComments(comments, [...path, DESCRIPTOR_PATH.MESSAGE_FIELD, i]));
      message.fields.push(field);
      this.fields.push(field);
    });

    return message;
  }

  private createField(proto: FieldDescriptorProto, message: MessageDecl, comments: Comments): FieldDecl {
    const fullName = `${message.fullName}.${proto.name}`;
    const repeated = proto.label === 'LABEL_REPEATED';
    const shape = fieldShape(proto, fullName, message.file.name);
    const oneof = proto.oneofIndex !== undefined ? message.oneofs[proto.oneofIndex] : undefined;
    if (proto.oneofIndex !== undefined && !oneof) {
      throw new UnresolvedReferenceError(
        `oneof #${proto.oneofIndex}`,
        fullName,
        message.file.name,
        'field names a oneof the message does not declare'
      );
    }

    const field: FieldDecl = {
      name: proto.name,
      fullName,
      number: proto.number ?? 0,
      jsonName: proto.jsonName ?? toLowerCamelCase(proto.name),
      message,
      cardinality: repeated ? 'repeated' : 'singular',
      shape,
      explicitPresence: !repeated && (
        proto.proto3Optional === true ||
        oneof !== undefined ||
        (message.file.syntax === 'proto2' && proto.label !== 'LABEL_REQUIRED')
      ),
      oneof,
      needsIndirection: false,
      deprecated: proto.options?.deprecated === true,
      comments
    };

    if (repeated && shape.kind === 'reference' && shape.declaredKind !== 'enum') {
      const entry = findMapEntry(message, shape.typeName);
      if (entry) {
        validateMapKey(field, entry);
        field.cardinality = 'map';
        field.mapEntry = entry;
      }
    }

    oneof?.fields.push(field);
    return field;
  }

  private addEnum(
    proto: EnumDescriptorProto,
    file: FileEntry,
    scope: string,
    parent: MessageDecl | undefined,
    path: number[],
    comments: CommentTable
  ): EnumDecl {
    const enumDecl: EnumDecl = {
      kind: 'enum',
      name: proto.name,
      fullName: qualify(scope, proto.name),
      file,
      parent,
      values: (proto.value ?? []).map((value, i) => ({
        name: value.name,
        number: value.number,
        deprecated: value.options?.deprecated === true,
        comments: lookupComments(comments, [...path, DESCRIPTOR_PATH.ENUM_VALUE, i])
      })),
      deprecated: proto.options?.deprecated === true,
      comments: lookupComments(comments, path)
    };
    this.register(enumDecl);
    return enumDecl;
  }

  private addService(
    proto: ServiceDescriptorProto,
    file: FileEntry,
    path: number[],
    comments: CommentTable
  ): ServiceDecl {
    const service: ServiceDecl = {
      kind: 'service',
      name: proto.name,
      fullName: qualify(file.package, proto.name),
      file,
      methods: [],
      deprecated: proto.options?.deprecated === true,
      comments: lookupComments(comments, path)
    };
    this.register(service);

    (proto.method ?? []).forEach((methodProto, i) => {
      const method: MethodDecl = {
        name: methodProto.name,
        fullName: `${service.fullName}.${methodProto.name}`,
        service,
        inputType: methodProto.inputType,
        outputType: methodProto.outputType,
        clientStreaming: methodProto.clientStreaming === true,
        serverStreaming: methodProto.serverStreaming === true,
        deprecated: methodProto.options?.deprecated === true,
        comments: lookupComments(comments, [...path, DESCRIPTOR_PATH.SERVICE_METHOD, i])
      };
      service.methods.push(method);
    });

    return service;
  }
}

function parseSyntax(syntax: string | undefined): Syntax {
  return syntax === 'proto3' ? 'proto3' : 'proto2';
}

function fieldShape(proto: FieldDescriptorProto, fullName: string, file: string): FieldShape {
  if (proto.typeName) {
    const declaredKind = proto.type === 'TYPE_ENUM'
      ? 'enum'
      : proto.type === 'TYPE_MESSAGE' || proto.type === 'TYPE_GROUP'
        ? 'message'
        : undefined;
    return { kind: 'reference', typeName: proto.typeName, declaredKind };
  }

  const scalar = proto.type ? SCALAR_BY_DESCRIPTOR_TYPE[proto.type] : undefined;
  if (!scalar) {
    throw new UnresolvedReferenceError(
      proto.type ?? '<none>',
      fullName,
      file,
      'field declares neither a scalar type nor a type name'
    );
  }
  return { kind: 'scalar', scalar };
}

/**
 * Map fields are repeated references to a nested map-entry message of the same message
 */
function findMapEntry(message: MessageDecl, typeName: string): MessageDecl | undefined {
  return message.nestedMessages.find(nested => {
    if (!nested.isMapEntry) {
      return false;
    }
    if (typeName.startsWith('.')) {
      return typeName === `.${nested.fullName}`;
    }
    const local = `${message.name}.${nested.name}`;
    return typeName === nested.name || typeName === local || typeName.endsWith(`.${local}`);
  });
}

function validateMapKey(field: FieldDecl, entry: MessageDecl): void {
  const key = entry.fields.find(f => f.number === 1) ?? entry.fields.find(f => f.name === 'key');
  if (!key) {
    throw new InvalidMapKeyError(field.fullName, '<missing>', field.message.file.name);
  }
  if (key.shape.kind === 'reference') {
    throw new InvalidMapKeyError(field.fullName, key.shape.typeName, field.message.file.name);
  }
  if (!MAP_KEY_KINDS.includes(key.shape.scalar)) {
    throw new InvalidMapKeyError(field.fullName, key.shape.scalar, field.message.file.name);
  }
}

function buildCommentTable(proto: FileDescriptorProto): CommentTable {
  const table: CommentTable = new Map();
  for (const location of proto.sourceCodeInfo?.location ?? []) {
    if (!location.path || (!location.leadingComments && !location.trailingComments)) {
      continue;
    }
    table.set(location.path.join('.'), {
      leading: location.leadingComments,
      trailing: location.trailingComments
    });
  }
  return table;
}

function lookupComments(table: CommentTable, path: number[]): Comments {
  return table.get(path.join('.')) ?? {};
}
