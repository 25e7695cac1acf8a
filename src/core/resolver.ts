/**
 * Scope Resolver
 * Resolves textual type references to indexed declarations following the schema
 * language's lexical scoping: innermost scope first, then each enclosing message,
 * then each package prefix down to the root. Only declarations from visible files count.
 */

import { DescriptorIndex } from './descriptorIndex';
import {
  FieldDecl,
  FileEntry,
  MessageDecl,
  MethodDecl,
  ResolvedType,
  TypeDecl,
  qualify
} from './schema';
import { UnresolvedReferenceError } from './errors';
import { MemoCache } from '../utils/cache';
import { logger } from '../utils/logger';

export interface ResolvedMethod {
  input: MessageDecl;
  output: MessageDecl;
}

/**
 * Resolution results for a whole descriptor set
 */
export interface ResolvedSchema {
  index: DescriptorIndex;
  fieldTypes: ReadonlyMap<FieldDecl, ResolvedType>;
  methodTypes: ReadonlyMap<MethodDecl, ResolvedMethod>;
}

export class ScopeResolver {
  private readonly memo = new MemoCache<string, TypeDecl>();

  constructor(private readonly index: DescriptorIndex) {}

  /**
   * Resolve every field and method reference in the index. Fails on the first
   * reference that cannot be resolved.
   */
  resolveAll(): ResolvedSchema {
    const fieldTypes = new Map<FieldDecl, ResolvedType>();
    for (const field of this.index.getFields()) {
      fieldTypes.set(field, this.resolveField(field));
    }

    const methodTypes = new Map<MethodDecl, ResolvedMethod>();
    for (const service of this.index.getServices()) {
      for (const method of service.methods) {
        methodTypes.set(method, {
          input: this.resolveMethodType(method, method.inputType),
          output: this.resolveMethodType(method, method.outputType)
        });
      }
    }

    const stats = this.memo.stats();
    logger.verboseWithContext('Resolved type references', {
      stage: 'resolve',
      fields: fieldTypes.size,
      methods: methodTypes.size,
      cacheHits: stats.hits,
      cacheMisses: stats.misses
    });

    return { index: this.index, fieldTypes, methodTypes };
  }

  /**
   * Resolve `reference` as written inside `scope` (a message or package name) of `file`
   */
  resolveReference(reference: string, scope: string, file: FileEntry): TypeDecl {
    return this.memo.getOrCompute(`${file.name}|${scope}|${reference}`, () =>
      this.search(reference, scope, file)
    );
  }

  resolveField(field: FieldDecl): ResolvedType {
    const shape = field.shape;
    if (shape.kind === 'scalar') {
      return { kind: 'scalar', scalar: shape.scalar };
    }

    const target = this.resolveReference(shape.typeName, field.message.fullName, field.message.file);

    if (field.cardinality === 'map') {
      if (target !== field.mapEntry || target.kind !== 'message') {
        throw new UnresolvedReferenceError(
          shape.typeName,
          field.fullName,
          field.message.file.name,
          'map field does not resolve to its own map entry'
        );
      }
      return this.resolveMapEntry(field, target);
    }

    if (shape.declaredKind && shape.declaredKind !== target.kind) {
      throw new UnresolvedReferenceError(
        shape.typeName,
        field.fullName,
        field.message.file.name,
        `expected ${shape.declaredKind} but found ${target.kind} ${target.fullName}`
      );
    }

    return target.kind === 'enum'
      ? { kind: 'enum', decl: target }
      : { kind: 'message', decl: target };
  }

  private resolveMapEntry(field: FieldDecl, entry: MessageDecl): ResolvedType {
    const key = entry.fields.find(f => f.number === 1);
    const value = entry.fields.find(f => f.number === 2);
    if (!key || key.shape.kind !== 'scalar' || !value) {
      throw new UnresolvedReferenceError(
        entry.fullName,
        field.fullName,
        field.message.file.name,
        'map entry must declare a scalar key (1) and a value (2)'
      );
    }
    return { kind: 'map', key: key.shape.scalar, value: this.resolveField(value) };
  }

  private resolveMethodType(method: MethodDecl, reference: string): MessageDecl {
    const service = method.service;
    const target = this.resolveReference(reference, service.file.package, service.file);
    if (target.kind !== 'message') {
      throw new UnresolvedReferenceError(
        reference,
        method.fullName,
        service.file.name,
        `${target.fullName} is an enum, methods take messages`
      );
    }
    return target;
  }

  private search(reference: string, scope: string, file: FileEntry): TypeDecl {
    if (reference.startsWith('.')) {
      const target = this.index.getType(reference.slice(1));
      if (!target) {
        throw new UnresolvedReferenceError(reference, scope, file.name);
      }
      return target;
    }

    const visible = this.index.visibleFiles(file);
    let hidden: TypeDecl | undefined;

    for (const candidateScope of enclosingScopes(scope)) {
      const candidate = this.index.getType(qualify(candidateScope, reference));
      if (!candidate) {
        continue;
      }
      if (visible.has(candidate.file.name)) {
        return candidate;
      }
      hidden = hidden ?? candidate;
    }

    const detail = hidden
      ? `${hidden.fullName} is declared in ${hidden.file.name}, which ${file.name} does not import`
      : undefined;
    throw new UnresolvedReferenceError(reference, scope, file.name, detail);
  }
}

/**
 * Scopes searched for a relative reference, innermost first, ending with the root
 * ("a.B.C" -> ["a.B.C", "a.B", "a", ""])
 */
export function enclosingScopes(scope: string): string[] {
  const scopes: string[] = [];
  const parts = scope ? scope.split('.') : [];
  while (parts.length > 0) {
    scopes.push(parts.join('.'));
    parts.pop();
  }
  scopes.push('');
  return scopes;
}

export function resolveSchema(index: DescriptorIndex): ResolvedSchema {
  return new ScopeResolver(index).resolveAll();
}
