/**
 * Service Hook Dispatcher
 * Describes each service's methods in terms of the generated types and hands the
 * description to a caller-supplied generator.
 */

import { ServiceDecl, Comments } from '../core/schema';
import { ResolvedSchema } from '../core/resolver';
import { UnresolvedReferenceError } from '../core/errors';
import { ResolvedOptions } from '../utils/options';
import { logger } from '../utils/logger';
import { toLowerCamelCase } from '../shared/namingUtils';
import { commentBodyLines } from '../shared/textUtils';
import { ImportTracker, renderType } from './printer';
import { TypeMapper } from './typeMapper';

export interface MethodDescription {
  /** Method name in lowerCamelCase */
  name: string;
  protoName: string;
  /** Request type as TypeScript text valid inside the owning unit */
  requestType: string;
  responseType: string;
  /** Fully-qualified schema names, without a leading dot */
  requestProtoType: string;
  responseProtoType: string;
  clientStreaming: boolean;
  serverStreaming: boolean;
  comments: string[];
  deprecated: boolean;
}

export interface ServiceDescription {
  name: string;
  protoName: string;
  package: string;
  fullName: string;
  comments: string[];
  methods: MethodDescription[];
}

/**
 * Returns source text to append to the service's package unit, or nothing
 */
export type ServiceGenerator = (service: ServiceDescription) => string | undefined | null | void;

export class ServiceHookDispatcher {
  constructor(
    private readonly schema: ResolvedSchema,
    private readonly mapper: TypeMapper,
    private readonly options: ResolvedOptions,
    private readonly generator?: ServiceGenerator
  ) {}

  get enabled(): boolean {
    return this.generator !== undefined;
  }

  describe(service: ServiceDecl, imports: ImportTracker): ServiceDescription {
    return {
      name: service.name,
      protoName: service.name,
      package: service.file.package,
      fullName: service.fullName,
      comments: this.comments(service.fullName, service.comments),
      methods: service.methods.map(method => {
        const types = this.schema.methodTypes.get(method);
        if (!types) {
          throw new UnresolvedReferenceError(method.inputType, method.fullName, service.file.name, 'method was not resolved');
        }
        return {
          name: toLowerCamelCase(method.name),
          protoName: method.name,
          requestType: renderType(this.mapper.mapMethodType(types.input), imports),
          responseType: renderType(this.mapper.mapMethodType(types.output), imports),
          requestProtoType: types.input.fullName,
          responseProtoType: types.output.fullName,
          clientStreaming: method.clientStreaming,
          serverStreaming: method.serverStreaming,
          comments: this.comments(method.fullName, method.comments),
          deprecated: method.deprecated
        };
      })
    };
  }

  /**
   * Invoke the generator for `service`. Empty results are dropped.
   */
  dispatch(service: ServiceDecl, imports: ImportTracker): string | undefined {
    if (!this.generator) {
      return undefined;
    }
    // Imports used by a dropped fragment must not reach the unit
    const scratch = imports.fork();
    const fragment = this.generator(this.describe(service, scratch));
    if (typeof fragment !== 'string' || fragment.trim().length === 0) {
      logger.verbose(`Service generator returned nothing for ${service.fullName}`);
      return undefined;
    }
    imports.merge(scratch);
    return fragment.trimEnd();
  }

  private comments(fullName: string, comments: Comments): string[] {
    if (this.options.disableComments.has(fullName)) {
      return [];
    }
    return [...commentBodyLines(comments.leading), ...commentBodyLines(comments.trailing)];
  }
}
