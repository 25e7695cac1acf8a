/**
 * Native TypeScript shapes for the Google well-known types.
 * Declarations in google.protobuf that appear here are mapped instead of generated
 * unless `compileWellKnownTypes` is set.
 */

import { ScalarKind } from '../core/schema';
import { ResolvedOptions } from '../utils/options';
import { WELL_KNOWN_PACKAGE } from '../utils/constants';
import { scalarType } from './scalars';
import { TypeExpr, optional, primitive } from './typeExpr';

type WellKnownMapping = (options: ResolvedOptions) => TypeExpr;

const wrapper = (scalar: ScalarKind): WellKnownMapping => options => optional(scalarType(scalar, options));

export const WELL_KNOWN_TYPES: Record<string, WellKnownMapping> = {
  Timestamp: () => primitive('Date'),
  Duration: options => ({
    kind: 'object',
    members: [
      { name: 'seconds', type: scalarType('int64', options) },
      { name: 'nanos', type: primitive('number') }
    ]
  }),
  Any: options => ({
    kind: 'object',
    members: [
      { name: 'typeUrl', type: primitive('string') },
      { name: 'value', type: scalarType('bytes', options) }
    ]
  }),
  Struct: () => ({ kind: 'map', container: 'record', key: primitive('string'), value: primitive('unknown') }),
  Value: () => primitive('unknown'),
  ListValue: () => ({ kind: 'array', element: primitive('unknown') }),
  NullValue: () => primitive('null'),
  Empty: () => ({ kind: 'object', members: [] }),
  FieldMask: () => ({ kind: 'array', element: primitive('string') }),
  DoubleValue: wrapper('double'),
  FloatValue: wrapper('float'),
  Int64Value: wrapper('int64'),
  UInt64Value: wrapper('uint64'),
  Int32Value: wrapper('int32'),
  UInt32Value: wrapper('uint32'),
  BoolValue: wrapper('bool'),
  StringValue: wrapper('string'),
  BytesValue: wrapper('bytes')
};

/**
 * Native shape for `fullName`, or undefined when it is not a mapped well-known type
 */
export function wellKnownType(fullName: string, options: ResolvedOptions): TypeExpr | undefined {
  if (options.compileWellKnownTypes || !fullName.startsWith(`${WELL_KNOWN_PACKAGE}.`)) {
    return undefined;
  }
  const name = fullName.slice(WELL_KNOWN_PACKAGE.length + 1);
  const mapping = Object.hasOwn(WELL_KNOWN_TYPES, name) ? WELL_KNOWN_TYPES[name] : undefined;
  return mapping ? mapping(options) : undefined;
}
