import { LONG_KINDS, ScalarKind } from '../core/schema';
import { ResolvedOptions } from '../utils/options';
import { TypeExpr, primitive } from './typeExpr';

type ScalarOptions = Pick<ResolvedOptions, 'bytes' | 'longType'>;

export function scalarType(kind: ScalarKind, options: ScalarOptions): TypeExpr {
  if (LONG_KINDS.includes(kind)) {
    return primitive(options.longType);
  }
  switch (kind) {
    case 'bool':
      return primitive('boolean');
    case 'string':
      return primitive('string');
    case 'bytes':
      return primitive(options.bytes === 'buffer' ? 'Buffer' : 'Uint8Array');
    default:
      return primitive('number');
  }
}

/**
 * Zero value of an implicit-presence scalar, as TypeScript source text
 */
export function scalarDefault(kind: ScalarKind, options: ScalarOptions): string {
  if (LONG_KINDS.includes(kind)) {
    switch (options.longType) {
      case 'bigint':
        return '0n';
      case 'string':
        return '"0"';
      case 'number':
        return '0';
    }
  }
  switch (kind) {
    case 'bool':
      return 'false';
    case 'string':
      return '""';
    case 'bytes':
      return options.bytes === 'buffer' ? 'Buffer.alloc(0)' : 'new Uint8Array(0)';
    default:
      return '0';
  }
}
