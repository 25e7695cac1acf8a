/**
 * Tests for scope resolution
 */

import { DescriptorIndex } from '../descriptorIndex';
import { UnresolvedReferenceError } from '../errors';
import { ScopeResolver, enclosingScopes, resolveSchema } from '../resolver';
import { FileDescriptorSet } from '../descriptor';
import {
  descriptorSet,
  enumField,
  enumType,
  mapField,
  message,
  messageField,
  method,
  protoFile
} from '../../__tests__/testUtils';

function fieldTarget(set: FileDescriptorSet, fieldName: string): string | undefined {
  const schema = resolveSchema(DescriptorIndex.build(set));
  const field = schema.index.getFields().find(f => f.fullName === fieldName);
  const resolved = field ? schema.fieldTypes.get(field) : undefined;
  if (!resolved) {
    return undefined;
  }
  return resolved.kind === 'scalar' || resolved.kind === 'map' ? resolved.kind : resolved.decl.fullName;
}

describe('enclosingScopes', () => {
  it('should list scopes innermost first, ending at the root', () => {
    expect(enclosingScopes('a.B.C')).toEqual(['a.B.C', 'a.B', 'a', '']);
    expect(enclosingScopes('')).toEqual(['']);
  });
});

describe('ScopeResolver', () => {
  it('should prefer the innermost declaration', () => {
    const set = descriptorSet(
      protoFile('a.proto', 'a', {
        messageType: [
          message('T'),
          message('Outer', [messageField('t', 1, 'T')], { nestedType: [message('T')] })
        ]
      })
    );

    expect(fieldTarget(set, 'a.Outer.t')).toBe('a.Outer.T');
  });

  it('should fall back to enclosing packages', () => {
    const set = descriptorSet(
      protoFile('base.proto', 'a', { messageType: [message('Shared')] }),
      protoFile('deep.proto', 'a.b.c', {
        dependency: ['base.proto'],
        messageType: [message('User', [messageField('shared', 1, 'Shared')])]
      })
    );

    expect(fieldTarget(set, 'a.b.c.User.shared')).toBe('a.Shared');
  });

  it('should resolve partially qualified references from the first matching scope', () => {
    const set = descriptorSet(
      protoFile('a.proto', 'x', {
        messageType: [
          message('Outer', [], { nestedType: [message('Inner')] }),
          message('User', [messageField('inner', 1, 'Outer.Inner')])
        ]
      })
    );

    expect(fieldTarget(set, 'x.User.inner')).toBe('x.Outer.Inner');
  });

  it('should resolve absolute references exactly', () => {
    const set = descriptorSet(
      protoFile('a.proto', 'a', {
        messageType: [message('T'), message('Outer', [messageField('t', 1, '.a.T')], { nestedType: [message('T')] })]
      })
    );

    expect(fieldTarget(set, 'a.Outer.t')).toBe('a.T');
  });

  it('should skip declarations from files that are not imported', () => {
    const set = descriptorSet(
      protoFile('hidden.proto', 'a', { messageType: [message('Secret')] }),
      protoFile('user.proto', 'a', { messageType: [message('User', [messageField('secret', 1, 'Secret')])] })
    );

    expect(() => resolveSchema(DescriptorIndex.build(set))).toThrow(
      'Cannot resolve type "Secret" referenced from "a.User": a.Secret is declared in hidden.proto, which user.proto does not import (in user.proto)'
    );
  });

  it('should see declarations re-exported through public imports', () => {
    const set = descriptorSet(
      protoFile('base.proto', 'base', { messageType: [message('Money')] }),
      protoFile('forward.proto', 'fwd', { dependency: ['base.proto'], publicDependency: [0] }),
      protoFile('shop.proto', 'shop', {
        dependency: ['forward.proto'],
        messageType: [message('Order', [messageField('total', 1, '.base.Money')])]
      })
    );

    expect(fieldTarget(set, 'shop.Order.total')).toBe('base.Money');
  });

  it('should report unresolved references with their context', () => {
    const set = descriptorSet(
      protoFile('a.proto', 'a', { messageType: [message('M', [messageField('ghost', 1, 'Ghost')])] })
    );

    let caught: unknown;
    try {
      resolveSchema(DescriptorIndex.build(set));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(UnresolvedReferenceError);
    expect(caught).toMatchObject({ reference: 'Ghost', context: 'a.M', file: 'a.proto' });
  });

  it('should reject a declared kind that disagrees with the target', () => {
    const set = descriptorSet(
      protoFile('a.proto', 'a', {
        messageType: [message('M', [enumField('color', 1, 'Color')]), message('Color')]
      })
    );

    expect(() => resolveSchema(DescriptorIndex.build(set))).toThrow('expected enum but found message a.Color');
  });

  it('should resolve enum references', () => {
    const set = descriptorSet(
      protoFile('a.proto', 'a', {
        enumType: [enumType('Color', [['COLOR_RED', 0]])],
        messageType: [message('M', [enumField('color', 1, 'Color')])]
      })
    );

    expect(fieldTarget(set, 'a.M.color')).toBe('a.Color');
  });

  it('should resolve map values in the entry scope', () => {
    const entry = mapField('children', 1, 'ChildrenEntry', 'TYPE_STRING', { type: 'TYPE_MESSAGE', typeName: 'Tree' });
    const set = descriptorSet(
      protoFile('a.proto', 'shapes', {
        messageType: [message('Tree'), message('Wrapper', [entry.field], { nestedType: [entry.entry] })]
      })
    );

    const schema = resolveSchema(DescriptorIndex.build(set));
    const field = schema.index.getMessage('shapes.Wrapper')?.fields[0];
    const resolved = field && schema.fieldTypes.get(field);
    expect(resolved?.kind).toBe('map');
    if (resolved?.kind === 'map') {
      expect(resolved.key).toBe('string');
      expect(resolved.value.kind === 'message' && resolved.value.decl.fullName).toBe('shapes.Tree');
    }
  });

  it('should resolve method types in the package scope', () => {
    const set = descriptorSet(
      protoFile('svc.proto', 'svc', {
        messageType: [message('Request'), message('Response')],
        service: [{ name: 'Api', method: [method('Get', 'Request', '.svc.Response')] }]
      })
    );

    const schema = resolveSchema(DescriptorIndex.build(set));
    const [resolved] = [...schema.methodTypes.values()];
    expect(resolved?.input.fullName).toBe('svc.Request');
    expect(resolved?.output.fullName).toBe('svc.Response');
  });

  it('should reject methods that take an enum', () => {
    const set = descriptorSet(
      protoFile('svc.proto', 'svc', {
        messageType: [message('Response')],
        enumType: [enumType('Mode', [['MODE_A', 0]])],
        service: [{ name: 'Api', method: [method('Get', 'Mode', 'Response')] }]
      })
    );

    expect(() => resolveSchema(DescriptorIndex.build(set))).toThrow(UnresolvedReferenceError);
  });

  it('should memoize repeated lookups', () => {
    const index = DescriptorIndex.build(
      descriptorSet(protoFile('a.proto', 'a', { messageType: [message('T'), message('M')] }))
    );
    const resolver = new ScopeResolver(index);
    const file = index.getFile('a.proto');
    expect(file).toBeDefined();
    if (!file) {
      return;
    }

    const first = resolver.resolveReference('T', 'a.M', file);
    const second = resolver.resolveReference('T', 'a.M', file);
    expect(second).toBe(first);
    expect(first.fullName).toBe('a.T');
  });
});
