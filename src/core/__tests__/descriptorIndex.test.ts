/**
 * Tests for the descriptor index
 */

import { DescriptorIndex } from '../descriptorIndex';
import { DuplicateNameError, InvalidMapKeyError, UnresolvedReferenceError } from '../errors';
import {
  descriptorSet,
  enumType,
  mapField,
  message,
  messageField,
  method,
  protoFile,
  repeated,
  scalarField
} from '../../__tests__/testUtils';

describe('DescriptorIndex', () => {
  describe('build', () => {
    it('should index nested types under their dotted path', () => {
      const index = DescriptorIndex.build(
        descriptorSet(
          protoFile('a.proto', 'pkg', {
            messageType: [
              message('Outer', [messageField('inner', 1, 'Inner')], {
                nestedType: [message('Inner')],
                enumType: [enumType('Kind', [['KIND_UNSPECIFIED', 0]])]
              })
            ]
          })
        )
      );

      expect(index.getMessage('pkg.Outer')?.name).toBe('Outer');
      expect(index.getMessage('pkg.Outer.Inner')?.parent?.fullName).toBe('pkg.Outer');
      expect(index.getEnum('pkg.Outer.Kind')?.values).toHaveLength(1);
      expect(index.getType('pkg.Missing')).toBeUndefined();
      expect(index.getMessages().map(m => m.fullName)).toEqual(['pkg.Outer', 'pkg.Outer.Inner']);
    });

    it('should index declarations of the empty package at the root', () => {
      const index = DescriptorIndex.build(descriptorSet(protoFile('root.proto', undefined, { messageType: [message('Loose')] })));
      expect(index.getMessage('Loose')?.file.package).toBe('');
    });

    it('should index services and methods', () => {
      const index = DescriptorIndex.build(
        descriptorSet(
          protoFile('svc.proto', 'svc', {
            messageType: [message('Req'), message('Res')],
            service: [{ name: 'Api', method: [method('Get', 'Req', '.svc.Res', { serverStreaming: true })] }]
          })
        )
      );

      const service = index.getService('svc.Api');
      expect(service?.methods.map(m => [m.fullName, m.clientStreaming, m.serverStreaming])).toEqual([
        ['svc.Api.Get', false, true]
      ]);
      expect(index.getType('svc.Api')).toBeUndefined();
    });

    it('should not modify the input set', () => {
      const set = descriptorSet(protoFile('a.proto', 'a', { messageType: [message('A', [scalarField('x', 1, 'TYPE_INT32')])] }));
      const before = JSON.stringify(set);
      DescriptorIndex.build(set);
      expect(JSON.stringify(set)).toBe(before);
    });
  });

  describe('duplicates', () => {
    it('should reject two types with one name across files', () => {
      const set = descriptorSet(
        protoFile('a.proto', 'pkg', { messageType: [message('Thing')] }),
        protoFile('b.proto', 'pkg', { enumType: [enumType('Thing', [['THING_A', 0]])] })
      );

      expect(() => DescriptorIndex.build(set)).toThrow(DuplicateNameError);
      expect(() => DescriptorIndex.build(set)).toThrow('Duplicate name "pkg.Thing", first declared in a.proto (in b.proto)');
    });

    it('should reject the same file twice', () => {
      const set = descriptorSet(protoFile('a.proto', 'a'), protoFile('a.proto', 'a'));
      expect(() => DescriptorIndex.build(set)).toThrow(DuplicateNameError);
    });
  });

  describe('fields', () => {
    it('should derive presence from syntax and labels', () => {
      const index = DescriptorIndex.build(
        descriptorSet(
          protoFile('p3.proto', 'p3', {
            messageType: [
              message(
                'M',
                [
                  scalarField('plain', 1, 'TYPE_STRING'),
                  scalarField('opt', 2, 'TYPE_STRING', { proto3Optional: true, oneofIndex: 0 }),
                  repeated(scalarField('many', 3, 'TYPE_STRING'))
                ],
                { oneofDecl: [{ name: '_opt' }] }
              )
            ]
          }),
          protoFile('p2.proto', 'p2', {
            syntax: 'proto2',
            messageType: [
              message('M', [
                scalarField('opt', 1, 'TYPE_INT32'),
                scalarField('req', 2, 'TYPE_INT32', { label: 'LABEL_REQUIRED' })
              ])
            ]
          })
        )
      );

      const presence = index.getFields().map(f => [f.fullName, f.explicitPresence]);
      expect(presence).toEqual([
        ['p3.M.plain', false],
        ['p3.M.opt', true],
        ['p3.M.many', false],
        ['p2.M.opt', true],
        ['p2.M.req', false]
      ]);
      expect(index.getMessage('p3.M')?.oneofs[0]?.synthetic).toBe(true);
    });

    it('should attach oneof members in order', () => {
      const index = DescriptorIndex.build(
        descriptorSet(
          protoFile('a.proto', 'a', {
            messageType: [
              message(
                'Shape',
                [scalarField('circle', 1, 'TYPE_DOUBLE', { oneofIndex: 0 }), scalarField('square', 2, 'TYPE_DOUBLE', { oneofIndex: 0 })],
                { oneofDecl: [{ name: 'kind' }] }
              )
            ]
          })
        )
      );

      const oneof = index.getMessage('a.Shape')?.oneofs[0];
      expect(oneof?.fullName).toBe('a.Shape.kind');
      expect(oneof?.synthetic).toBe(false);
      expect(oneof?.fields.map(f => f.name)).toEqual(['circle', 'square']);
    });

    it('should reject an out-of-range oneof index', () => {
      const set = descriptorSet(
        protoFile('a.proto', 'a', { messageType: [message('M', [scalarField('x', 1, 'TYPE_INT32', { oneofIndex: 2 })])] })
      );
      expect(() => DescriptorIndex.build(set)).toThrow(UnresolvedReferenceError);
    });

    it('should recognise map fields by their entry message', () => {
      const counts = mapField('counts', 1, 'CountsEntry', 'TYPE_STRING', { type: 'TYPE_INT32' });
      const index = DescriptorIndex.build(
        descriptorSet(
          protoFile('a.proto', 'a', {
            messageType: [message('M', [counts.field, repeated(messageField('list', 2, 'M'))], { nestedType: [counts.entry] })]
          })
        )
      );

      const [mapped, list] = index.getMessage('a.M')?.fields ?? [];
      expect(mapped?.cardinality).toBe('map');
      expect(mapped?.mapEntry?.fullName).toBe('a.M.CountsEntry');
      expect(list?.cardinality).toBe('repeated');
    });

    it('should reject map keys that are not integral, bool or string', () => {
      const bad = mapField('byRatio', 1, 'ByRatioEntry', 'TYPE_DOUBLE', { type: 'TYPE_STRING' });
      const set = descriptorSet(
        protoFile('a.proto', 'a', { messageType: [message('M', [bad.field], { nestedType: [bad.entry] })] })
      );

      expect(() => DescriptorIndex.build(set)).toThrow(InvalidMapKeyError);
      expect(() => DescriptorIndex.build(set)).toThrow('Map field "a.M.byRatio" has key type "double"');
    });

    it('should reject fields without a type', () => {
      const set = descriptorSet(protoFile('a.proto', 'a', { messageType: [message('M', [{ name: 'x', number: 1 }])] }));
      expect(() => DescriptorIndex.build(set)).toThrow(UnresolvedReferenceError);
    });
  });

  describe('comments', () => {
    it('should attach source comments by descriptor path', () => {
      const index = DescriptorIndex.build(
        descriptorSet(
          protoFile('a.proto', 'a', {
            messageType: [message('M', [scalarField('x', 1, 'TYPE_INT32')])],
            sourceCodeInfo: {
              location: [
                { path: [4, 0], leadingComments: ' A message.\n' },
                { path: [4, 0, 2, 0], trailingComments: ' The x.\n' }
              ]
            }
          })
        )
      );

      const decl = index.getMessage('a.M');
      expect(decl?.comments).toEqual({ leading: ' A message.\n', trailing: undefined });
      expect(decl?.fields[0]?.comments.trailing).toBe(' The x.\n');
    });
  });

  describe('visibleFiles', () => {
    it('should follow public imports transitively', () => {
      const index = DescriptorIndex.build(
        descriptorSet(
          protoFile('base.proto', 'base'),
          protoFile('reexport.proto', 'mid', { dependency: ['base.proto'], publicDependency: [0] }),
          protoFile('private.proto', 'mid2', { dependency: ['base.proto'] }),
          protoFile('main.proto', 'main', { dependency: ['reexport.proto', 'private.proto'] })
        )
      );

      const main = index.getFile('main.proto');
      expect(main && [...index.visibleFiles(main)].sort()).toEqual([
        'base.proto',
        'main.proto',
        'private.proto',
        'reexport.proto'
      ]);

      const other = DescriptorIndex.build(
        descriptorSet(
          protoFile('base.proto', 'base'),
          protoFile('private.proto', 'mid2', { dependency: ['base.proto'] }),
          protoFile('main.proto', 'main', { dependency: ['private.proto'] })
        )
      );
      const otherMain = other.getFile('main.proto');
      expect(otherMain && [...other.visibleFiles(otherMain)].sort()).toEqual(['main.proto', 'private.proto']);
    });
  });

  describe('freeze', () => {
    it('should refuse indirection changes once frozen', () => {
      const index = DescriptorIndex.build(
        descriptorSet(protoFile('a.proto', 'a', { messageType: [message('M', [messageField('m', 1, 'M')])] }))
      );
      const [field] = index.getFields();
      expect(field).toBeDefined();
      if (!field) {
        return;
      }

      index.markIndirect(field);
      expect(field.needsIndirection).toBe(true);

      index.freeze();
      expect(index.isFrozen()).toBe(true);
      expect(() => index.markIndirect(field)).toThrow('index is frozen');
    });
  });
});
