/**
 * Tests for output unit assembly and the package tree
 */

import { FileDescriptorSet } from '../../core/descriptor';
import { ConfigurationError, DuplicateNameError } from '../../core/errors';
import { CodegenOptions, resolveOptions } from '../../utils/options';
import { CompilationResult, ModuleTreeBuilder, OutputUnit, buildTree, findNode } from '../moduleTree';
import { ServiceGenerator, ServiceHookDispatcher } from '../serviceDispatcher';
import { TypeMapper } from '../typeMapper';
import {
  descriptorSet,
  enumType,
  message,
  messageField,
  method,
  prepareSchema,
  protoFile,
  scalarField
} from '../../__tests__/testUtils';

function build(set: FileDescriptorSet, options: CodegenOptions = {}, generator?: ServiceGenerator): CompilationResult {
  const schema = prepareSchema(set, options);
  const resolved = resolveOptions(options);
  const mapper = new TypeMapper(schema, resolved);
  const dispatcher = new ServiceHookDispatcher(schema, mapper, resolved, generator);
  return new ModuleTreeBuilder(schema, mapper, resolved, dispatcher).build();
}

function unitOf(result: CompilationResult, pkg: string): OutputUnit {
  const unit = result.units.find(candidate => candidate.package === pkg);
  if (!unit) {
    throw new Error(`no unit for "${pkg}"`);
  }
  return unit;
}

const shopSet = descriptorSet(
  protoFile('acme/common.proto', 'acme.common', {
    messageType: [message('Money', [scalarField('cents', 1, 'TYPE_INT64')])]
  }),
  protoFile('shop.proto', 'shop', {
    dependency: ['acme/common.proto'],
    messageType: [
      message('Order', [messageField('total', 1, '.acme.common.Money'), messageField('lines', 2, 'Line')], {
        nestedType: [message('Line', [scalarField('sku', 1, 'TYPE_STRING')])],
        enumType: [enumType('Status', [['STATUS_OPEN', 0]])]
      })
    ],
    enumType: [enumType('Channel', [['CHANNEL_WEB', 0]])]
  })
);

describe('ModuleTreeBuilder', () => {
  it('should render a unit with its banner and declarations', () => {
    const result = build(
      descriptorSet(
        protoFile('shapes.proto', 'shapes', {
          messageType: [
            message('Tree', [
              messageField('left', 1, 'Tree'),
              messageField('right', 2, 'Tree'),
              scalarField('value', 3, 'TYPE_INT32')
            ])
          ]
        })
      )
    );

    const unit = unitOf(result, 'shapes');
    expect(unit.fileName).toBe('shapes.ts');
    expect(unit.content).toBe(
      [
        '// Code generated by proto-typegen. DO NOT EDIT.',
        '// source: shapes.proto',
        '',
        'export interface Tree {',
        '  left?: Tree | undefined;',
        '  right?: Tree | undefined;',
        '  /** @default 0 */',
        '  value: number;',
        '}',
        ''
      ].join('\n')
    );
  });

  it('should hoist nested declarations in file order', () => {
    const unit = unitOf(build(shopSet), 'shop');
    expect(unit.declarations.map(decl => decl.identifier)).toEqual(['Order', 'Order_Line', 'Order_Status', 'Channel']);
  });

  it('should import other packages by alias', () => {
    const result = build(shopSet);
    const lines = unitOf(result, 'shop').content.split('\n');

    expect(lines).toContain("import type * as acme_common from './acme.common';");
    expect(lines).toContain('  total: acme_common.Money;');
    expect(lines).toContain('  lines: Order_Line;');
    expect(unitOf(result, 'acme.common').content).not.toContain('import');
  });

  it('should append the configured import extension', () => {
    const lines = unitOf(build(shopSet, { importExtension: '.js' }), 'shop').content.split('\n');
    expect(lines).toContain("import type * as acme_common from './acme.common.js';");
  });

  it('should produce identical output for identical input', () => {
    const first = build(shopSet);
    const second = build(shopSet);
    expect(second.units.map(unit => unit.content)).toEqual(first.units.map(unit => unit.content));
    expect(second.units.map(unit => unit.hash)).toEqual(first.units.map(unit => unit.hash));
  });

  it('should merge files of one package into one unit', () => {
    const result = build(
      descriptorSet(
        protoFile('a1.proto', 'a', { messageType: [message('One')] }),
        protoFile('b.proto', 'b', { messageType: [message('Other')] }),
        protoFile('a2.proto', 'a', { messageType: [message('Two')] })
      )
    );

    expect(result.units.map(unit => unit.fileName)).toEqual(['a.ts', 'b.ts']);
    const unit = unitOf(result, 'a');
    expect(unit.sourceFiles).toEqual(['a1.proto', 'a2.proto']);
    expect(unit.content.split('\n')[1]).toBe('// source: a1.proto, a2.proto');
    expect(unit.declarations.map(decl => decl.identifier)).toEqual(['One', 'Two']);
  });

  it('should name the unit of the empty package', () => {
    const result = build(descriptorSet(protoFile('loose.proto', undefined, { messageType: [message('Loose')] })));
    expect(result.units.map(unit => unit.fileName)).toEqual(['_.ts']);
    expect(result.tree.unit?.package).toBe('');
  });

  it('should skip packages with nothing to generate', () => {
    const result = build(
      descriptorSet(
        protoFile('google/protobuf/timestamp.proto', 'google.protobuf', {
          messageType: [message('Timestamp', [scalarField('seconds', 1, 'TYPE_INT64'), scalarField('nanos', 2, 'TYPE_INT32')])]
        }),
        protoFile('empty.proto', 'empty'),
        protoFile('event.proto', 'events', {
          dependency: ['google/protobuf/timestamp.proto'],
          messageType: [message('Event', [messageField('at', 1, '.google.protobuf.Timestamp')])]
        })
      )
    );

    expect(result.units.map(unit => unit.package)).toEqual(['events']);
    expect(unitOf(result, 'events').content.split('\n')).toContain('  at: Date;');
  });

  it('should escape declarations named like globals the output uses', () => {
    const result = build(
      descriptorSet(
        protoFile('google/protobuf/timestamp.proto', 'google.protobuf', {
          messageType: [message('Timestamp', [scalarField('seconds', 1, 'TYPE_INT64'), scalarField('nanos', 2, 'TYPE_INT32')])]
        }),
        protoFile('cal.proto', 'cal', {
          dependency: ['google/protobuf/timestamp.proto'],
          messageType: [
            message('Date'),
            message('Event', [messageField('at', 1, '.google.protobuf.Timestamp'), messageField('day', 2, 'Date')])
          ]
        })
      )
    );

    const lines = unitOf(result, 'cal').content.split('\n');
    expect(lines).toContain('export interface Date_ {}');
    expect(lines).toContain('  at: Date;');
    expect(lines).toContain('  day: Date_;');
  });

  it('should reject declarations that hoist to the same identifier', () => {
    const set = descriptorSet(
      protoFile('a.proto', 'a', {
        messageType: [message('Outer', [], { nestedType: [message('Inner')] }), message('Outer_Inner')]
      })
    );

    expect(() => build(set)).toThrow(DuplicateNameError);
    expect(() => build(set)).toThrow('Duplicate name "a.Outer_Inner" (in a.proto)');
  });

  it('should reject declarations that clash with enum tables', () => {
    const set = descriptorSet(
      protoFile('a1.proto', 'a', { enumType: [enumType('Status', [['STATUS_OK', 0]])] }),
      protoFile('a2.proto', 'a', { messageType: [message('Status_name')] })
    );

    expect(() => build(set)).toThrow('Duplicate name "a.Status_name", first declared in a1.proto (in a2.proto)');
  });

  it('should append service fragments after declarations', () => {
    const set = descriptorSet(
      protoFile('other.proto', 'other', { messageType: [message('Req')] }),
      protoFile('svc.proto', 'svc', {
        dependency: ['other.proto'],
        messageType: [message('Res')],
        service: [{ name: 'Api', method: [method('Get', '.other.Req', 'Res')] }]
      })
    );
    const generator: ServiceGenerator = service =>
      `export interface ${service.name}Client {\n  ${service.methods.map(m => `${m.name}(request: ${m.requestType}): Promise<${m.responseType}>;`).join('\n  ')}\n}\n\n`;

    const unit = unitOf(build(set, {}, generator), 'svc');
    expect(unit.serviceFragments).toEqual(['export interface ApiClient {\n  get(request: other.Req): Promise<Res>;\n}']);
    expect(unit.content).toBe(
      [
        '// Code generated by proto-typegen. DO NOT EDIT.',
        '// source: svc.proto',
        '',
        "import type * as other from './other';",
        '',
        'export interface Res {}',
        '',
        'export interface ApiClient {',
        '  get(request: other.Req): Promise<Res>;',
        '}',
        ''
      ].join('\n')
    );
  });

  it('should not import types only a dropped fragment used', () => {
    const set = descriptorSet(
      protoFile('other.proto', 'other', { messageType: [message('Req')] }),
      protoFile('svc.proto', 'svc', {
        dependency: ['other.proto'],
        messageType: [message('Res')],
        service: [{ name: 'Api', method: [method('Get', '.other.Req', 'Res')] }]
      })
    );

    const unit = unitOf(build(set, {}, () => '   '), 'svc');
    expect(unit.serviceFragments).toEqual([]);
    expect(unit.content).not.toContain('import');
  });

  describe('includeFile', () => {
    const set = descriptorSet(
      protoFile('root.proto', undefined, { messageType: [message('R')] }),
      protoFile('a.proto', 'a', { messageType: [message('A')] }),
      protoFile('b.proto', 'a.b', { enumType: [enumType('Kind', [['KIND_X', 0]])] })
    );

    it('should re-export every unit through nested namespaces', () => {
      const result = build(set, { includeFile: 'index.ts' });
      expect(result.include?.fileName).toBe('index.ts');
      expect(result.include?.content).toBe(
        [
          '// Code generated by proto-typegen. DO NOT EDIT.',
          '',
          "import * as _ from './_';",
          "import * as a_2 from './a';",
          "import * as a_b from './a.b';",
          '',
          'export import R = _.R;',
          'export namespace a {',
          '  export import A = a_2.A;',
          '  export namespace b {',
          '    export import Kind = a_b.Kind;',
          '    export import Kind_name = a_b.Kind_name;',
          '    export import Kind_value = a_b.Kind_value;',
          '  }',
          '}',
          ''
        ].join('\n')
      );
    });

    it('should reject an include file named like a unit', () => {
      expect(() => build(set, { includeFile: 'a.ts' })).toThrow(ConfigurationError);
      expect(() => build(set, { includeFile: 'a.ts' })).toThrow(
        'Invalid option "includeFile": "a.ts" is also the unit of package "a"'
      );
    });

    it('should be absent unless configured', () => {
      expect(build(set).include).toBeUndefined();
    });
  });
});

describe('buildTree', () => {
  const unit = (pkg: string): OutputUnit => ({
    package: pkg,
    fileName: `${pkg || '_'}.ts`,
    sourceFiles: [],
    declarations: [],
    serviceFragments: [],
    content: '',
    hash: '0'
  });

  it('should nest units by package segment', () => {
    const tree = buildTree([unit('a.b.c'), unit('a'), unit('x')]);

    expect(tree.children.map(child => child.segment)).toEqual(['a', 'x']);
    expect(findNode(tree, 'a')?.unit?.fileName).toBe('a.ts');
    expect(findNode(tree, 'a.b')?.unit).toBeUndefined();
    expect(findNode(tree, 'a.b')?.package).toBe('a.b');
    expect(findNode(tree, 'a.b.c')?.unit?.fileName).toBe('a.b.c.ts');
    expect(findNode(tree, 'a.z')).toBeUndefined();
    expect(findNode(tree, '')).toBe(tree);
  });
});
