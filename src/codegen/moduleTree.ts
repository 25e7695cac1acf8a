/**
 * Module Tree Builder
 * Groups generated declarations into one unit per package and arranges the units in
 * a tree keyed by package segments. Nested declarations are hoisted to their package's
 * flat declaration list.
 */

import { EnumDecl, FileEntry, MessageDecl, ServiceDecl, qualify } from '../core/schema';
import { ResolvedSchema } from '../core/resolver';
import { ConfigurationError, DuplicateNameError } from '../core/errors';
import { CODEGEN, OUTPUT } from '../utils/constants';
import { ResolvedOptions } from '../utils/options';
import { contentHash } from '../utils/cache';
import { logger } from '../utils/logger';
import { groupBy } from '../utils/utils';
import { escapeReservedWord } from '../shared/namingUtils';
import { trimTrailingWhitespace } from '../shared/textUtils';
import { ImportTracker, declaredIdentifiers, renderDeclaration, unitBaseName } from './printer';
import { ServiceHookDispatcher } from './serviceDispatcher';
import { Declaration } from './typeExpr';
import { TypeMapper } from './typeMapper';

export interface OutputUnit {
  package: string;
  fileName: string;
  /** Schema files that contributed to the unit, in set order */
  sourceFiles: string[];
  declarations: Declaration[];
  serviceFragments: string[];
  content: string;
  /** Fingerprint of `content` */
  hash: string;
}

export interface ModuleTreeNode {
  /** Last package segment; empty for the root */
  segment: string;
  package: string;
  unit?: OutputUnit;
  children: ModuleTreeNode[];
}

export interface IncludeUnit {
  fileName: string;
  content: string;
  hash: string;
}

export interface CompilationResult {
  units: OutputUnit[];
  tree: ModuleTreeNode;
  include?: IncludeUnit;
}

interface Placed {
  declaration: Declaration;
  file: FileEntry;
}

export class ModuleTreeBuilder {
  constructor(
    private readonly schema: ResolvedSchema,
    private readonly mapper: TypeMapper,
    private readonly options: ResolvedOptions,
    private readonly dispatcher: ServiceHookDispatcher
  ) {}

  build(): CompilationResult {
    const packages = groupBy(this.schema.index.getFiles(), file => file.package);
    const units: OutputUnit[] = [];

    for (const [pkg, files] of packages) {
      const unit = this.buildUnit(pkg, files);
      if (unit) {
        units.push(unit);
      } else {
        logger.verbose(`Package "${pkg}" has nothing to generate`);
      }
    }

    const tree = buildTree(units);
    const include = this.options.includeFile ? this.buildInclude(this.options.includeFile, units, tree) : undefined;
    logger.debug(`Built ${units.length} output unit(s)`);
    return { units, tree, include };
  }

  /**
   * Declarations of one package: per file, each top-level message with its oneof
   * unions, nested messages and nested enums, then the file's top-level enums
   */
  collectDeclarations(files: readonly FileEntry[]): Placed[] {
    const placed: Placed[] = [];

    const addEnum = (decl: EnumDecl, file: FileEntry): void => {
      if (this.mapper.isGenerated(decl)) {
        placed.push({ declaration: this.mapper.mapEnum(decl), file });
      }
    };

    const addMessage = (message: MessageDecl, file: FileEntry): void => {
      if (this.mapper.isGenerated(message)) {
        for (const declaration of this.mapper.mapMessage(message)) {
          placed.push({ declaration, file });
        }
      }
      for (const nested of message.nestedMessages) {
        addMessage(nested, file);
      }
      for (const nested of message.nestedEnums) {
        addEnum(nested, file);
      }
    };

    for (const file of files) {
      for (const message of file.messages) {
        addMessage(message, file);
      }
      for (const decl of file.enums) {
        addEnum(decl, file);
      }
    }
    return placed;
  }

  private buildUnit(pkg: string, files: readonly FileEntry[]): OutputUnit | undefined {
    const placed = this.collectDeclarations(files);
    const identifiers = checkIdentifiers(pkg, placed);
    const imports = new ImportTracker(pkg, this.options.importExtension, identifiers);

    const blocks = placed.map(({ declaration }) => renderDeclaration(declaration, imports).join('\n'));

    const services: ServiceDecl[] = files.flatMap(file => file.services);
    const serviceFragments: string[] = [];
    for (const service of services) {
      const fragment = this.dispatcher.dispatch(service, imports);
      if (fragment !== undefined) {
        serviceFragments.push(fragment);
      }
    }

    if (blocks.length === 0 && serviceFragments.length === 0) {
      return undefined;
    }

    const sourceFiles = files.map(file => file.name);
    const header = [OUTPUT.BANNER, `// source: ${sourceFiles.join(', ')}`];
    const importLines = imports.render();
    const sections = [header.join('\n')];
    if (importLines.length > 0) {
      sections.push(importLines.join('\n'));
    }
    sections.push(...blocks, ...serviceFragments);
    const content = `${trimTrailingWhitespace(sections.join('\n\n'))}\n`;

    return {
      package: pkg,
      fileName: `${unitBaseName(pkg)}${OUTPUT.EXTENSION}`,
      sourceFiles,
      declarations: placed.map(entry => entry.declaration),
      serviceFragments,
      content,
      hash: contentHash(content)
    };
  }

  /**
   * Unit re-exporting every package unit through namespaces that follow the package tree
   */
  private buildInclude(fileName: string, units: readonly OutputUnit[], tree: ModuleTreeNode): IncludeUnit {
    const clash = units.find(unit => unit.fileName === fileName);
    if (clash) {
      throw new ConfigurationError('includeFile', `"${fileName}" is also the unit of package "${clash.package}"`);
    }

    const rootNames = new Set<string>(tree.children.map(child => escapeReservedWord(child.segment)));
    for (const declaration of tree.unit?.declarations ?? []) {
      for (const identifier of declaredIdentifiers(declaration)) {
        rootNames.add(identifier);
      }
    }
    const imports = new ImportTracker('', this.options.importExtension, rootNames);

    const body = renderNamespaceBody(tree, imports, '');
    const content = [OUTPUT.BANNER, '', ...imports.render(false), '', ...body].join('\n') + '\n';
    return { fileName, content, hash: contentHash(content) };
  }
}

/**
 * Reject two declarations that hoist to the same identifier within a unit
 */
function checkIdentifiers(pkg: string, placed: readonly Placed[]): Set<string> {
  const owners = new Map<string, Placed>();
  for (const entry of placed) {
    for (const identifier of declaredIdentifiers(entry.declaration)) {
      const owner = owners.get(identifier);
      if (owner) {
        logger.debug(`${entry.declaration.fullName} and ${owner.declaration.fullName} both generate ${identifier}`);
        throw new DuplicateNameError(qualify(pkg, identifier), entry.file.name, owner.file.name);
      }
      owners.set(identifier, entry);
    }
  }
  return new Set(owners.keys());
}

export function buildTree(units: readonly OutputUnit[]): ModuleTreeNode {
  const root: ModuleTreeNode = { segment: '', package: '', children: [] };
  for (const unit of units) {
    if (!unit.package) {
      root.unit = unit;
      continue;
    }
    let node = root;
    for (const segment of unit.package.split('.')) {
      const pkg = qualify(node.package, segment);
      let child = node.children.find(candidate => candidate.segment === segment);
      if (!child) {
        child = { segment, package: pkg, children: [] };
        node.children.push(child);
      }
      node = child;
    }
    node.unit = unit;
  }
  return root;
}

/**
 * Find the node for `pkg`, if any unit lives at or below it
 */
export function findNode(tree: ModuleTreeNode, pkg: string): ModuleTreeNode | undefined {
  if (!pkg) {
    return tree;
  }
  let node: ModuleTreeNode | undefined = tree;
  for (const segment of pkg.split('.')) {
    node = node.children.find(child => child.segment === segment);
    if (!node) {
      return undefined;
    }
  }
  return node;
}

function renderNamespaceBody(node: ModuleTreeNode, imports: ImportTracker, indent: string): string[] {
  const lines: string[] = [];
  if (node.unit) {
    const alias = imports.packageAlias(node.unit.package);
    for (const declaration of node.unit.declarations) {
      for (const identifier of declaredIdentifiers(declaration)) {
        lines.push(`${indent}export import ${identifier} = ${alias}.${identifier};`);
      }
    }
  }
  for (const child of node.children) {
    lines.push(`${indent}export namespace ${escapeReservedWord(child.segment)} {`);
    lines.push(...renderNamespaceBody(child, imports, `${indent}${CODEGEN.INDENT}`));
    lines.push(`${indent}}`);
  }
  return lines;
}
