/**
 * Reference Graph and Cycle Breaker
 * Builds the message containment graph (singular message fields stored by value) and
 * marks the fields that close a cycle so generated types stay finite.
 */

import { FieldDecl, MessageDecl } from '../core/schema';
import { ResolvedSchema } from '../core/resolver';
import { UnbrokenCycleError } from '../core/errors';
import { ResolvedOptions } from '../utils/options';
import { logger } from '../utils/logger';

export interface ContainmentEdge {
  from: string;
  to: string;
  field: FieldDecl;
}

export interface ContainmentGraph {
  /** Message names in index order */
  nodes: string[];
  /** Outgoing edges per message, in field declaration order */
  edges: Map<string, ContainmentEdge[]>;
}

export interface CycleBreakResult {
  /** Fields boxed because the options asked for it */
  configured: FieldDecl[];
  /** Fields boxed because they close a containment cycle */
  discovered: FieldDecl[];
}

/**
 * Target message of a field that embeds another message by value, if any.
 * Repeated and map fields hold their elements indirectly and never contain.
 */
export function containedMessage(schema: ResolvedSchema, field: FieldDecl): MessageDecl | undefined {
  if (field.cardinality !== 'singular') {
    return undefined;
  }
  const resolved = schema.fieldTypes.get(field);
  return resolved?.kind === 'message' ? resolved.decl : undefined;
}

export function buildContainmentGraph(
  schema: ResolvedSchema,
  skip: (field: FieldDecl) => boolean = () => false
): ContainmentGraph {
  const nodes: string[] = [];
  const edges = new Map<string, ContainmentEdge[]>();

  for (const message of schema.index.getMessages()) {
    nodes.push(message.fullName);
    const outgoing: ContainmentEdge[] = [];
    for (const field of message.fields) {
      const target = containedMessage(schema, field);
      if (target && !skip(field)) {
        outgoing.push({ from: message.fullName, to: target.fullName, field });
      }
    }
    edges.set(message.fullName, outgoing);
  }

  return { nodes, edges };
}

enum VisitState {
  OnStack = 1,
  Done = 2
}

/**
 * Depth-first search from every node in order; returns each edge that reaches a node
 * still on the traversal stack (self-loops included), with the stack at that moment.
 */
export function findBackEdges(graph: ContainmentGraph): { edge: ContainmentEdge; stack: string[] }[] {
  const state = new Map<string, VisitState>();
  const stack: string[] = [];
  const backEdges: { edge: ContainmentEdge; stack: string[] }[] = [];

  const visit = (node: string): void => {
    state.set(node, VisitState.OnStack);
    stack.push(node);
    for (const edge of graph.edges.get(node) ?? []) {
      const targetState = state.get(edge.to);
      if (targetState === VisitState.OnStack) {
        backEdges.push({ edge, stack: [...stack] });
      } else if (targetState === undefined) {
        visit(edge.to);
      }
    }
    stack.pop();
    state.set(node, VisitState.Done);
  };

  for (const node of graph.nodes) {
    if (!state.has(node)) {
      visit(node);
    }
  }

  return backEdges;
}

export class CycleBreaker {
  constructor(
    private readonly schema: ResolvedSchema,
    private readonly options: ResolvedOptions
  ) {}

  /**
   * Mark indirection flags, verify no cycle is left, then freeze the index
   */
  run(): CycleBreakResult {
    const index = this.schema.index;
    const configured: FieldDecl[] = [];

    for (const field of index.getFields()) {
      if (!this.options.boxed.has(field.fullName)) {
        continue;
      }
      if (containedMessage(this.schema, field)) {
        index.markIndirect(field);
        configured.push(field);
      } else if (field.cardinality !== 'singular') {
        logger.verbose(`Ignoring boxed option for ${field.fullName}: ${field.cardinality} fields are already indirect`);
      }
    }

    const graph = buildContainmentGraph(this.schema, field => field.needsIndirection);
    const discovered: FieldDecl[] = [];
    for (const { edge } of findBackEdges(graph)) {
      if (!edge.field.needsIndirection) {
        index.markIndirect(edge.field);
        discovered.push(edge.field);
        logger.verboseWithContext('Boxed field closing a containment cycle', {
          stage: 'cycles',
          fullName: edge.field.fullName,
          file: edge.field.message.file.name
        });
      }
    }

    this.verify();
    index.freeze();

    logger.debug(`Cycle breaker boxed ${configured.length} configured and ${discovered.length} cyclic field(s)`);
    return { configured, discovered };
  }

  private verify(): void {
    const residual = buildContainmentGraph(this.schema, field => field.needsIndirection);
    const [first] = findBackEdges(residual);
    if (first) {
      const start = first.stack.indexOf(first.edge.to);
      throw new UnbrokenCycleError([...first.stack.slice(start), first.edge.to]);
    }
  }
}
