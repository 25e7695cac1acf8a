export { CodeGenerator, compile } from './generator';
export * from './core/descriptor';
export * from './core/errors';
export { DescriptorIndex } from './core/descriptorIndex';
export { ScopeResolver, ResolvedSchema, ResolvedMethod, enclosingScopes, resolveSchema } from './core/resolver';
export * from './core/schema';
export { CycleBreaker, CycleBreakResult, buildContainmentGraph, findBackEdges } from './codegen/cycleBreaker';
export { TypeMapper } from './codegen/typeMapper';
export * from './codegen/typeExpr';
export { ImportTracker, renderDeclaration, renderType } from './codegen/printer';
export {
  CompilationResult,
  IncludeUnit,
  ModuleTreeBuilder,
  ModuleTreeNode,
  OutputUnit,
  buildTree,
  findNode
} from './codegen/moduleTree';
export {
  MethodDescription,
  ServiceDescription,
  ServiceGenerator,
  ServiceHookDispatcher
} from './codegen/serviceDispatcher';
export { decodeDescriptorSet, loadDescriptorSetFile, parseDescriptorSet } from './services/descriptorLoader';
export {
  AttributeRule,
  BytesRepresentation,
  CodegenOptions,
  FieldSelector,
  ImportExtension,
  LongRepresentation,
  ResolvedOptions,
  TypeSelector,
  defaultOptions,
  loadOptionsFile,
  parseOptions,
  resolveOptions
} from './utils/options';
export { ExternPathRule } from './utils/pathMatcher';
export { LogLevel, LogSink, Logger, logger } from './utils/logger';
