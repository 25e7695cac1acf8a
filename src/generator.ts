/**
 * Descriptor compiler entry point
 * Runs the pipeline stages in order: index, resolve, break cycles, map types, build
 * the module tree. Any error aborts the run and no units are returned.
 */

import { FileDescriptorSet } from './core/descriptor';
import { DescriptorIndex } from './core/descriptorIndex';
import { CodegenError } from './core/errors';
import { resolveSchema } from './core/resolver';
import { CycleBreaker } from './codegen/cycleBreaker';
import { CompilationResult, ModuleTreeBuilder } from './codegen/moduleTree';
import { ServiceGenerator, ServiceHookDispatcher } from './codegen/serviceDispatcher';
import { TypeMapper } from './codegen/typeMapper';
import { LOG_LEVEL_MAP, LogContext, logger } from './utils/logger';
import { CodegenOptions, ResolvedOptions, resolveOptions } from './utils/options';

function errorContext(stage: string, error: unknown): LogContext & { error: unknown } {
  if (error instanceof CodegenError) {
    return { stage, error, fullName: error.fullName, file: error.file };
  }
  return { stage, error };
}

export class CodeGenerator {
  private readonly options: ResolvedOptions;

  /**
   * @throws ConfigurationError when the options are malformed
   */
  constructor(options: CodegenOptions = {}, private readonly serviceGenerator?: ServiceGenerator) {
    try {
      this.options = resolveOptions(options);
    } catch (error) {
      logger.errorWithContext('Invalid code generation options', errorContext('options', error));
      throw error;
    }
  }

  /**
   * Run every stage over `set`. A configured `logLevel` applies to this call only.
   */
  compile(set: FileDescriptorSet): CompilationResult {
    const previousLevel = logger.getLevel();
    if (this.options.logLevel) {
      logger.setLevel(LOG_LEVEL_MAP[this.options.logLevel]);
    }
    try {
      return this.runStages(set);
    } finally {
      logger.setLevel(previousLevel);
    }
  }

  private runStages(set: FileDescriptorSet): CompilationResult {
    const startTime = Date.now();
    let stage = 'index';
    try {
      const index = DescriptorIndex.build(set);

      stage = 'resolve';
      const schema = resolveSchema(index);

      stage = 'cycles';
      const boxed = new CycleBreaker(schema, this.options).run();

      stage = 'map';
      const mapper = new TypeMapper(schema, this.options);
      const dispatcher = new ServiceHookDispatcher(schema, mapper, this.options, this.serviceGenerator);

      stage = 'module-tree';
      const result = new ModuleTreeBuilder(schema, mapper, this.options, dispatcher).build();

      logger.info(
        `Compiled ${index.getFiles().length} file(s) into ${result.units.length} unit(s); ` +
          `${boxed.configured.length + boxed.discovered.length} field(s) stored indirectly`
      );
      logger.verboseWithContext('Compilation finished', { stage: 'compile', duration: Date.now() - startTime });
      return result;
    } catch (error) {
      logger.errorWithContext('Descriptor compilation failed', errorContext(stage, error));
      throw error;
    }
  }
}

/**
 * Compile a descriptor set into one TypeScript unit per package
 */
export function compile(
  set: FileDescriptorSet,
  options: CodegenOptions = {},
  serviceGenerator?: ServiceGenerator
): CompilationResult {
  return new CodeGenerator(options, serviceGenerator).compile(set);
}
