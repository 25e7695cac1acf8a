/**
 * Error taxonomy for descriptor compilation
 * Every error is fatal: the generator aborts and returns no output units.
 */

export type CodegenErrorCode =
  | 'DUPLICATE_NAME'
  | 'UNRESOLVED_REFERENCE'
  | 'INVALID_MAP_KEY'
  | 'UNBROKEN_CYCLE'
  | 'CONFIGURATION'
  | 'DESCRIPTOR_DECODE';

export interface ErrorLocation {
  /** Fully-qualified name of the entity the error is about */
  fullName?: string;
  /** Schema file the entity was declared in */
  file?: string;
}

export class CodegenError extends Error {
  readonly code: CodegenErrorCode;
  readonly fullName?: string;
  readonly file?: string;

  constructor(code: CodegenErrorCode, message: string, location: ErrorLocation = {}) {
    super(CodegenError.locate(message, location));
    this.name = new.target.name;
    this.code = code;
    this.fullName = location.fullName;
    this.file = location.file;
  }

  private static locate(message: string, location: ErrorLocation): string {
    return location.file ? `${message} (in ${location.file})` : message;
  }
}

/**
 * Two entities (or two files) claim the same name
 */
export class DuplicateNameError extends CodegenError {
  readonly otherFile?: string;

  constructor(fullName: string, file: string | undefined, otherFile?: string) {
    const where = otherFile && otherFile !== file ? `, first declared in ${otherFile}` : '';
    super('DUPLICATE_NAME', `Duplicate name "${fullName}"${where}`, { fullName, file });
    this.otherFile = otherFile;
  }
}

export class UnresolvedReferenceError extends CodegenError {
  readonly reference: string;
  readonly context: string;

  constructor(reference: string, context: string, file: string | undefined, detail?: string) {
    const suffix = detail ? `: ${detail}` : '';
    super(
      'UNRESOLVED_REFERENCE',
      `Cannot resolve type "${reference}" referenced from "${context}"${suffix}`,
      { fullName: context, file }
    );
    this.reference = reference;
    this.context = context;
  }
}

export class InvalidMapKeyError extends CodegenError {
  readonly keyType: string;

  constructor(fieldName: string, keyType: string, file: string | undefined) {
    super(
      'INVALID_MAP_KEY',
      `Map field "${fieldName}" has key type "${keyType}"; map keys must be integral, bool or string`,
      { fullName: fieldName, file }
    );
    this.keyType = keyType;
  }
}

export class UnbrokenCycleError extends CodegenError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super('UNBROKEN_CYCLE', `Containment cycle left unbroken: ${cycle.join(' -> ')}`, {
      fullName: cycle[0]
    });
    this.cycle = cycle;
  }
}

export class ConfigurationError extends CodegenError {
  readonly option: string;

  constructor(option: string, message: string) {
    super('CONFIGURATION', `Invalid option "${option}": ${message}`);
    this.option = option;
  }
}

export class DescriptorDecodeError extends CodegenError {
  constructor(message: string, file?: string) {
    super('DESCRIPTOR_DECODE', `Cannot decode descriptor set: ${message}`, { file });
  }
}
