import { InjectionType } from './types';

export class InjectorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InjectorError';
  }
}

export class StorageError extends InjectorError {
  constructor(
    public readonly filePath: string,
    public readonly operation: 'read' | 'write',
    cause: unknown
  ) {
    super(
      `Failed to ${operation} ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'StorageError';
  }
}

export type PatternRole = InjectionType | 'removal';

/**
 * A substitution matched nothing, so the text would be written back unchanged.
 */
export class PatternMismatchError extends InjectorError {
  constructor(
    public readonly kind: string,
    public readonly role: PatternRole,
    public readonly entry: string
  ) {
    super(`The ${role} pattern of the ${kind} configuration did not match while writing ${entry}`);
    this.name = 'PatternMismatchError';
  }
}

export class UnsupportedInjectionTypeError extends InjectorError {
  constructor(
    public readonly kind: string,
    public readonly type: InjectionType
  ) {
    super(`The ${kind} configuration does not register entries of type ${type}`);
    this.name = 'UnsupportedInjectionTypeError';
  }
}

export class UnknownInjectorKindError extends InjectorError {
  constructor(public readonly kind: string) {
    super(`Unknown configuration kind: ${kind}`);
    this.name = 'UnknownInjectorKindError';
  }
}
