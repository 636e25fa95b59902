import { UnknownInjectorKindError } from './errors';
import { isInjectorKindName, KIND_DEFINITIONS } from './kinds';
import { RegistrationEngine } from './registration-engine';
import { RegistrationEngineOptions } from './types';

/**
 * Build an engine for a known configuration kind.
 */
export function createInjector(
  kind: string,
  options: RegistrationEngineOptions = {}
): RegistrationEngine {
  if (!isInjectorKindName(kind)) {
    throw new UnknownInjectorKindError(kind);
  }
  return new RegistrationEngine(KIND_DEFINITIONS[kind], options);
}
