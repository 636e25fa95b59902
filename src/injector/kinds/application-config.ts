import { InjectorKindDefinition } from '../types';
import { createListPatterns, LIST_INJECTION_TYPES } from './list-patterns';

export const MODULES_KEY_OPENER = String.raw`'modules'\s*=>\s*(?:array\s*\(|\[)`;

/**
 * `config/application.config.php`: modules listed under the `modules` key.
 */
export const applicationConfigKind: InjectorKindDefinition = {
  name: 'application',
  configFile: 'config/application.config.php',
  allowedTypes: LIST_INJECTION_TYPES,
  ...createListPatterns(MODULES_KEY_OPENER),
  discoveryPattern: { pattern: MODULES_KEY_OPENER },
};
