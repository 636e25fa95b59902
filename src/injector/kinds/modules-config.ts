import { InjectorKindDefinition } from '../types';
import { createListPatterns, LIST_INJECTION_TYPES } from './list-patterns';

const RETURN_OPENER = String.raw`return\s+(?:array\s*\(|\[)`;

/**
 * `config/modules.config.php`: the file returns the module list itself.
 */
export const modulesConfigKind: InjectorKindDefinition = {
  name: 'modules',
  configFile: 'config/modules.config.php',
  allowedTypes: LIST_INJECTION_TYPES,
  ...createListPatterns(RETURN_OPENER),
  discoveryPattern: { pattern: RETURN_OPENER },
};
