import { InjectorKindDefinition } from '../types';
import { MODULES_KEY_OPENER } from './application-config';
import { createListPatterns, LIST_INJECTION_TYPES } from './list-patterns';

const developmentPatterns = createListPatterns(MODULES_KEY_OPENER);

// Development-mode configuration shares the application format.

/** Distributed template, committed to the repository */
export const developmentConfigKind: InjectorKindDefinition = {
  name: 'development',
  configFile: 'config/development.config.php.dist',
  allowedTypes: LIST_INJECTION_TYPES,
  ...developmentPatterns,
  discoveryPattern: { pattern: MODULES_KEY_OPENER },
};

/** Working copy created when development mode is enabled */
export const developmentWorkConfigKind: InjectorKindDefinition = {
  ...developmentConfigKind,
  name: 'development-work',
  configFile: 'config/development.config.php',
};
