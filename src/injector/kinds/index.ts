import { InjectorKindDefinition, InjectorKindName } from '../types';
import { applicationConfigKind } from './application-config';
import { configAggregatorKind } from './config-aggregator';
import { developmentConfigKind, developmentWorkConfigKind } from './development-config';
import { modulesConfigKind } from './modules-config';

export { applicationConfigKind, MODULES_KEY_OPENER } from './application-config';
export { configAggregatorKind, normalizeProviderClass } from './config-aggregator';
export { developmentConfigKind, developmentWorkConfigKind } from './development-config';
export { modulesConfigKind } from './modules-config';
export { createListPatterns, DEFAULT_CLEAN_UP_PATTERN, LIST_INJECTION_TYPES } from './list-patterns';

/**
 * Known configuration kinds, in discovery order.
 */
export const KIND_DEFINITIONS: Record<InjectorKindName, InjectorKindDefinition> = {
  application: applicationConfigKind,
  modules: modulesConfigKind,
  development: developmentConfigKind,
  'development-work': developmentWorkConfigKind,
  'config-aggregator': configAggregatorKind,
};

export function isInjectorKindName(name: string): name is InjectorKindName {
  return Object.prototype.hasOwnProperty.call(KIND_DEFINITIONS, name);
}
