export * from './types';
export * from './errors';
export * from './kinds';
export { RegistrationEngine } from './registration-engine';
export { NoopInjector } from './noop-injector';
export { InjectorChain } from './injector-chain';
export { ConfigDiscovery } from './config-discovery';
export { createInjector } from './factory';
export { createLoggerNotifier, CollectingNotifier } from './notifier';
export type { NotifierMessage } from './notifier';
export {
  escapeRegExp,
  escapeReplacement,
  formatTemplate,
  compileDetectionPattern,
  findRegistration,
  applyPatternPair,
} from './pattern-utils';
