/**
 * Core types for pattern-driven registration of entries in PHP configuration lists.
 */

/**
 * Role an entry plays in a configuration list. Selects the insertion pattern.
 */
export enum InjectionType {
  COMPONENT = 'component',
  MODULE = 'module',
  DEPENDENCY = 'dependency',
  BEFORE_APPLICATION = 'before-application',
  CONFIG_PROVIDER = 'config-provider',
}

export const ALL_INJECTION_TYPES: readonly InjectionType[] = Object.values(InjectionType);

/**
 * Regular expression source with a `%s` placeholder for a regex-escaped entry.
 */
export interface DetectionPattern {
  pattern: string;
  flags?: string;
}

/**
 * Match/replacement pair.
 *
 * `pattern` receives the escaped anchor entry through `%s`; `replacement`
 * receives the entry being written. The replacement may use `$1`-style
 * group references. Every match in the text is replaced.
 */
export interface PatternPair extends DetectionPattern {
  replacement: string;
}

export type InjectorKindName =
  | 'application'
  | 'modules'
  | 'development'
  | 'development-work'
  | 'config-aggregator';

/**
 * Data-only description of one configuration file format.
 */
export interface InjectorKindDefinition {
  name: string;
  /** Path of the configuration file, relative to the project root */
  configFile: string;
  allowedTypes: InjectionType[];
  isRegisteredPattern: DetectionPattern;
  injectionPatterns: Partial<Record<InjectionType, PatternPair>>;
  removalPattern: PatternPair;
  cleanUpPattern: PatternPair;
  /** Marks a file of this kind when the file exists; used by ConfigDiscovery */
  discoveryPattern?: DetectionPattern;
  normalizeEntry?: (entry: string) => string;
}

/**
 * Leveled message sink for the outcome of injector operations.
 */
export interface Notifier {
  info(message: string): void;
  error(message: string): void;
}

/**
 * Synchronous read/write access to configuration text.
 * Implementations throw StorageError on failure.
 */
export interface TextStorage {
  read(filePath: string): string;
  write(filePath: string, content: string): void;
  exists(filePath: string): boolean;
}

export interface Injector {
  registersType(type: InjectionType): boolean;
  getTypesAllowed(): InjectionType[];
  isRegistered(entry: string): boolean;
  inject(entry: string, type: InjectionType, notifier: Notifier): void;
  remove(entry: string, notifier: Notifier): void;
  setApplicationModules(modules: string[]): this;
  setModuleDependencies(modules: string[]): this;
}

export interface RegistrationEngineOptions {
  /** Prefixed to the kind's configFile when non-empty */
  projectRoot?: string;
  storage?: TextStorage;
  dependencies?: string[];
  applicationModules?: string[];
  /** Throw PatternMismatchError when an insertion or removal leaves the text unchanged */
  strict?: boolean;
}
