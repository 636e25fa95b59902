import * as path from 'path';
import { config } from '../utils/config';
import { createComponentLogger } from '../utils/logger';
import { FileTextStorage } from '../storage/text-storage';
import {
  InjectionType,
  Injector,
  InjectorKindDefinition,
  Notifier,
  PatternPair,
  RegistrationEngineOptions,
  TextStorage,
} from './types';
import {
  PatternMismatchError,
  PatternRole,
  UnsupportedInjectionTypeError,
} from './errors';
import { applyPatternPair, compileDetectionPattern, findRegistration } from './pattern-utils';

const logger = createComponentLogger('registration-engine');

/**
 * Registers entries in one configuration file using the pattern table of its kind.
 *
 * The configuration text is read fresh for every public operation and written
 * back only after a successful mutation. Ordering among existing entries is
 * derived from the length of each entry's detection match: the detection
 * patterns span from the list opener to the entry, so a longer match means an
 * entry further down the list.
 */
export class RegistrationEngine implements Injector {
  private readonly configFile: string;
  private readonly storage: TextStorage;
  private readonly strict: boolean;
  private applicationModules: string[];
  private moduleDependencies: string[];

  constructor(
    private readonly kind: InjectorKindDefinition,
    options: RegistrationEngineOptions = {}
  ) {
    this.configFile = options.projectRoot
      ? path.join(options.projectRoot, kind.configFile)
      : kind.configFile;
    this.storage = options.storage ?? new FileTextStorage();
    this.strict = options.strict ?? config.injector.strict;
    this.applicationModules = this.normalizeAll(options.applicationModules ?? []);
    this.moduleDependencies = this.normalizeAll(options.dependencies ?? []);
  }

  getKind(): string {
    return this.kind.name;
  }

  getConfigFile(): string {
    return this.configFile;
  }

  registersType(type: InjectionType): boolean {
    return this.kind.allowedTypes.includes(type);
  }

  getTypesAllowed(): InjectionType[] {
    return [...this.kind.allowedTypes];
  }

  isRegistered(entry: string): boolean {
    const content = this.storage.read(this.configFile);
    return this.isRegisteredInConfig(this.normalize(entry), content);
  }

  inject(entry: string, type: InjectionType, notifier: Notifier): void {
    if (!this.registersType(type)) {
      throw new UnsupportedInjectionTypeError(this.kind.name, type);
    }

    const pkg = this.normalize(entry);
    const content = this.storage.read(this.configFile);

    if (this.isRegisteredInConfig(pkg, content)) {
      notifier.info('    Package is already registered; skipping');
      return;
    }

    if (
      type === InjectionType.COMPONENT &&
      this.moduleDependencies.length > 0 &&
      this.injectAfterDependencies(pkg, content, notifier)
    ) {
      return;
    }

    if (
      type === InjectionType.MODULE &&
      this.injectBeforeApplicationModules(pkg, content)
    ) {
      return;
    }

    logger.debug('Injecting entry', { entry: pkg, type, file: this.configFile });
    const updated = this.substitute(type, content, pkg, pkg);
    this.storage.write(this.configFile, updated);
  }

  remove(entry: string, notifier: Notifier): void {
    const pkg = this.normalize(entry);
    const content = this.storage.read(this.configFile);

    if (!this.isRegisteredInConfig(pkg, content)) {
      return;
    }

    const removed = this.replaceChecked('removal', this.kind.removalPattern, content, pkg, pkg);
    const cleaned = applyPatternPair(this.kind.cleanUpPattern, removed, '', '');

    this.storage.write(this.configFile, cleaned);
    logger.debug('Removed entry', { entry: pkg, file: this.configFile });

    notifier.info(`    Removed package from ${this.configFile}`);
  }

  setApplicationModules(modules: string[]): this {
    this.applicationModules = this.normalizeAll(modules);
    return this;
  }

  setModuleDependencies(modules: string[]): this {
    this.moduleDependencies = this.normalizeAll(modules);
    return this;
  }

  /**
   * Inject after the last registered dependency.
   *
   * Returns true whenever dependencies are configured: a missing dependency is
   * reported and the entry is left out rather than appended out of order.
   */
  private injectAfterDependencies(pkg: string, content: string, notifier: Notifier): boolean {
    for (const dependency of this.moduleDependencies) {
      if (!this.isRegisteredInConfig(dependency, content)) {
        notifier.error(`    Dependency ${dependency} is not registered in the configuration`);
        return true;
      }
    }

    const lastDependency = this.findLastDependency(this.moduleDependencies, content);
    logger.debug('Injecting after dependency', { entry: pkg, anchor: lastDependency });

    const updated = this.substitute(InjectionType.DEPENDENCY, content, lastDependency, pkg);
    this.storage.write(this.configFile, updated);

    return true;
  }

  /**
   * Dependency with the longest detection match, i.e. the one furthest down the list.
   */
  private findLastDependency(dependencies: string[], content: string): string {
    if (dependencies.length === 1) {
      return dependencies[0];
    }

    let longest = 0;
    let last = dependencies[0];
    for (const dependency of dependencies) {
      const length = findRegistration(this.kind.isRegisteredPattern, dependency, content)?.length ?? 0;
      if (length > longest) {
        longest = length;
        last = dependency;
      }
    }

    return last;
  }

  /**
   * Inject before the first registered application module.
   * Returns false when none of the application modules is registered.
   */
  private injectBeforeApplicationModules(pkg: string, content: string): boolean {
    const firstApplicationModule = this.findFirstEnabledApplicationModule(
      this.applicationModules,
      content
    );

    if (firstApplicationModule === null) {
      return false;
    }

    logger.debug('Injecting before application module', {
      entry: pkg,
      anchor: firstApplicationModule,
    });

    const updated = this.substitute(
      InjectionType.BEFORE_APPLICATION,
      content,
      firstApplicationModule,
      pkg
    );
    this.storage.write(this.configFile, updated);

    return true;
  }

  /**
   * Registered application module with the shortest detection match.
   */
  private findFirstEnabledApplicationModule(modules: string[], content: string): string | null {
    let shortest = content.length;
    let first: string | null = null;

    for (const module of modules) {
      const match = findRegistration(this.kind.isRegisteredPattern, module, content);
      if (match === null) {
        continue;
      }

      if (match.length < shortest) {
        shortest = match.length;
        first = module;
      }
    }

    return first;
  }

  private substitute(type: InjectionType, content: string, anchor: string, pkg: string): string {
    const pair = this.kind.injectionPatterns[type];
    if (!pair) {
      throw new UnsupportedInjectionTypeError(this.kind.name, type);
    }
    return this.replaceChecked(type, pair, content, anchor, pkg);
  }

  private replaceChecked(
    role: PatternRole,
    pair: PatternPair,
    content: string,
    anchor: string,
    pkg: string
  ): string {
    const updated = applyPatternPair(pair, content, anchor, pkg);

    if (updated === content) {
      if (this.strict) {
        throw new PatternMismatchError(this.kind.name, role, pkg);
      }
      logger.warn('Pattern did not match; configuration left unchanged', {
        kind: this.kind.name,
        role,
        entry: pkg,
      });
    }

    return updated;
  }

  private isRegisteredInConfig(pkg: string, content: string): boolean {
    return compileDetectionPattern(this.kind.isRegisteredPattern, pkg).test(content);
  }

  private normalize(entry: string): string {
    return this.kind.normalizeEntry ? this.kind.normalizeEntry(entry) : entry;
  }

  private normalizeAll(entries: string[]): string[] {
    return entries.map(entry => this.normalize(entry));
  }
}
