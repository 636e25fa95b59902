import { createComponentLogger } from '../utils/logger';
import { InjectorError } from './errors';
import { InjectionType, Injector, Notifier } from './types';

const logger = createComponentLogger('injector-chain');

/**
 * Fans operations out to several injectors, typically one per discovered config file.
 *
 * A member that fails with an {@link InjectorError} is reported through the
 * notifier and the remaining members still run; any other error propagates.
 */
export class InjectorChain implements Injector {
  private readonly chain: Injector[] = [];

  constructor(injectors: Injector[] = []) {
    injectors.forEach(injector => this.add(injector));
  }

  add(injector: Injector): this {
    this.chain.push(injector);
    return this;
  }

  getInjectors(): Injector[] {
    return [...this.chain];
  }

  registersType(type: InjectionType): boolean {
    return this.chain.some(injector => injector.registersType(type));
  }

  getTypesAllowed(): InjectionType[] {
    const allowed: InjectionType[] = [];
    for (const injector of this.chain) {
      for (const type of injector.getTypesAllowed()) {
        if (!allowed.includes(type)) {
          allowed.push(type);
        }
      }
    }
    return allowed;
  }

  isRegistered(entry: string): boolean {
    return this.chain.length > 0 && this.chain.every(injector => injector.isRegistered(entry));
  }

  /**
   * True when at least one member has the entry.
   */
  isRegisteredAnywhere(entry: string): boolean {
    return this.chain.some(injector => injector.isRegistered(entry));
  }

  inject(entry: string, type: InjectionType, notifier: Notifier): void {
    for (const injector of this.chain) {
      if (injector.registersType(type)) {
        this.runMember(notifier, () => injector.inject(entry, type, notifier));
      }
    }
  }

  remove(entry: string, notifier: Notifier): void {
    for (const injector of this.chain) {
      this.runMember(notifier, () => injector.remove(entry, notifier));
    }
  }

  setApplicationModules(modules: string[]): this {
    this.chain.forEach(injector => injector.setApplicationModules(modules));
    return this;
  }

  setModuleDependencies(modules: string[]): this {
    this.chain.forEach(injector => injector.setModuleDependencies(modules));
    return this;
  }

  private runMember(notifier: Notifier, operation: () => void): void {
    try {
      operation();
    } catch (error) {
      if (!(error instanceof InjectorError)) {
        throw error;
      }
      logger.warn('Chain member failed; continuing with the others', { error: error.message });
      notifier.error(`    ${error.message}`);
    }
  }
}
