import { InjectionType, Injector, Notifier } from './types';

/**
 * Stands in where no configuration file applies. Reports every entry as
 * registered so callers never try to write.
 */
export class NoopInjector implements Injector {
  registersType(_type: InjectionType): boolean {
    return false;
  }

  getTypesAllowed(): InjectionType[] {
    return [];
  }

  isRegistered(_entry: string): boolean {
    return true;
  }

  inject(_entry: string, _type: InjectionType, _notifier: Notifier): void {}

  remove(_entry: string, _notifier: Notifier): void {}

  setApplicationModules(_modules: string[]): this {
    return this;
  }

  setModuleDependencies(_modules: string[]): this {
    return this;
  }
}
