import * as path from 'path';
import { FileTextStorage } from '../storage/text-storage';
import { createComponentLogger } from '../utils/logger';
import { InjectorChain } from './injector-chain';
import { KIND_DEFINITIONS } from './kinds';
import { compileDetectionPattern } from './pattern-utils';
import { RegistrationEngine } from './registration-engine';
import { InjectorKindDefinition, RegistrationEngineOptions, TextStorage } from './types';

const logger = createComponentLogger('config-discovery');

/**
 * Finds which known configuration files a project has.
 */
export class ConfigDiscovery {
  constructor(
    private readonly storage: TextStorage = new FileTextStorage(),
    private readonly kinds: Record<string, InjectorKindDefinition> = KIND_DEFINITIONS
  ) {}

  /**
   * Names of the kinds whose file exists under the project root and looks like that kind.
   */
  discover(projectRoot: string): string[] {
    const found: string[] = [];

    for (const [name, kind] of Object.entries(this.kinds)) {
      const configPath = path.join(projectRoot, kind.configFile);
      if (!this.storage.exists(configPath)) {
        continue;
      }

      if (kind.discoveryPattern) {
        const content = this.storage.read(configPath);
        if (!compileDetectionPattern(kind.discoveryPattern, '').test(content)) {
          logger.debug('Configuration file does not match its kind', { kind: name, path: configPath });
          continue;
        }
      }

      found.push(name);
    }

    logger.debug('Discovered configuration files', { projectRoot, kinds: found });
    return found;
  }

  /**
   * One engine per discovered kind, chained.
   */
  createInjectors(
    projectRoot: string,
    options: Omit<RegistrationEngineOptions, 'projectRoot' | 'storage'> = {}
  ): InjectorChain {
    const chain = new InjectorChain();
    for (const name of this.discover(projectRoot)) {
      chain.add(
        new RegistrationEngine(this.kinds[name], {
          ...options,
          projectRoot,
          storage: this.storage,
        })
      );
    }
    return chain;
  }
}
