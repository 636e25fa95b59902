import { InjectionType, InjectorKindDefinition } from '../types';
import { DEFAULT_CLEAN_UP_PATTERN } from './list-patterns';

const AGGREGATOR_OPENER = String.raw`new\s+(?:[\w\\]*\\)?ConfigAggregator\(\s*(?:array\s*\(|\[)`;

/**
 * Accepts `Foo\ConfigProvider`, `\Foo\ConfigProvider` or `\Foo\ConfigProvider::class`.
 */
export function normalizeProviderClass(entry: string): string {
  return entry.trim().replace(/^\\+/, '').replace(/::class$/, '');
}

/**
 * `config/config.php` of a ConfigAggregator-based application.
 * Providers are written as `\Vendor\ConfigProvider::class` at the top of the list.
 */
export const configAggregatorKind: InjectorKindDefinition = {
  name: 'config-aggregator',
  configFile: 'config/config.php',
  allowedTypes: [InjectionType.CONFIG_PROVIDER],
  // Stops at the line that closes the aggregator list
  isRegisteredPattern: {
    pattern: String.raw`${AGGREGATOR_OPENER}(?:(?!^[ \t]*[\])])[\s\S])*?(?<=[\s,\[(])\\?%s::class`,
    flags: 'm',
  },
  injectionPatterns: {
    [InjectionType.CONFIG_PROVIDER]: {
      pattern: String.raw`(${AGGREGATOR_OPENER})(\r?\n)([ \t]*)`,
      replacement: '$1$2$3\\%s::class,$2$3',
    },
  },
  removalPattern: {
    pattern: String.raw`^[ \t]*\\?%s::class,?[ \t]*$`,
    flags: 'm',
    replacement: '',
  },
  cleanUpPattern: DEFAULT_CLEAN_UP_PATTERN,
  discoveryPattern: { pattern: AGGREGATOR_OPENER },
  normalizeEntry: normalizeProviderClass,
};
