import { InjectionType, InjectorKindDefinition, PatternPair } from '../types';

/**
 * Collapses the blank line a removed array element leaves behind.
 */
export const DEFAULT_CLEAN_UP_PATTERN: PatternPair = {
  pattern: String.raw`(array\(|\[|,)(\r?\n)\r?\n`,
  flags: 's',
  replacement: '$1$2',
};

export const LIST_INJECTION_TYPES: InjectionType[] = [
  InjectionType.COMPONENT,
  InjectionType.MODULE,
  InjectionType.DEPENDENCY,
  InjectionType.BEFORE_APPLICATION,
];

/**
 * Pattern table for a PHP array of quoted entries, one entry per line.
 *
 * @param opener - regex source matching the text that opens the list,
 *   e.g. `return [` or `'modules' => array(`
 * @param indent - indentation of an entry relative to the line holding the opener
 */
export function createListPatterns(
  opener: string,
  indent = '    '
): Pick<
  InjectorKindDefinition,
  'isRegisteredPattern' | 'injectionPatterns' | 'removalPattern' | 'cleanUpPattern'
> {
  return {
    // Spans from the opener to the entry, so the match grows with the entry's position
    isRegisteredPattern: {
      pattern: String.raw`${opener}[^)\]]*'%s'`,
      flags: 's',
    },
    // Line breaks are captured and reused so CRLF files stay CRLF
    injectionPatterns: {
      [InjectionType.COMPONENT]: {
        pattern: String.raw`^([ \t]*)(${opener})[ \t]*(\r?\n)`,
        flags: 'm',
        replacement: `$1$2$3$1${indent}'%s',$3`,
      },
      // Last element must carry a trailing comma, or the list must be empty
      [InjectionType.MODULE]: {
        pattern: String.raw`(${opener}(?:[^)\]]*?,)?)(\r?\n)([ \t]*)(\)|\])`,
        replacement: `$1$2$3${indent}'%s',$2$3$4`,
      },
      [InjectionType.DEPENDENCY]: {
        pattern: String.raw`(${opener}[^)\]]*?)(\r?\n)([ \t]*)('%s'),?[ \t]*$`,
        flags: 'm',
        replacement: "$1$2$3$4,$2$3'%s',",
      },
      [InjectionType.BEFORE_APPLICATION]: {
        pattern: String.raw`(${opener}[^)\]]*?)(\r?\n)([ \t]*)('%s')`,
        replacement: "$1$2$3'%s',$2$3$4",
      },
    },
    removalPattern: {
      pattern: String.raw`^[ \t]*'%s',?[ \t]*$`,
      flags: 'm',
      replacement: '',
    },
    cleanUpPattern: DEFAULT_CLEAN_UP_PATTERN,
  };
}
