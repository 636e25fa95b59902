import { DetectionPattern, PatternPair } from './types';

const PLACEHOLDER = '%s';

/**
 * Escape a string so it matches literally inside a regular expression.
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Escape a string so String.prototype.replace inserts it literally.
 */
export function escapeReplacement(value: string): string {
  return value.replace(/\$/g, '$$$$');
}

/**
 * Substitute every `%s` placeholder in a template.
 */
export function formatTemplate(template: string, value: string): string {
  return template.split(PLACEHOLDER).join(value);
}

/**
 * Compile a detection pattern for one entry.
 */
export function compileDetectionPattern(detection: DetectionPattern, entry: string): RegExp {
  const flags = (detection.flags ?? '').replace(/g/g, '');
  return new RegExp(formatTemplate(detection.pattern, escapeRegExp(entry)), flags);
}

/**
 * Text of the first match of the detection pattern, or null when the entry is absent.
 */
export function findRegistration(
  detection: DetectionPattern,
  entry: string,
  content: string
): string | null {
  const match = compileDetectionPattern(detection, entry).exec(content);
  return match ? match[0] : null;
}

/**
 * Apply a pattern pair to the whole text.
 *
 * @param anchor - entry substituted (escaped) into the match pattern
 * @param value - entry substituted into the replacement
 */
export function applyPatternPair(
  pair: PatternPair,
  content: string,
  anchor: string,
  value: string
): string {
  const baseFlags = pair.flags ?? '';
  const flags = baseFlags.includes('g') ? baseFlags : `${baseFlags}g`;
  const pattern = new RegExp(formatTemplate(pair.pattern, escapeRegExp(anchor)), flags);
  const replacement = formatTemplate(pair.replacement, escapeReplacement(value));
  return content.replace(pattern, replacement);
}
