/**
 * PHP Config Injector
 *
 * Registers and unregisters modules, components and config providers in PHP
 * configuration files through pattern-driven text edits that keep the
 * surrounding formatting intact.
 */

export * from './injector';
export { FileTextStorage, MemoryTextStorage } from './storage/text-storage';
export { logger, config, createComponentLogger } from './utils';
