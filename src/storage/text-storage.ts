import * as fs from 'fs';
import * as path from 'path';
import { StorageError } from '../injector/errors';
import { TextStorage } from '../injector/types';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('text-storage');

/**
 * Filesystem-backed storage. Writes go to a sibling temp file renamed over the target.
 */
export class FileTextStorage implements TextStorage {
  read(filePath: string): string {
    try {
      return fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new StorageError(filePath, 'read', error);
    }
  }

  write(filePath: string, content: string): void {
    const tempPath = path.join(
      path.dirname(filePath),
      `.${path.basename(filePath)}.${process.pid}.tmp`
    );

    try {
      fs.writeFileSync(tempPath, content, 'utf-8');
      fs.renameSync(tempPath, filePath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        fs.rmSync(tempPath, { force: true });
      }
      throw new StorageError(filePath, 'write', error);
    }

    logger.debug('Wrote configuration file', { path: filePath, bytes: content.length });
  }

  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }
}

/**
 * In-process storage keyed by path. Used for dry runs and tests.
 */
export class MemoryTextStorage implements TextStorage {
  private files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(initial)) {
      this.files.set(filePath, content);
    }
  }

  read(filePath: string): string {
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new StorageError(filePath, 'read', new Error('no such file'));
    }
    return content;
  }

  write(filePath: string, content: string): void {
    this.files.set(filePath, content);
  }

  exists(filePath: string): boolean {
    return this.files.has(filePath);
  }

  /**
   * Paths written or seeded so far, in insertion order.
   */
  paths(): string[] {
    return Array.from(this.files.keys());
  }
}
