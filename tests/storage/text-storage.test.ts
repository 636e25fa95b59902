import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { StorageError } from '../../src/injector/errors';
import { FileTextStorage, MemoryTextStorage } from '../../src/storage/text-storage';

describe('FileTextStorage', () => {
  let tempDir: string;
  let storage: FileTextStorage;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'text-storage-test-'));
    storage = new FileTextStorage();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should read what it wrote', () => {
    const filePath = path.join(tempDir, 'modules.config.php');

    storage.write(filePath, "<?php\nreturn [\n    'Application',\n];\n");

    expect(storage.exists(filePath)).toBe(true);
    expect(storage.read(filePath)).toBe("<?php\nreturn [\n    'Application',\n];\n");
  });

  it('should replace the file without leaving a temporary file behind', async () => {
    const filePath = path.join(tempDir, 'modules.config.php');
    await fs.writeFile(filePath, 'old');

    storage.write(filePath, 'new');

    expect(await fs.readFile(filePath, 'utf-8')).toBe('new');
    expect(await fs.readdir(tempDir)).toEqual(['modules.config.php']);
  });

  it('should wrap read failures in a StorageError', () => {
    const filePath = path.join(tempDir, 'missing.php');

    expect(storage.exists(filePath)).toBe(false);
    expect(() => storage.read(filePath)).toThrow(StorageError);
    try {
      storage.read(filePath);
    } catch (error) {
      expect(error).toBeInstanceOf(StorageError);
      if (error instanceof StorageError) {
        expect(error.filePath).toBe(filePath);
        expect(error.operation).toBe('read');
        expect(error.cause).toBeInstanceOf(Error);
      }
    }
  });

  it('should wrap write failures in a StorageError', () => {
    const filePath = path.join(tempDir, 'missing-dir', 'config.php');

    expect(() => storage.write(filePath, 'content')).toThrow(StorageError);
    expect(() => storage.write(filePath, 'content')).toThrow(`Failed to write ${filePath}`);
  });
});

describe('MemoryTextStorage', () => {
  it('should serve seeded files and remember writes', () => {
    const storage = new MemoryTextStorage({ 'a.php': 'A' });

    storage.write('b.php', 'B');

    expect(storage.read('a.php')).toBe('A');
    expect(storage.read('b.php')).toBe('B');
    expect(storage.paths()).toEqual(['a.php', 'b.php']);
  });

  it('should throw a StorageError for unknown paths', () => {
    const storage = new MemoryTextStorage();

    expect(storage.exists('missing.php')).toBe(false);
    expect(() => storage.read('missing.php')).toThrow('Failed to read missing.php: no such file');
  });
});
