import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigDiscovery } from '../../src/injector/config-discovery';
import { CollectingNotifier } from '../../src/injector/notifier';
import { RegistrationEngine } from '../../src/injector/registration-engine';
import { InjectionType } from '../../src/injector/types';
import { FileTextStorage, MemoryTextStorage } from '../../src/storage/text-storage';

const FIXTURES = path.join(__dirname, '..', 'fixtures');

describe('ConfigDiscovery', () => {
  describe('discover', () => {
    it('should find every matching configuration file of a Laminas project', () => {
      const discovery = new ConfigDiscovery();

      expect(discovery.discover(path.join(FIXTURES, 'laminas-app'))).toEqual([
        'application',
        'modules',
        'development',
      ]);
    });

    it('should skip files that exist but do not look like their kind', () => {
      const discovery = new ConfigDiscovery();

      expect(discovery.discover(path.join(FIXTURES, 'mezzio-app'))).toEqual(['config-aggregator']);
    });

    it('should return nothing for a project without configuration', () => {
      expect(new ConfigDiscovery().discover(path.join(FIXTURES, 'empty-app'))).toEqual([]);
    });

    it('should read through the supplied storage', () => {
      const storage = new MemoryTextStorage({
        [path.join('/project', 'config/development.config.php')]:
          "<?php\nreturn [\n    'modules' => [\n    ],\n];\n",
      });

      expect(new ConfigDiscovery(storage).discover('/project')).toEqual(['development-work']);
    });
  });

  describe('createInjectors', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-discovery-test-'));
      await fs.mkdir(path.join(tempDir, 'config'));
      await fs.copyFile(
        path.join(FIXTURES, 'laminas-app/config/modules.config.php'),
        path.join(tempDir, 'config/modules.config.php')
      );
      await fs.copyFile(
        path.join(FIXTURES, 'laminas-app/config/development.config.php.dist'),
        path.join(tempDir, 'config/development.config.php.dist')
      );
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should chain one engine per discovered file', () => {
      const chain = new ConfigDiscovery(new FileTextStorage()).createInjectors(tempDir);
      const injectors = chain.getInjectors();

      expect(injectors).toHaveLength(2);
      expect(injectors.every(injector => injector instanceof RegistrationEngine)).toBe(true);
      expect(
        injectors.map(injector => (injector instanceof RegistrationEngine ? injector.getKind() : ''))
      ).toEqual(['modules', 'development']);
    });

    it('should write every discovered file on disk', async () => {
      const chain = new ConfigDiscovery(new FileTextStorage()).createInjectors(tempDir, {
        applicationModules: ['Application'],
      });
      const notifier = new CollectingNotifier();

      chain.inject('Laminas\\Form', InjectionType.MODULE, notifier);

      const modules = await fs.readFile(path.join(tempDir, 'config/modules.config.php'), 'utf-8');
      const development = await fs.readFile(
        path.join(tempDir, 'config/development.config.php.dist'),
        'utf-8'
      );

      expect(modules).toBe(
        "<?php\nreturn [\n    'Laminas\\Router',\n    'Laminas\\Validator',\n    'Laminas\\Form',\n    'Application',\n];\n"
      );
      expect(development).toBe(
        "<?php\nreturn [\n    'modules' => [\n        'Laminas\\Form',\n    ],\n    'module_listener_options' => [\n        'config_cache_enabled' => false,\n    ],\n];\n"
      );
      expect(chain.isRegistered('Laminas\\Form')).toBe(true);
    });
  });
});
