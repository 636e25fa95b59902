#!/usr/bin/env node
import process from 'process';
import path from 'path';

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  ALL_INJECTION_TYPES,
  ConfigDiscovery,
  createInjector,
  InjectionType,
  Injector,
  InjectorError,
  KIND_DEFINITIONS,
  NoopInjector,
  Notifier,
  TextStorage,
} from '../injector';
import { FileTextStorage, MemoryTextStorage } from '../storage/text-storage';
import { logger, config, flushLogs } from '../utils';
import { addCommonOptions, CommonOptions, hasEntry, resolveStrict } from './options';

interface InjectOptions extends CommonOptions {
  type: string;
  dependency: string[];
  applicationModule: string[];
}

const consoleNotifier: Notifier = {
  info: (message: string) => console.log(chalk.green(message)),
  error: (message: string) => {
    console.error(chalk.red(message));
    process.exitCode = 1;
  },
};

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

function parseInjectionType(value: string): InjectionType {
  const type = ALL_INJECTION_TYPES.find(candidate => candidate === value);
  if (!type) {
    throw new InjectorError(`Unknown type "${value}". Expected one of: ${ALL_INJECTION_TYPES.join(', ')}`);
  }
  return type;
}

/**
 * Dry runs work on an in-memory copy of every known configuration file.
 */
function createStorage(projectRoot: string, dryRun: boolean | undefined): TextStorage {
  const files = new FileTextStorage();
  if (!dryRun) {
    return files;
  }

  const snapshot: Record<string, string> = {};
  for (const kind of Object.values(KIND_DEFINITIONS)) {
    const configPath = path.join(projectRoot, kind.configFile);
    if (files.exists(configPath)) {
      snapshot[configPath] = files.read(configPath);
    }
  }
  return new MemoryTextStorage(snapshot);
}

function resolveInjector(
  options: CommonOptions,
  storage: TextStorage,
  lists: { dependencies?: string[]; applicationModules?: string[] } = {}
): Injector {
  const projectRoot = path.resolve(options.projectRoot);
  const engineOptions = {
    dependencies: lists.dependencies,
    applicationModules: lists.applicationModules,
    strict: resolveStrict(options),
  };

  if (options.kind) {
    return createInjector(options.kind, { ...engineOptions, projectRoot, storage });
  }

  const chain = new ConfigDiscovery(storage).createInjectors(projectRoot, engineOptions);
  if (chain.getInjectors().length === 0) {
    console.log(chalk.yellow(`No supported configuration files found under ${projectRoot}`));
    return new NoopInjector();
  }
  return chain;
}

function printDryRun(storage: TextStorage, before: Record<string, string>): void {
  if (!(storage instanceof MemoryTextStorage)) {
    return;
  }

  let changed = 0;
  for (const filePath of storage.paths()) {
    const content = storage.read(filePath);
    if (before[filePath] === content) {
      continue;
    }
    changed++;
    console.log(chalk.blue(`\n--- ${filePath} (dry run) ---`));
    console.log(content);
  }

  if (changed === 0) {
    console.log(chalk.gray('Dry run: no configuration file would change'));
  }
}

function snapshot(storage: TextStorage): Record<string, string> {
  const result: Record<string, string> = {};
  if (storage instanceof MemoryTextStorage) {
    for (const filePath of storage.paths()) {
      result[filePath] = storage.read(filePath);
    }
  }
  return result;
}

async function fail(error: unknown): Promise<never> {
  logger.error('Command failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  console.error(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}`));
  await flushLogs();
  process.exit(1);
}

function applyVerbose(options: CommonOptions): void {
  if (options.verbose) {
    logger.level = 'debug';
  }
}

const program = new Command();

program
  .name('php-config-injector')
  .description(
    'Register modules, components and config providers in PHP configuration files\n' +
      `Supports: ${Object.values(KIND_DEFINITIONS)
        .map(kind => kind.configFile)
        .join(', ')}`
  )
  .version('0.1.0');

addCommonOptions(
  program
    .command('inject')
    .description('Register an entry in the configuration')
    .argument('<entry>', 'Module name, component name or config provider class')
    .option(
      '-t, --type <type>',
      `Entry type (${ALL_INJECTION_TYPES.join(', ')})`,
      InjectionType.MODULE
    )
    .option('--dependency <name>', 'Entry that must be registered before this one (repeatable)', collect, [])
    .option(
      '--application-module <name>',
      'Application module this entry must precede (repeatable)',
      collect,
      []
    )
).action(async (entry: string, options: InjectOptions) => {
  applyVerbose(options);

  try {
    const type = parseInjectionType(options.type);
    const storage = createStorage(path.resolve(options.projectRoot), options.dryRun);
    const before = snapshot(storage);
    const injector = resolveInjector(options, storage, {
      dependencies: options.dependency,
      applicationModules: options.applicationModule,
    });

    if (!injector.registersType(type)) {
      throw new InjectorError(`No configuration accepts entries of type ${type}`);
    }

    console.log(chalk.blue(`Registering ${entry} (${type})`));
    injector.inject(entry, type, consoleNotifier);

    printDryRun(storage, before);
    await flushLogs();
  } catch (error) {
    await fail(error);
  }
});

addCommonOptions(
  program
    .command('remove')
    .description('Remove an entry from the configuration')
    .argument('<entry>', 'Module name, component name or config provider class')
).action(async (entry: string, options: CommonOptions) => {
  applyVerbose(options);

  try {
    const storage = createStorage(path.resolve(options.projectRoot), options.dryRun);
    const before = snapshot(storage);
    const injector = resolveInjector(options, storage);

    if (!hasEntry(injector, entry)) {
      console.log(chalk.gray(`${entry} is not registered; nothing to remove`));
    }
    injector.remove(entry, consoleNotifier);

    printDryRun(storage, before);
    await flushLogs();
  } catch (error) {
    await fail(error);
  }
});

addCommonOptions(
  program
    .command('status')
    .description('Report whether an entry is registered')
    .argument('<entry>', 'Module name, component name or config provider class')
).action(async (entry: string, options: CommonOptions) => {
  applyVerbose(options);

  try {
    const storage = createStorage(path.resolve(options.projectRoot), options.dryRun);
    const injector = resolveInjector(options, storage);

    if (injector.isRegistered(entry)) {
      console.log(chalk.green(`✓ ${entry} is registered`));
    } else {
      console.log(chalk.yellow(`✗ ${entry} is not registered`));
      process.exitCode = 2;
    }
    await flushLogs();
  } catch (error) {
    await fail(error);
  }
});

program
  .command('discover')
  .description('List the supported configuration files present in a project')
  .option('-p, --project-root <path>', 'Project root holding the config/ directory', config.injector.projectRoot)
  .action(async (options: { projectRoot: string }) => {
    const projectRoot = path.resolve(options.projectRoot);
    const spinner = ora('Discovering configuration files...').start();

    try {
      const kinds = new ConfigDiscovery().discover(projectRoot);

      if (kinds.length === 0) {
        spinner.warn(`No supported configuration files found under ${projectRoot}`);
        return;
      }

      spinner.succeed(`Found ${kinds.length} configuration file(s)`);
      for (const name of kinds) {
        const kind = Object.values(KIND_DEFINITIONS).find(candidate => candidate.name === name);
        const types = kind ? kind.allowedTypes.join(', ') : '';
        console.log(`  ${chalk.cyan(name.padEnd(18))} ${kind?.configFile ?? ''} ${chalk.gray(`[${types}]`)}`);
      }
    } catch (error) {
      spinner.fail('Discovery failed');
      await fail(error);
    }
  });

program.configureHelp({
  sortSubcommands: true,
});

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.blue('See --help for a list of available commands.'));
  process.exit(1);
});

program.parseAsync().catch(fail);
