import { Command } from 'commander';
import { Injector, InjectorChain, KIND_DEFINITIONS } from '../injector';
import { config } from '../utils';

export interface CommonOptions {
  kind?: string;
  projectRoot: string;
  strict: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option(
      '-k, --kind <kind>',
      `Configuration kind (${Object.keys(KIND_DEFINITIONS).join(', ')}); all discovered files when omitted`
    )
    .option('-p, --project-root <path>', 'Project root holding the config/ directory', config.injector.projectRoot)
    .option(
      '--no-strict',
      'Write the file back even when a pattern matches nothing. Strict mode is on by default ' +
        '(CONFIG_INJECTOR_STRICT) and fails the command on a mismatch'
    )
    .option('--dry-run', 'Print the resulting configuration instead of writing it')
    .option('--verbose', 'Enable verbose logging');
}

/**
 * `--no-strict` always wins; otherwise CONFIG_INJECTOR_STRICT decides.
 */
export function resolveStrict(options: Pick<CommonOptions, 'strict'>): boolean {
  return options.strict && config.injector.strict;
}

/**
 * True when any configuration behind the injector holds the entry.
 */
export function hasEntry(injector: Injector, entry: string): boolean {
  return injector instanceof InjectorChain
    ? injector.isRegisteredAnywhere(entry)
    : injector.isRegistered(entry);
}
