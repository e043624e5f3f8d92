import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { initCommand } from './init.js';
import { getConfig, type GlobalOptions } from '../context.js';
import { setConfigValue, getConfigPath, type Config } from '../config/index.js';
import { errorMessage } from '../io.js';

const MASK = '********';

/** Copy of the config with API keys masked for display. */
export function redactConfig(config: Config): Config {
  const copy = structuredClone(config);
  if (copy.summarizer.api_key) copy.summarizer.api_key = MASK;
  if (copy.sources.nasa.api_key) copy.sources.nasa.api_key = MASK;
  return copy;
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage starsift configuration');

  config
    .command('init')
    .description('Initialize starsift config in ~/.starsift/')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await initCommand({ configPath: globalOpts.config });
    });

  config
    .command('show')
    .description('Show current configuration (API keys masked)')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      const cfg = redactConfig(getConfig());

      if (globalOpts.json) {
        console.log(JSON.stringify(cfg, null, 2));
      } else {
        console.log(chalk.bold('Current configuration:\n'));
        console.log(stringify(cfg));
      }
    });

  config
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key (dot-notation, e.g. scoring.threshold)')
    .argument('<value>', 'Value to set (comma-separated for lists)')
    .action(async (key: string, value: string, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      try {
        setConfigValue(key, value, { configPath: globalOpts.config });
      } catch (err) {
        console.error(chalk.red(errorMessage(err)));
        process.exitCode = 1;
        return;
      }

      const configPath = getConfigPath(globalOpts.config);
      console.log(chalk.green(`Set ${chalk.bold(key)} = ${chalk.bold(value)}`));
      console.log(chalk.dim(`Config: ${configPath}`));
    });
}
