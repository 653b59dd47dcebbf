import type { Command } from 'commander';
import { ConfigService, JsonConfigStore, errorMessage, parsePreferenceValue } from '@flywheel/core';
import { getConfigDir } from '../adapters/xdg-paths.js';

/** Dotted `key = value` lines for every leaf of a config object. */
export function flattenConfig(value: unknown, prefix = ''): string[] {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.entries(value).flatMap(([key, child]) => flattenConfig(child, prefix ? `${prefix}.${key}` : key));
  }
  return [`${prefix} = ${value === undefined ? '(unset)' : JSON.stringify(value)}`];
}

function configService(): ConfigService {
  return new ConfigService(new JsonConfigStore(getConfigDir()));
}

async function runOrExit(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage configuration');

  config
    .command('show')
    .description('Show the resolved configuration (defaults, config file and FLYWHEEL_* variables)')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) =>
      runOrExit(async () => {
        const resolved = await configService().resolve();
        if (opts.json) {
          console.log(JSON.stringify(resolved, null, 2));
          return;
        }
        console.log(`\n  Configuration (${new JsonConfigStore(getConfigDir()).configPath}):`);
        for (const line of flattenConfig(resolved)) console.log(`  ${line}`);
        console.log();
      }),
    );

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'Dotted key, e.g. promotion.tolerance or customizer.hyperparameters.epochs')
    .argument('<value>', 'Value; JSON is parsed, anything else is kept as a string')
    .action((key: string, value: string) =>
      runOrExit(async () => {
        await configService().set(key, parsePreferenceValue(value));
        console.log(`${key} set to: ${value}`);
      }),
    );

  config
    .command('unset')
    .description('Remove a configuration value so its default applies')
    .argument('<key>', 'Dotted key')
    .action((key: string) =>
      runOrExit(async () => {
        await configService().unset(key);
        console.log(`${key} unset.`);
      }),
    );

  config
    .command('reset')
    .description('Reset configuration to defaults')
    .action(() =>
      runOrExit(async () => {
        await configService().reset();
        console.log('Configuration reset to defaults.');
      }),
    );

  config
    .command('path')
    .description('Print the config file location')
    .action(() => {
      console.log(new JsonConfigStore(getConfigDir()).configPath);
    });

  config.action(async () => {
    await config.commands.find((c) => c.name() === 'show')?.parseAsync([], { from: 'user' });
  });
}
