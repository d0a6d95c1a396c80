#!/usr/bin/env node
import chalk from 'chalk';
import { parseInstallArgs, usage } from './install/args.js';
import { installHooks } from './install/settings.js';

async function main(): Promise<number> {
  const command = parseInstallArgs(process.argv.slice(2));

  switch (command.type) {
    case 'help':
      console.log(usage());
      return 0;

    case 'error':
      console.error(command.message);
      console.error(usage());
      return 1;

    case 'install': {
      const result = await installHooks(command.options);

      for (const hook of result.added) {
        console.log(`${chalk.green('+')} ${hook}`);
      }
      for (const hook of result.present) {
        console.log(`${chalk.yellow('=')} ${hook} (already registered)`);
      }

      console.log('');
      console.log(result.written
        ? chalk.green(`Updated ${result.settingsPath}`)
        : chalk.yellow(`Nothing to change in ${result.settingsPath}`));
      console.log('The hooks take effect in the next assistant session.');
      console.log(`View notifications with: ${chalk.blue('session-relay-view -f')}`);
      return 0;
    }
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`session-relay-install: ${message}`));
    process.exitCode = 1;
  });
