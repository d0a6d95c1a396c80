#!/usr/bin/env node
import { stat } from 'fs/promises';
import chalk from 'chalk';
import { config } from './config/index.js';
import { clearNotificationLog, readNotificationLog } from './notifications/log-file.js';
import type { InvalidLine } from './notifications/log-file.js';
import { parseViewerArgs, usage } from './viewer/args.js';
import type { ViewerOptions } from './viewer/args.js';
import { LogFollower } from './viewer/follow.js';
import { formatRecord } from './viewer/format.js';

const logPath = config.notifications.logPath;

function reportInvalid(line: InvalidLine): void {
  console.error(chalk.red(`Error parsing notification (line ${line.lineNumber}): ${line.reason}`));
}

async function fileSize(filePath: string): Promise<number> {
  try {
    return (await stat(filePath)).size;
  } catch {
    return 0;
  }
}

async function showLast(options: ViewerOptions): Promise<void> {
  const { records, invalid } = await readNotificationLog(logPath);
  invalid.forEach(reportInvalid);

  if (records.length === 0 && invalid.length === 0) {
    console.log(chalk.yellow('No notifications yet. The file is created when the first hook event arrives.'));
    console.log(chalk.blue(`Notification file: ${logPath}`));
    return;
  }

  const last = options.count === 0 ? [] : records.slice(-options.count);
  console.log(chalk.bold(`Last ${last.length} notifications:`));
  console.log('');
  for (const record of last) {
    console.log(formatRecord(record, { utc: options.utc }));
  }
}

async function follow(options: ViewerOptions): Promise<void> {
  console.log(chalk.blue('Following notifications... (Press Ctrl+C to stop)'));
  console.log('');

  await showLast(options);

  const follower = new LogFollower(logPath, {
    onRecord: record => console.log(formatRecord(record, { utc: options.utc })),
    onInvalid: reportInvalid,
    onError: err => console.error(chalk.red(`Failed to read notifications: ${err.message}`)),
  }, await fileSize(logPath));

  const stop = follower.watch();
  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => {
      stop();
      resolve();
    });
  });
}

async function main(): Promise<number> {
  const command = parseViewerArgs(process.argv.slice(2));

  switch (command.type) {
    case 'help':
      console.log(usage());
      return 0;

    case 'error':
      console.error(command.message);
      console.error(usage());
      return 1;

    case 'show': {
      const { options } = command;

      if (options.clear) {
        const cleared = await clearNotificationLog(logPath);
        console.log(cleared ? chalk.green('All notifications cleared.') : chalk.yellow('No notifications to clear.'));
        return 0;
      }

      if (options.follow) {
        await follow(options);
        return 0;
      }

      await showLast(options);
      return 0;
    }
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error(chalk.red(`session-relay-view: ${err instanceof Error ? err.message : String(err)}`));
    process.exitCode = 1;
  });
