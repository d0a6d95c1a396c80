#!/usr/bin/env node
import chalk from 'chalk';
import { WebClient, LogLevel } from '@slack/web-api';
import { config } from './config/index.js';
import { checkPassed, formatCheckReport, runSlackCheck } from './check/slack-check.js';

async function main(): Promise<number> {
  // Read directly: the relay drops a malformed token, but this check should still try it.
  const token = process.env.SLACK_BOT_TOKEN?.trim();
  if (!token) {
    console.error(chalk.red('SLACK_BOT_TOKEN is not set.'));
    console.error('Export it, or add it to the "env" section of .claude/settings.json.');
    return 1;
  }

  const client = new WebClient(token, {
    timeout: config.slack.timeoutMs,
    retryConfig: { retries: 0 },
    logLevel: LogLevel.ERROR,
  });

  const report = await runSlackCheck(client, { token, userId: config.slack.userId });
  for (const line of formatCheckReport(report)) {
    console.log(line);
  }

  return checkPassed(report) ? 0 : 1;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error(chalk.red(`session-relay-check: ${err instanceof Error ? err.message : String(err)}`));
    process.exitCode = 1;
  });
