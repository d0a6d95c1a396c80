import type { ChalkInstance } from 'chalk';
import chalk from 'chalk';
import type { WebClient } from '@slack/web-api';
import { platformErrorCode } from '../slack/client.js';

export const TEST_MESSAGE = '🧪 Test message from session-relay. If you can read this, Slack delivery works.';

const HINTS: Record<string, string> = {
  invalid_auth: 'Check that the token is correct and has not been revoked.',
  not_authed: 'Check that the token is correct and has not been revoked.',
  account_inactive: 'The token belongs to a deactivated app or workspace.',
  missing_scope: 'Add the chat:write, channels:read, groups:read, groups:write and im:write scopes.',
  channel_not_found: 'Check that SLACK_USER_ID is your member id (it starts with U).',
  not_in_channel: 'The bot is not allowed to message you.',
};

export interface BotIdentity {
  user: string;
  userId: string;
  team: string;
}

export type AuthCheck =
  | { ok: true; identity: BotIdentity }
  | { ok: false; error: string; hint?: string };

export type MessageCheck =
  | { status: 'skipped' }
  | { status: 'sent'; channel: string }
  | { status: 'failed'; error: string; hint?: string };

export interface SlackCheckReport {
  // The token is not a bot token (xoxb-).
  tokenFormatWarning: boolean;
  // SLACK_USER_ID names the bot itself rather than the person to notify.
  userIdIsBot: boolean;
  auth: AuthCheck;
  message: MessageCheck;
}

export interface SlackCheckOptions {
  token: string;
  userId?: string;
}

function failure(err: unknown): { error: string; hint?: string } {
  const code = platformErrorCode(err);
  const error = code ?? (err instanceof Error ? err.message : String(err));
  const hint = code ? HINTS[code] : undefined;
  return hint ? { error, hint } : { error };
}

/**
 * Verify the bot token with `auth.test` and, when a user id is configured,
 * send that user a test direct message.
 */
export async function runSlackCheck(client: WebClient, options: SlackCheckOptions): Promise<SlackCheckReport> {
  const tokenFormatWarning = !options.token.startsWith('xoxb-');

  let identity: BotIdentity;
  try {
    const result = await client.auth.test();
    identity = {
      user: result.user ?? 'unknown',
      userId: result.user_id ?? 'unknown',
      team: result.team ?? 'unknown',
    };
  } catch (err) {
    return { tokenFormatWarning, userIdIsBot: false, auth: { ok: false, ...failure(err) }, message: { status: 'skipped' } };
  }

  const auth: AuthCheck = { ok: true, identity };
  const userIdIsBot = options.userId !== undefined && options.userId === identity.userId;
  if (!options.userId || userIdIsBot) {
    return { tokenFormatWarning, userIdIsBot, auth, message: { status: 'skipped' } };
  }

  let message: MessageCheck;
  try {
    const result = await client.chat.postMessage({
      channel: options.userId,
      text: TEST_MESSAGE,
      unfurl_links: false,
      unfurl_media: false,
    });
    message = { status: 'sent', channel: result.channel ?? options.userId };
  } catch (err) {
    message = { status: 'failed', ...failure(err) };
  }

  return { tokenFormatWarning, userIdIsBot, auth, message };
}

export function checkPassed(report: SlackCheckReport): boolean {
  return report.auth.ok && !report.userIdIsBot && report.message.status !== 'failed';
}

export function formatCheckReport(report: SlackCheckReport, colors: ChalkInstance = chalk): string[] {
  const lines: string[] = [];

  if (report.tokenFormatWarning) {
    lines.push(colors.yellow('Warning: SLACK_BOT_TOKEN should be a bot token starting with xoxb-'));
  }

  if (!report.auth.ok) {
    lines.push(colors.red(`Token check failed: ${report.auth.error}`));
    if (report.auth.hint) lines.push(`  ${report.auth.hint}`);
    return lines;
  }

  const { identity } = report.auth;
  lines.push(colors.green('Bot connected.'));
  lines.push(`  Bot user: @${identity.user} (${identity.userId})`);
  lines.push(`  Workspace: ${identity.team}`);

  if (report.userIdIsBot) {
    lines.push(colors.red(`SLACK_USER_ID is the bot's own id (${identity.userId}), not yours.`));
    lines.push('  In Slack, open your profile, choose More, then Copy member ID.');
    return lines;
  }

  switch (report.message.status) {
    case 'skipped':
      lines.push(colors.yellow('SLACK_USER_ID is not set; skipped the test message.'));
      lines.push(`  The bot's id above is not yours. Copy your member ID from your Slack profile.`);
      break;
    case 'sent':
      lines.push(colors.green(`Test message sent to ${report.message.channel}. Check your direct messages.`));
      break;
    case 'failed':
      lines.push(colors.red(`Test message failed: ${report.message.error}`));
      if (report.message.hint) lines.push(`  ${report.message.hint}`);
      break;
  }

  return lines;
}
