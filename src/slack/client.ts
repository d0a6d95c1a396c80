import { ErrorCode, LogLevel, WebClient } from '@slack/web-api';
import type { ChannelLookup, ChatPlatform, CreateChannelResult, LookupOptions } from './types.js';
import { ChatPlatformError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'slack-client' });

const PAGE_SIZE = 200;
const MAX_PAGES = 20;

export interface SlackPlatformOptions {
  token: string;
  timeoutMs: number;
}

export function formatMention(userId: string): string {
  return `<@${userId}>`;
}

/**
 * The Slack error code (`name_taken`, `already_in_channel`, ...) carried by a
 * platform error, or null for anything else.
 */
export function platformErrorCode(err: unknown): string | null {
  if (
    typeof err === 'object' && err !== null
    && 'code' in err && err.code === ErrorCode.PlatformError
    && 'data' in err && typeof err.data === 'object' && err.data !== null
    && 'error' in err.data && typeof err.data.error === 'string'
  ) {
    return err.data.error;
  }
  return null;
}

/**
 * Chat platform on the Slack Web API. Each call gets one attempt within the
 * configured timeout.
 */
export class SlackChatPlatform implements ChatPlatform {
  private client: WebClient;

  constructor(options: SlackPlatformOptions, client?: WebClient) {
    this.client = client ?? new WebClient(options.token, {
      timeout: options.timeoutMs,
      retryConfig: { retries: 0 },
      rejectRateLimitedCalls: true,
      logLevel: LogLevel.ERROR,
    });
  }

  async findChannelByName(name: string, options: LookupOptions = {}): Promise<ChannelLookup> {
    let cursor: string | undefined;

    try {
      for (let page = 0; page < MAX_PAGES; page++) {
        const result = await this.client.conversations.list({
          types: 'private_channel,public_channel',
          exclude_archived: !options.includeArchived,
          limit: PAGE_SIZE,
          cursor,
        });

        const match = result.channels?.find(c => c.name === name && c.id);
        if (match?.id) {
          return { found: true, handle: match.id };
        }

        cursor = result.response_metadata?.next_cursor || undefined;
        if (!cursor) break;
      }
    } catch (err) {
      throw new ChatPlatformError('conversations.list', err);
    }

    return { found: false };
  }

  async createPrivateChannel(name: string): Promise<CreateChannelResult> {
    try {
      const result = await this.client.conversations.create({ name, is_private: true });
      const handle = result.channel?.id;
      if (!handle) {
        throw new ChatPlatformError('conversations.create', 'response carried no channel id');
      }
      return { status: 'created', handle };
    } catch (err) {
      if (platformErrorCode(err) === 'name_taken') {
        log.debug({ name }, 'Channel name already taken');
        return { status: 'exists' };
      }
      if (err instanceof ChatPlatformError) throw err;
      throw new ChatPlatformError('conversations.create', err);
    }
  }

  async inviteUser(channelHandle: string, userId: string): Promise<void> {
    try {
      await this.client.conversations.invite({ channel: channelHandle, users: userId });
    } catch (err) {
      const code = platformErrorCode(err);
      if (code === 'already_in_channel' || code === 'cant_invite_self') {
        return;
      }
      throw new ChatPlatformError('conversations.invite', err);
    }
  }

  async postMessage(channelHandle: string, text: string): Promise<void> {
    try {
      await this.client.chat.postMessage({
        channel: channelHandle,
        text,
        unfurl_links: false,
        unfurl_media: false,
      });
    } catch (err) {
      throw new ChatPlatformError('chat.postMessage', err);
    }
  }
}
