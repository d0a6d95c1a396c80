import type { Config } from '../config/index.js';
import { AnthropicSummarizer } from '../claude/summarizer.js';
import { hardTruncate, resolveChatDescription } from '../description/condense.js';
import type { LengthPolicy, Summarizer } from '../description/condense.js';
import { describeEvent } from '../description/resolver.js';
import type { TranscriptReader } from '../description/resolver.js';
import { normalizeEvent } from '../hooks/normalizer.js';
import type { EventKind, HookEvent } from '../hooks/types.js';
import { identifyRepository } from '../repository/identity.js';
import { SlackChatPlatform } from '../slack/client.js';
import { ChannelRouter, DirectMessageRouter } from '../slack/router.js';
import type { Router } from '../slack/router.js';
import type { ChatPlatform } from '../slack/types.js';
import { openChannelCache } from '../storage/channel-cache.js';
import type { ChannelCache } from '../storage/channel-cache.js';
import { LogWriteFailedError, MalformedEventError, UnknownEventKindError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { deliverToChat } from './chat-sink.js';
import { appendNotification } from './log-file.js';
import type { NotificationRecord } from './log-file.js';
import { composeChatMessage, dispatchRule } from './policy.js';

const log = logger.child({ component: 'pipeline' });

export interface ChatTarget {
  platform: ChatPlatform;
  router: Router;
  userId: string;
}

export interface PipelineOptions {
  logPath: string;
  // null when the chat credential or target user is not configured.
  chat: ChatTarget | null;
  summarizer: Summarizer | null;
  lengthPolicy: LengthPolicy;
  condenseTimeoutMs: number;
  // Closed with the pipeline.
  cache?: ChannelCache;
  readTranscript?: TranscriptReader;
  now?: () => Date;
}

export type ChatDelivery = 'sent' | 'disabled' | 'unavailable' | 'failed';

export interface PipelineResult {
  kind: EventKind;
  record: NotificationRecord;
  logError: LogWriteFailedError | null;
  chat: ChatDelivery;
  chatMessage: string | null;
}

export function toNotificationRecord(event: HookEvent, description: string): NotificationRecord {
  return {
    timestamp: event.receivedAt,
    sessionId: event.sessionId,
    repositoryPath: event.workingDirectory,
    description,
    eventKind: event.kind,
    ...(event.transcriptPath ? { transcriptPath: event.transcriptPath } : {}),
  };
}

/**
 * Runs one hook event through normalization, description, routing and the sinks.
 * Only a failed log write is reported back; every other failure degrades to a fallback.
 */
export class NotificationPipeline {
  constructor(private options: PipelineOptions) {}

  /**
   * @returns null when the kind label names no known event
   */
  async process(kindLabel: string | undefined, raw: unknown): Promise<PipelineResult | null> {
    const now = this.options.now?.() ?? new Date();

    let event: HookEvent;
    try {
      event = normalizeEvent(kindLabel, raw, { now });
    } catch (err) {
      if (err instanceof UnknownEventKindError) {
        log.warn({ label: err.context?.label }, 'Ignoring unrecognised hook event');
        return null;
      }
      if (err instanceof MalformedEventError) {
        log.warn({ missing: err.missingFields }, 'Malformed hook input, using placeholders');
        event = err.placeholder;
      } else {
        throw err;
      }
    }

    const rule = dispatchRule(event.kind);
    const description = hardTruncate(
      await describeEvent(event, { readTranscript: this.options.readTranscript }),
      this.options.lengthPolicy.maxLength
    );
    const record = toNotificationRecord(event, description);

    let logError: LogWriteFailedError | null = null;
    if (rule.log) {
      logError = await this.writeLog(record);
    }

    let chat: ChatDelivery = 'disabled';
    let chatMessage: string | null = null;
    if (rule.chat && this.options.chat) {
      try {
        ({ chat, chatMessage } = await this.sendChat(event, description, this.options.chat));
      } catch (err) {
        log.error({ err, kind: event.kind }, 'Chat delivery failed');
        chat = 'failed';
      }
    }

    log.debug({ kind: event.kind, sessionId: event.sessionId, chat, logged: !logError }, 'Event processed');

    return { kind: event.kind, record, logError, chat, chatMessage };
  }

  close(): void {
    this.options.cache?.close();
  }

  private async writeLog(record: NotificationRecord): Promise<LogWriteFailedError | null> {
    try {
      await appendNotification(this.options.logPath, record);
      return null;
    } catch (err) {
      if (err instanceof LogWriteFailedError) {
        log.error({ err }, 'Notification log write failed');
        return err;
      }
      throw err;
    }
  }

  private async sendChat(
    event: HookEvent,
    description: string,
    target: ChatTarget
  ): Promise<{ chat: ChatDelivery; chatMessage: string | null }> {
    const [identity, chatDescription] = await Promise.all([
      identifyRepository(event.workingDirectory),
      resolveChatDescription(
        description,
        this.options.summarizer,
        this.options.lengthPolicy,
        this.options.condenseTimeoutMs
      ),
    ]);

    const route = await target.router.route(target.userId, identity);
    if (!route.ok) {
      return { chat: 'unavailable', chatMessage: null };
    }

    const message = composeChatMessage(event.kind, chatDescription.text, target.userId);
    const sent = await deliverToChat(target.platform, route.mapping, message);
    if (!sent) {
      target.router.invalidate(route.mapping);
    }

    return { chat: sent ? 'sent' : 'failed', chatMessage: message };
  }
}

/**
 * Wire the pipeline from configuration. Chat needs both the bot token and the
 * user id; condensation needs the summarization key.
 */
export function createPipeline(cfg: Config): NotificationPipeline {
  const { botToken, userId } = cfg.slack;
  let chat: ChatTarget | null = null;
  let cache: ChannelCache | undefined;

  if (botToken && userId) {
    const platform = new SlackChatPlatform({ token: botToken, timeoutMs: cfg.slack.timeoutMs });
    let router: Router;
    if (cfg.slack.routing === 'dm') {
      router = new DirectMessageRouter();
    } else {
      cache = openChannelCache(cfg.cache.path);
      router = new ChannelRouter(platform, cache);
    }
    chat = { platform, router, userId };
  } else {
    log.debug('Chat sink disabled: SLACK_BOT_TOKEN or SLACK_USER_ID not set');
  }

  const summarizer = cfg.summary.apiKey
    ? new AnthropicSummarizer({ apiKey: cfg.summary.apiKey, model: cfg.summary.model })
    : null;

  return new NotificationPipeline({
    logPath: cfg.notifications.logPath,
    chat,
    summarizer,
    lengthPolicy: cfg.description,
    condenseTimeoutMs: cfg.summary.timeoutMs,
    cache,
  });
}
