import type { ChannelMapping, ChatPlatform } from '../slack/types.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'chat-sink' });

/**
 * Post a composed message to the routed channel. Best effort: a failure is
 * logged and reported as false, never thrown, and never retried.
 */
export async function deliverToChat(
  platform: ChatPlatform,
  mapping: ChannelMapping,
  text: string
): Promise<boolean> {
  try {
    await platform.postMessage(mapping.channelHandle, text);
    log.debug({ channelKey: mapping.channelKey }, 'Posted notification');
    return true;
  } catch (err) {
    log.error({ err, channelKey: mapping.channelKey, channelHandle: mapping.channelHandle }, 'Failed to post notification');
    return false;
  }
}
