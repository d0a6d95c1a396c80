import type { EventKind } from '../hooks/types.js';
import { formatMention } from '../slack/client.js';

export type AttentionMode = 'ping' | 'mute';

export interface DispatchRule {
  log: boolean;
  chat: boolean;
  attention: AttentionMode;
  marker: string;
}

// SessionPause and ApprovalNeeded often fire for the same pause and both ping.
// Nothing correlates the two events, so the duplicate is kept.
export const DISPATCH_TABLE: Record<EventKind, DispatchRule> = {
  SessionPause: { log: true, chat: true, attention: 'ping', marker: '🟡' },
  ApprovalNeeded: { log: true, chat: true, attention: 'ping', marker: '🔔' },
  UserMessageSubmitted: { log: true, chat: true, attention: 'mute', marker: '💬' },
  ToolCompleted: { log: true, chat: true, attention: 'mute', marker: '🔵' },
  SessionEnded: { log: true, chat: true, attention: 'mute', marker: '⚫' },
};

export function dispatchRule(kind: EventKind): DispatchRule {
  return DISPATCH_TABLE[kind];
}

/**
 * Chat text: the kind's marker, a mention when the kind pings, then the description.
 */
export function composeChatMessage(kind: EventKind, description: string, userId: string): string {
  const rule = dispatchRule(kind);
  const parts = [rule.marker];
  if (rule.attention === 'ping') {
    parts.push(formatMention(userId));
  }
  parts.push(description);
  return parts.join(' ');
}
