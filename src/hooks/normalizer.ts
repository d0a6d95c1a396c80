import { EVENT_KINDS, hookInputSchema } from './types.js';
import type { EventKind, EventPayload, HookEvent, HookInput } from './types.js';
import { MalformedEventError, UnknownEventKindError } from '../utils/errors.js';

export const PLACEHOLDER_SESSION_ID = 'unknown';

const HOOK_NAME_TO_KIND: Record<string, EventKind> = {
  Stop: 'SessionPause',
  SubagentStop: 'SessionPause',
  Notification: 'ApprovalNeeded',
  PreToolUse: 'ApprovalNeeded',
  PermissionRequest: 'ApprovalNeeded',
  UserPromptSubmit: 'UserMessageSubmitted',
  PostToolUse: 'ToolCompleted',
  SessionEnd: 'SessionEnded',
};

function isEventKind(label: string): label is EventKind {
  return (EVENT_KINDS as readonly string[]).includes(label);
}

/**
 * Map a hook name (`Stop`, `PreToolUse`, ...) or a kind name to an event kind.
 */
export function resolveEventKind(label: string | undefined): EventKind | null {
  if (!label) return null;
  const trimmed = label.trim();
  if (isEventKind(trimmed)) return trimmed;
  return HOOK_NAME_TO_KIND[trimmed] ?? null;
}

function buildPayload(kind: EventKind, input: HookInput): EventPayload {
  switch (kind) {
    case 'SessionPause':
      return { kind, message: input.last_assistant_message ?? input.message };

    case 'ApprovalNeeded':
      return {
        kind,
        toolName: input.tool_name,
        toolInput: input.tool_input ?? {},
        message: input.message,
      };

    case 'UserMessageSubmitted':
      return { kind, prompt: input.prompt ?? '' };

    case 'ToolCompleted':
      return { kind, toolName: input.tool_name ?? 'unknown tool', toolInput: input.tool_input ?? {} };

    case 'SessionEnded':
      return { kind, reason: input.reason };
  }
}

export interface NormalizeOptions {
  now?: Date;
  // Stands in for a missing `cwd`; hooks run inside the project directory.
  fallbackWorkingDirectory?: string;
}

/**
 * Turn one raw hook input into an event.
 *
 * The kind comes from `kindLabel` when the caller supplies one, else from the
 * input's `hook_event_name`. Throws `UnknownEventKindError` when neither names a
 * known kind, and `MalformedEventError` (carrying a placeholder event) when the
 * session id or working directory is missing.
 */
export function normalizeEvent(
  kindLabel: string | undefined,
  raw: unknown,
  options: NormalizeOptions = {}
): HookEvent {
  const parsed = hookInputSchema.safeParse(raw);
  const input: HookInput = parsed.success ? parsed.data : {};

  const label = kindLabel ?? input.hook_event_name;
  const kind = resolveEventKind(label);
  if (!kind) {
    throw new UnknownEventKindError(label ?? '');
  }

  const missing: string[] = [];
  if (!input.session_id) missing.push('session_id');
  if (!input.cwd) missing.push('cwd');

  const event: HookEvent = {
    sessionId: input.session_id ?? PLACEHOLDER_SESSION_ID,
    workingDirectory: input.cwd ?? options.fallbackWorkingDirectory ?? process.cwd(),
    transcriptPath: input.transcript_path || undefined,
    receivedAt: (options.now ?? new Date()).toISOString(),
    ...buildPayload(kind, input),
  };

  if (missing.length > 0) {
    throw new MalformedEventError(missing, event);
  }

  return event;
}
