import { z } from 'zod';

export const EVENT_KINDS = [
  'SessionPause',
  'ApprovalNeeded',
  'UserMessageSubmitted',
  'ToolCompleted',
  'SessionEnded',
] as const;

export type EventKind = typeof EVENT_KINDS[number];

export type ToolInput = Record<string, unknown>;

export type EventPayload =
  | { kind: 'SessionPause'; message?: string }
  | { kind: 'ApprovalNeeded'; toolName?: string; toolInput: ToolInput; message?: string }
  | { kind: 'UserMessageSubmitted'; prompt: string }
  | { kind: 'ToolCompleted'; toolName: string; toolInput: ToolInput }
  | { kind: 'SessionEnded'; reason?: string };

interface EventBase {
  readonly sessionId: string;
  readonly workingDirectory: string;
  readonly transcriptPath?: string;
  readonly receivedAt: string;
}

export type HookEvent = EventBase & Readonly<EventPayload>;

export type HookEventOf<K extends EventKind> = Extract<HookEvent, { kind: K }>;

const optionalString = z.string().optional().catch(undefined);

// A mistyped field reads as absent; unknown keys are kept so newer hook payloads still parse.
export const hookInputSchema = z.object({
  session_id: optionalString,
  cwd: optionalString,
  transcript_path: optionalString,
  hook_event_name: optionalString,
  message: optionalString,
  last_assistant_message: optionalString,
  prompt: optionalString,
  tool_name: optionalString,
  tool_input: z.record(z.unknown()).optional().catch(undefined),
  reason: optionalString,
}).passthrough();

export type HookInput = z.infer<typeof hookInputSchema>;
