import stripAnsi from 'strip-ansi';
import type { HookEvent, HookEventOf, ToolInput } from '../hooks/types.js';
import { readLastAssistantMessage } from '../hooks/transcript.js';

export const WAITING_FOR_INPUT = 'waiting for input';
export const NEEDS_APPROVAL = 'needs your approval';
export const SESSION_ENDED = 'session ended';
export const EMPTY_MESSAGE = '(empty message)';

const EDIT_TOOLS = new Set(['Edit', 'MultiEdit', 'Write', 'NotebookEdit']);

export type TranscriptReader = (transcriptPath: string) => Promise<string | null>;

export interface DescribeOptions {
  readTranscript?: TranscriptReader;
}

/**
 * Strip terminal escapes and surrounding whitespace from description text
 */
export function cleanText(text: string): string {
  return stripAnsi(text).replace(/\0/g, '').trim();
}

function stringField(input: ToolInput, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = input[key];
    if (typeof value === 'string' && value.trim()) {
      return cleanText(value);
    }
  }
  return undefined;
}

/**
 * Describe a pending tool call as "{action}: {target}", or "use {tool}" when the
 * tool has no recognised primary argument.
 */
export function describeToolAction(toolName: string, input: ToolInput): string {
  switch (toolName) {
    case 'Bash': {
      const command = stringField(input, 'command');
      return command ? `run: ${command}` : 'run a command';
    }

    case 'Write': {
      const filePath = stringField(input, 'file_path');
      return filePath ? `write: ${filePath}` : 'write a file';
    }

    case 'Edit':
    case 'MultiEdit':
    case 'NotebookEdit': {
      const filePath = stringField(input, 'file_path', 'notebook_path');
      return filePath ? `edit: ${filePath}` : 'edit a file';
    }

    case 'Read': {
      const filePath = stringField(input, 'file_path');
      return filePath ? `read: ${filePath}` : 'read a file';
    }

    case 'WebFetch': {
      const url = stringField(input, 'url');
      return url ? `fetch: ${url}` : 'fetch a URL';
    }

    default:
      return `use ${toolName}`;
  }
}

async function describePause(
  event: HookEventOf<'SessionPause'>,
  readTranscript: TranscriptReader
): Promise<string> {
  if (event.transcriptPath) {
    const fromTranscript = await readTranscript(event.transcriptPath);
    if (fromTranscript) {
      const cleaned = cleanText(fromTranscript);
      if (cleaned) return cleaned;
    }
  }

  if (event.message) {
    const cleaned = cleanText(event.message);
    if (cleaned) return cleaned;
  }

  return WAITING_FOR_INPUT;
}

function describeApproval(event: HookEventOf<'ApprovalNeeded'>): string {
  if (event.toolName) {
    return `wants to ${describeToolAction(event.toolName, event.toolInput)}`;
  }

  const message = event.message ? cleanText(event.message) : '';
  return message || NEEDS_APPROVAL;
}

function describeToolCompletion(event: HookEventOf<'ToolCompleted'>): string {
  if (EDIT_TOOLS.has(event.toolName)) {
    const filePath = stringField(event.toolInput, 'file_path', 'notebook_path');
    if (filePath) return `edited: ${filePath}`;
  }
  return `ran: ${event.toolName}`;
}

/**
 * Produce the full, uncondensed description of an event. This is what the log
 * sink records; the chat sink applies the length policy on top.
 */
export async function describeEvent(
  event: HookEvent,
  options: DescribeOptions = {}
): Promise<string> {
  const readTranscript = options.readTranscript ?? readLastAssistantMessage;

  switch (event.kind) {
    case 'SessionPause':
      return describePause(event, readTranscript);

    case 'ApprovalNeeded':
      return describeApproval(event);

    case 'UserMessageSubmitted':
      return cleanText(event.prompt) || EMPTY_MESSAGE;

    case 'ToolCompleted':
      return describeToolCompletion(event);

    case 'SessionEnded':
      return SESSION_ENDED;
  }
}
