import { describe, expect, it } from 'vitest';
import { normalizeEvent, PLACEHOLDER_SESSION_ID, resolveEventKind } from './normalizer.js';
import { MalformedEventError, UnknownEventKindError } from '../utils/errors.js';

const now = new Date('2026-10-18T09:30:00.000Z');

describe('resolveEventKind', () => {
  it('maps hook names to kinds', () => {
    expect(resolveEventKind('Stop')).toBe('SessionPause');
    expect(resolveEventKind('SubagentStop')).toBe('SessionPause');
    expect(resolveEventKind('Notification')).toBe('ApprovalNeeded');
    expect(resolveEventKind('PreToolUse')).toBe('ApprovalNeeded');
    expect(resolveEventKind('UserPromptSubmit')).toBe('UserMessageSubmitted');
    expect(resolveEventKind('PostToolUse')).toBe('ToolCompleted');
    expect(resolveEventKind('SessionEnd')).toBe('SessionEnded');
  });

  it('accepts kind names and rejects everything else', () => {
    expect(resolveEventKind(' ToolCompleted ')).toBe('ToolCompleted');
    expect(resolveEventKind('PreCompact')).toBeNull();
    expect(resolveEventKind('')).toBeNull();
    expect(resolveEventKind(undefined)).toBeNull();
  });
});

describe('normalizeEvent', () => {
  it('builds a pause event from a Stop hook', () => {
    const event = normalizeEvent(undefined, {
      hook_event_name: 'Stop',
      session_id: 'abc123',
      cwd: '/repo',
      transcript_path: '/home/dev/.claude/projects/repo/abc123.jsonl',
      last_assistant_message: 'Done.',
    }, { now });

    expect(event).toEqual({
      kind: 'SessionPause',
      sessionId: 'abc123',
      workingDirectory: '/repo',
      transcriptPath: '/home/dev/.claude/projects/repo/abc123.jsonl',
      receivedAt: '2026-10-18T09:30:00.000Z',
      message: 'Done.',
    });
  });

  it('prefers the caller-supplied kind over the input field', () => {
    const event = normalizeEvent('SessionEnd', {
      hook_event_name: 'Stop',
      session_id: 'abc123',
      cwd: '/repo',
      reason: 'logout',
    }, { now });

    expect(event.kind).toBe('SessionEnded');
    expect(event).toMatchObject({ reason: 'logout' });
  });

  it('keeps the pending tool for approval events', () => {
    const event = normalizeEvent('PreToolUse', {
      session_id: 'abc123',
      cwd: '/repo',
      tool_name: 'Bash',
      tool_input: { command: 'rm -rf /tmp/x' },
    }, { now });

    expect(event).toMatchObject({
      kind: 'ApprovalNeeded',
      toolName: 'Bash',
      toolInput: { command: 'rm -rf /tmp/x' },
    });
  });

  it('defaults a missing prompt and tool name', () => {
    const prompt = normalizeEvent('UserPromptSubmit', { session_id: 's', cwd: '/repo' }, { now });
    const tool = normalizeEvent('PostToolUse', { session_id: 's', cwd: '/repo' }, { now });

    expect(prompt).toMatchObject({ kind: 'UserMessageSubmitted', prompt: '' });
    expect(tool).toMatchObject({ kind: 'ToolCompleted', toolName: 'unknown tool', toolInput: {} });
  });

  it('throws with a placeholder event when the session id is missing', () => {
    let caught: unknown;
    try {
      normalizeEvent('Stop', { cwd: '/repo', message: 'Done.' }, { now });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(MalformedEventError);
    if (caught instanceof MalformedEventError) {
      expect(caught.missingFields).toEqual(['session_id']);
      expect(caught.placeholder).toMatchObject({
        kind: 'SessionPause',
        sessionId: PLACEHOLDER_SESSION_ID,
        workingDirectory: '/repo',
        message: 'Done.',
      });
    }
  });

  it('substitutes the fallback directory for a missing cwd', () => {
    let caught: unknown;
    try {
      normalizeEvent('Stop', null, { now, fallbackWorkingDirectory: '/work/here' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(MalformedEventError);
    if (caught instanceof MalformedEventError) {
      expect(caught.missingFields).toEqual(['session_id', 'cwd']);
      expect(caught.placeholder.workingDirectory).toBe('/work/here');
    }
  });

  it('treats a mistyped field as missing', () => {
    expect(() => normalizeEvent('Stop', { session_id: 42, cwd: '/repo' }, { now }))
      .toThrow(MalformedEventError);
  });

  it('rejects an unknown kind', () => {
    expect(() => normalizeEvent(undefined, { hook_event_name: 'PreCompact', session_id: 's', cwd: '/repo' }))
      .toThrow(UnknownEventKindError);
  });
});
