import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  appendNotification,
  clearNotificationLog,
  parseNotificationLog,
  readNotificationLog,
} from './log-file.js';
import type { NotificationRecord } from './log-file.js';
import { LogWriteFailedError } from '../utils/errors.js';

function record(index: number): NotificationRecord {
  return {
    timestamp: `2026-10-18T09:30:0${index}.000Z`,
    sessionId: `session-${index}`,
    repositoryPath: '/code/widgets',
    description: `event ${index}`,
    eventKind: 'ToolCompleted',
  };
}

describe('notification log', () => {
  let tmp: string;
  let logPath: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-log-'));
    logPath = path.join(tmp, 'logs', 'notifications.jsonl');
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('appends one JSON line per record in arrival order', async () => {
    for (let i = 0; i < 5; i++) {
      await appendNotification(logPath, record(i));
    }

    const lines = fs.readFileSync(logPath, 'utf-8').split('\n');
    expect(lines).toHaveLength(6);
    expect(lines[5]).toBe('');
    expect(lines.slice(0, 5).map(line => JSON.parse(line).sessionId)).toEqual([
      'session-0', 'session-1', 'session-2', 'session-3', 'session-4',
    ]);
  });

  it('keeps concurrent appends on separate whole lines', async () => {
    const writers = Array.from({ length: 40 }, (_, i) => appendNotification(logPath, {
      ...record(0),
      sessionId: `session-${i}`,
      description: String(i % 10).repeat(8 * 1024),
    }));

    await Promise.all(writers);

    const content = fs.readFileSync(logPath, 'utf-8');
    const parsed = parseNotificationLog(content);
    expect(content.endsWith('\n')).toBe(true);
    expect(content.split('\n')).toHaveLength(41);
    expect(parsed.invalid).toEqual([]);
    expect(parsed.records.map(r => r.sessionId).sort()).toEqual(
      Array.from({ length: 40 }, (_, i) => `session-${i}`).sort()
    );
    for (const r of parsed.records) {
      const index = Number(r.sessionId.slice('session-'.length));
      expect(r.description).toBe(String(index % 10).repeat(8 * 1024));
    }
  });

  it('never rewrites earlier lines', async () => {
    await appendNotification(logPath, record(0));
    const first = fs.readFileSync(logPath, 'utf-8');

    await appendNotification(logPath, record(1));

    expect(fs.readFileSync(logPath, 'utf-8').startsWith(first)).toBe(true);
  });

  it('omits an absent transcript path and keeps a present one', async () => {
    await appendNotification(logPath, record(0));
    await appendNotification(logPath, { ...record(1), transcriptPath: '/t/session-1.jsonl' });

    const [withoutPath, withPath] = fs.readFileSync(logPath, 'utf-8').trim().split('\n').map(line => JSON.parse(line));
    expect(Object.keys(withoutPath)).toEqual(['timestamp', 'sessionId', 'repositoryPath', 'description', 'eventKind']);
    expect(withPath.transcriptPath).toBe('/t/session-1.jsonl');
  });

  it('raises LogWriteFailedError when the file cannot be written', async () => {
    const blocker = path.join(tmp, 'not-a-dir');
    fs.writeFileSync(blocker, '');

    await expect(appendNotification(path.join(blocker, 'notifications.jsonl'), record(0)))
      .rejects.toBeInstanceOf(LogWriteFailedError);
  });

  it('reads back what was written', async () => {
    await appendNotification(logPath, record(0));
    await appendNotification(logPath, record(1));

    await expect(readNotificationLog(logPath)).resolves.toEqual({
      records: [record(0), record(1)],
      invalid: [],
    });
  });

  it('reads a missing log as empty', async () => {
    await expect(readNotificationLog(logPath)).resolves.toEqual({ records: [], invalid: [] });
  });

  it('reports lines that are not records', () => {
    const parsed = parseNotificationLog([
      JSON.stringify(record(0)),
      '{broken',
      JSON.stringify({ timestamp: 'x' }),
      '',
    ].join('\n'));

    expect(parsed.records).toEqual([record(0)]);
    expect(parsed.invalid.map(line => line.lineNumber)).toEqual([2, 3]);
  });

  it('clears the log', async () => {
    await appendNotification(logPath, record(0));

    await expect(clearNotificationLog(logPath)).resolves.toBe(true);
    expect(fs.existsSync(logPath)).toBe(false);
    await expect(clearNotificationLog(logPath)).resolves.toBe(false);
  });
});
