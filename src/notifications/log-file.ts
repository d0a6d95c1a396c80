import { mkdir, open, readFile, rm } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { EVENT_KINDS } from '../hooks/types.js';
import { LogWriteFailedError } from '../utils/errors.js';

export const notificationRecordSchema = z.object({
  timestamp: z.string(),
  sessionId: z.string(),
  repositoryPath: z.string(),
  description: z.string(),
  eventKind: z.enum(EVENT_KINDS),
  transcriptPath: z.string().optional(),
});

export type NotificationRecord = z.infer<typeof notificationRecordSchema>;

export interface InvalidLine {
  lineNumber: number;
  line: string;
  reason: string;
}

export interface ParsedLog {
  records: NotificationRecord[];
  invalid: InvalidLine[];
}

/**
 * Append one record as a JSON line. The record goes out in a single write on
 * an O_APPEND descriptor, so lines from concurrent hook processes do not interleave.
 *
 * @throws LogWriteFailedError
 */
export async function appendNotification(logPath: string, record: NotificationRecord): Promise<void> {
  const line = `${JSON.stringify(record)}\n`;

  try {
    await mkdir(path.dirname(logPath), { recursive: true });
    const handle = await open(logPath, 'a');
    try {
      await handle.write(line);
    } finally {
      await handle.close();
    }
  } catch (err) {
    throw new LogWriteFailedError(logPath, err);
  }
}

export function parseNotificationLog(content: string): ParsedLog {
  const records: NotificationRecord[] = [];
  const invalid: InvalidLine[] = [];

  content.split('\n').forEach((line, index) => {
    if (!line.trim()) return;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      invalid.push({ lineNumber: index + 1, line, reason: err instanceof Error ? err.message : 'invalid JSON' });
      return;
    }

    const result = notificationRecordSchema.safeParse(json);
    if (result.success) {
      records.push(result.data);
    } else {
      invalid.push({
        lineNumber: index + 1,
        line,
        reason: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '),
      });
    }
  });

  return { records, invalid };
}

/**
 * Read the whole log. A missing file reads as empty.
 */
export async function readNotificationLog(logPath: string): Promise<ParsedLog> {
  let content: string;
  try {
    content = await readFile(logPath, 'utf-8');
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      return { records: [], invalid: [] };
    }
    throw err;
  }
  return parseNotificationLog(content);
}

/**
 * Delete the log file. Returns false when there was nothing to delete.
 */
export async function clearNotificationLog(logPath: string): Promise<boolean> {
  try {
    await rm(logPath);
    return true;
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}
