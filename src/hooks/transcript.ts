import { readFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'transcript' });

// Only the tail is scanned; the latest assistant turn sits near the end.
export const TRANSCRIPT_TAIL_LINES = 20;

function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function contentText(content: unknown): string | null {
  if (typeof content === 'string') {
    return content.trim() || null;
  }

  if (Array.isArray(content)) {
    const texts = content
      .filter(isRecord)
      .filter(block => block.type === 'text' && typeof block.text === 'string')
      .map(block => String(block.text).trim())
      .filter(Boolean);
    return texts.length > 0 ? texts.join('\n') : null;
  }

  return null;
}

/**
 * Pull the assistant text out of one transcript entry. Accepts both
 * `{ type: 'assistant', message: { content } }` and `{ role: 'assistant', content }`.
 */
export function assistantText(entry: unknown): string | null {
  if (!isRecord(entry)) return null;

  if (entry.type === 'assistant' && isRecord(entry.message)) {
    return contentText(entry.message.content);
  }

  if (entry.role === 'assistant') {
    return contentText(entry.content);
  }

  return null;
}

/**
 * Read the latest assistant message from a transcript JSONL file.
 * Returns null when the file is missing, unreadable, or has no assistant text in its tail.
 */
export async function readLastAssistantMessage(transcriptPath: string): Promise<string | null> {
  let content: string;
  try {
    content = await readFile(expandHome(transcriptPath), 'utf-8');
  } catch (err) {
    log.debug({ err, transcriptPath }, 'Transcript not readable');
    return null;
  }

  const lines = content.split('\n').filter(line => line.trim() !== '');

  for (const line of lines.slice(-TRANSCRIPT_TAIL_LINES).reverse()) {
    let entry: unknown;
    try {
      entry = JSON.parse(line);
    } catch {
      continue;
    }

    const text = assistantText(entry);
    if (text) return text;
  }

  return null;
}
