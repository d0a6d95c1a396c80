import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { ChannelMapping } from '../slack/types.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'channel-cache' });

export const MEMORY_CACHE = 'memory';

export interface ChannelCache {
  get(channelKey: string): ChannelMapping | null;
  set(mapping: ChannelMapping): void;
  delete(channelKey: string): void;
  close(): void;
}

/**
 * Per-process cache. Nothing survives the invocation.
 */
export class MemoryChannelCache implements ChannelCache {
  private mappings = new Map<string, ChannelMapping>();

  get(channelKey: string): ChannelMapping | null {
    return this.mappings.get(channelKey) ?? null;
  }

  set(mapping: ChannelMapping): void {
    this.mappings.set(mapping.channelKey, { ...mapping });
  }

  delete(channelKey: string): void {
    this.mappings.delete(channelKey);
  }

  close(): void {
    this.mappings.clear();
  }
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS channels (
    channel_key TEXT PRIMARY KEY,
    channel_handle TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
`;

interface ChannelRow {
  channelKey: string;
  channelHandle: string;
}

function isChannelRow(row: unknown): row is ChannelRow {
  return typeof row === 'object' && row !== null
    && 'channelKey' in row && typeof row.channelKey === 'string'
    && 'channelHandle' in row && typeof row.channelHandle === 'string';
}

/**
 * Cache shared by every hook invocation on this machine. Read and write
 * failures are logged and read as misses; the router then asks the platform again.
 */
export class SqliteChannelCache implements ChannelCache {
  constructor(private database: Database.Database) {
    this.database.exec(SCHEMA);
  }

  get(channelKey: string): ChannelMapping | null {
    try {
      const row: unknown = this.database.prepare(`
        SELECT channel_key as channelKey, channel_handle as channelHandle
        FROM channels
        WHERE channel_key = ?
      `).get(channelKey);

      if (!isChannelRow(row)) return null;
      return { channelKey: row.channelKey, channelHandle: row.channelHandle, created: true };
    } catch (err) {
      log.warn({ err, channelKey }, 'Failed to read channel cache');
      return null;
    }
  }

  set(mapping: ChannelMapping): void {
    if (!mapping.created) return;

    try {
      this.database.prepare(`
        INSERT INTO channels (channel_key, channel_handle, updated_at)
        VALUES (?, ?, ?)
        ON CONFLICT(channel_key) DO UPDATE SET
          channel_handle = excluded.channel_handle,
          updated_at = excluded.updated_at
      `).run(mapping.channelKey, mapping.channelHandle, new Date().toISOString());
    } catch (err) {
      log.warn({ err, channelKey: mapping.channelKey }, 'Failed to write channel cache');
    }
  }

  delete(channelKey: string): void {
    try {
      this.database.prepare('DELETE FROM channels WHERE channel_key = ?').run(channelKey);
    } catch (err) {
      log.warn({ err, channelKey }, 'Failed to delete channel cache entry');
    }
  }

  close(): void {
    this.database.close();
  }
}

/**
 * Open the cache at `cachePath`, or an in-memory one for `memory`. Falls back to
 * memory when the database cannot be opened.
 */
export function openChannelCache(cachePath: string): ChannelCache {
  if (cachePath === MEMORY_CACHE) {
    return new MemoryChannelCache();
  }

  try {
    const dir = path.dirname(cachePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const db = new Database(cachePath, { timeout: 2000 });
    db.pragma('journal_mode = WAL');
    log.debug({ path: cachePath }, 'Channel cache opened');
    return new SqliteChannelCache(db);
  } catch (err) {
    log.warn({ err, path: cachePath }, 'Channel cache unavailable, using memory');
    return new MemoryChannelCache();
  }
}
