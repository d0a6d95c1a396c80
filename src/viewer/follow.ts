import fs from 'fs';
import { open, stat } from 'fs/promises';
import { parseNotificationLog } from '../notifications/log-file.js';
import type { InvalidLine, NotificationRecord } from '../notifications/log-file.js';

export interface FollowHandlers {
  onRecord: (record: NotificationRecord) => void;
  onInvalid: (line: InvalidLine) => void;
  onError: (err: Error) => void;
}

/**
 * Tails the notification log from a byte offset. Holds back a trailing partial
 * line until its newline arrives, and starts over when the file shrinks (cleared).
 */
export class LogFollower {
  private offset: number;
  private partial = '';
  private reading = false;
  private pending = false;

  constructor(
    private logPath: string,
    private handlers: FollowHandlers,
    startOffset = 0
  ) {
    this.offset = startOffset;
  }

  async poll(): Promise<void> {
    if (this.reading) {
      this.pending = true;
      return;
    }
    this.reading = true;

    try {
      do {
        this.pending = false;
        await this.readNew();
      } while (this.pending);
    } catch (err) {
      this.handlers.onError(err instanceof Error ? err : new Error(String(err)));
    } finally {
      this.reading = false;
    }
  }

  private async readNew(): Promise<void> {
    let size: number;
    try {
      size = (await stat(this.logPath)).size;
    } catch {
      // Not created yet, or cleared.
      this.offset = 0;
      this.partial = '';
      return;
    }

    if (size < this.offset) {
      this.offset = 0;
      this.partial = '';
    }
    if (size === this.offset) return;

    const handle = await open(this.logPath, 'r');
    try {
      const length = size - this.offset;
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, this.offset);
      this.offset += bytesRead;
      this.emit(buffer.subarray(0, bytesRead).toString('utf-8'));
    } finally {
      await handle.close();
    }
  }

  private emit(chunk: string): void {
    const text = this.partial + chunk;
    const lastNewline = text.lastIndexOf('\n');
    if (lastNewline === -1) {
      this.partial = text;
      return;
    }

    this.partial = text.slice(lastNewline + 1);
    const { records, invalid } = parseNotificationLog(text.slice(0, lastNewline));
    records.forEach(record => this.handlers.onRecord(record));
    invalid.forEach(line => this.handlers.onInvalid(line));
  }

  /**
   * Poll the file on an interval until the returned stop function is called.
   */
  watch(intervalMs = 500): () => void {
    const listener = () => {
      void this.poll();
    };
    fs.watchFile(this.logPath, { interval: intervalMs }, listener);
    return () => fs.unwatchFile(this.logPath, listener);
  }
}
