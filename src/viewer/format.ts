import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { EventKind } from '../hooks/types.js';
import type { NotificationRecord } from '../notifications/log-file.js';

const SHORT_SESSION_LENGTH = 8;

function kindColor(colors: ChalkInstance, kind: EventKind): ChalkInstance {
  switch (kind) {
    case 'SessionPause':
      return colors.yellow;
    case 'ApprovalNeeded':
      return colors.magenta;
    case 'UserMessageSubmitted':
      return colors.green;
    case 'ToolCompleted':
      return colors.blue;
    case 'SessionEnded':
      return colors.red;
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:MM:SS`, in local time unless `utc` is set. Unparseable input is returned as is.
 */
export function formatTimestamp(iso: string, utc = false): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;

  const parts = utc
    ? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate(), date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()]
    : [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes(), date.getSeconds()];

  const [year, month, day, hours, minutes, seconds] = parts.map(pad);
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
}

export interface FormatOptions {
  utc?: boolean;
  colors?: ChalkInstance;
}

export function formatRecord(record: NotificationRecord, options: FormatOptions = {}): string {
  const colors = options.colors ?? chalk;
  const sessionShort = record.sessionId.slice(0, SHORT_SESSION_LENGTH);

  return [
    `${colors.bold(`[${formatTimestamp(record.timestamp, options.utc)}]`)} ${kindColor(colors, record.eventKind)(`Session ${sessionShort}`)}`,
    `  ${colors.green('Path:')} ${record.repositoryPath}`,
    `  ${colors.blue('Task:')} ${record.description}`,
    `  ${colors.yellow('Event:')} ${record.eventKind}`,
    '',
  ].join('\n');
}
