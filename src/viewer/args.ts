export const DEFAULT_COUNT = 10;

export interface ViewerOptions {
  follow: boolean;
  clear: boolean;
  count: number;
  utc: boolean;
}

export type ViewerCommand =
  | { type: 'show'; options: ViewerOptions }
  | { type: 'help' }
  | { type: 'error'; message: string };

export function parseViewerArgs(argv: string[]): ViewerCommand {
  const options: ViewerOptions = { follow: false, clear: false, count: DEFAULT_COUNT, utc: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '-f':
      case '--follow':
        options.follow = true;
        break;

      case '-c':
      case '--clear':
        options.clear = true;
        break;

      case '--utc':
        options.utc = true;
        break;

      case '-n':
      case '--lines': {
        const value = argv[i + 1];
        const count = value !== undefined ? Number(value) : NaN;
        if (!Number.isInteger(count) || count < 0) {
          return { type: 'error', message: `${arg} expects a non-negative integer` };
        }
        options.count = count;
        i++;
        break;
      }

      case '-h':
      case '--help':
        return { type: 'help' };

      default:
        return { type: 'error', message: `Unknown option: ${arg}` };
    }
  }

  return { type: 'show', options };
}

export function usage(program = 'session-relay-view'): string {
  return [
    `Usage: ${program} [OPTIONS]`,
    '',
    'Options:',
    '  -f, --follow     Follow notifications in real time',
    `  -n NUM           Show the last NUM notifications (default: ${DEFAULT_COUNT})`,
    '  -c, --clear      Delete all notifications',
    '      --utc        Show timestamps in UTC',
    '  -h, --help       Show this help message',
  ].join('\n');
}
