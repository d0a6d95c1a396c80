import { DEFAULT_COMMAND, DEFAULT_HOOKS, isHookName, SUPPORTED_HOOKS } from './settings.js';
import type { InstallOptions, HookName } from './settings.js';

export type InstallCommand =
  | { type: 'install'; options: InstallOptions }
  | { type: 'help' }
  | { type: 'error'; message: string };

function parseHookList(value: string): HookName[] | string {
  const names = value.split(',').map(name => name.trim()).filter(Boolean);
  if (names.length === 0) return 'expects a comma-separated list of hook names';

  const hooks: HookName[] = [];
  for (const name of names) {
    if (!isHookName(name)) {
      return `unknown hook: ${name} (supported: ${SUPPORTED_HOOKS.join(', ')})`;
    }
    if (!hooks.includes(name)) hooks.push(name);
  }
  return hooks;
}

export function parseInstallArgs(argv: string[], cwd = process.cwd()): InstallCommand {
  const options: InstallOptions = {
    projectDir: cwd,
    local: false,
    hooks: [...DEFAULT_HOOKS],
    command: DEFAULT_COMMAND,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--local':
        options.local = true;
        break;

      case '--dir':
      case '--command':
      case '--hooks': {
        const value = argv[i + 1];
        if (value === undefined || !value.trim()) {
          return { type: 'error', message: `${arg} expects a value` };
        }
        i++;

        if (arg === '--dir') {
          options.projectDir = value;
        } else if (arg === '--command') {
          options.command = value.trim();
        } else {
          const hooks = parseHookList(value);
          if (typeof hooks === 'string') {
            return { type: 'error', message: `--hooks ${hooks}` };
          }
          options.hooks = hooks;
        }
        break;
      }

      case '-h':
      case '--help':
        return { type: 'help' };

      default:
        return { type: 'error', message: `Unknown option: ${arg}` };
    }
  }

  return { type: 'install', options };
}

export function usage(program = 'session-relay-install'): string {
  return [
    `Usage: ${program} [OPTIONS]`,
    '',
    'Options:',
    '  --local          Write .claude/settings.local.json instead of settings.json',
    '  --dir PATH       Project directory (default: current directory)',
    `  --hooks LIST     Comma-separated hooks to register (default: ${DEFAULT_HOOKS.join(',')})`,
    `  --command CMD    Relay command to run (default: ${DEFAULT_COMMAND})`,
    '  -h, --help       Show this help message',
  ].join('\n');
}
