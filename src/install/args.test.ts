import { describe, expect, it } from 'vitest';
import { parseInstallArgs, usage } from './args.js';

describe('parseInstallArgs', () => {
  it('installs the default hooks into the shared settings', () => {
    expect(parseInstallArgs([], '/code/widgets')).toEqual({
      type: 'install',
      options: {
        projectDir: '/code/widgets',
        local: false,
        hooks: ['Stop', 'Notification', 'UserPromptSubmit', 'PostToolUse', 'SessionEnd'],
        command: 'session-relay',
      },
    });
  });

  it('reads every option', () => {
    expect(parseInstallArgs(
      ['--local', '--dir', '/code/other', '--hooks', 'Stop, PreToolUse,Stop', '--command', 'npx session-relay'],
      '/code/widgets'
    )).toEqual({
      type: 'install',
      options: {
        projectDir: '/code/other',
        local: true,
        hooks: ['Stop', 'PreToolUse'],
        command: 'npx session-relay',
      },
    });
  });

  it('rejects an unknown hook', () => {
    const result = parseInstallArgs(['--hooks', 'Stop,Start']);

    expect(result.type).toBe('error');
    expect(result.type === 'error' ? result.message : '').toMatch(/^--hooks unknown hook: Start /);
  });

  it('rejects an option without its value', () => {
    expect(parseInstallArgs(['--dir'])).toEqual({ type: 'error', message: '--dir expects a value' });
  });

  it('rejects unknown options', () => {
    expect(parseInstallArgs(['--global'])).toEqual({ type: 'error', message: 'Unknown option: --global' });
  });

  it('returns help', () => {
    expect(parseInstallArgs(['--help'])).toEqual({ type: 'help' });
    expect(usage().split('\n')[0]).toBe('Usage: session-relay-install [OPTIONS]');
  });
});
