import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { SettingsFileError } from '../utils/errors.js';

export const DEFAULT_COMMAND = 'session-relay';

// PreToolUse is left out: Notification already covers permission prompts.
export const DEFAULT_HOOKS = ['Stop', 'Notification', 'UserPromptSubmit', 'PostToolUse', 'SessionEnd'] as const;

export const SUPPORTED_HOOKS = [
  'Stop',
  'SubagentStop',
  'Notification',
  'PreToolUse',
  'PermissionRequest',
  'UserPromptSubmit',
  'PostToolUse',
  'SessionEnd',
] as const;

export type HookName = typeof SUPPORTED_HOOKS[number];

const TOOL_HOOKS: ReadonlySet<string> = new Set(['PreToolUse', 'PostToolUse', 'PermissionRequest']);

const hookCommandSchema = z.object({
  type: z.string(),
  command: z.string().optional(),
}).passthrough();

const matcherGroupSchema = z.object({
  matcher: z.string().optional(),
  hooks: z.array(hookCommandSchema),
}).passthrough();

export const settingsSchema = z.object({
  hooks: z.record(z.array(matcherGroupSchema)).optional(),
}).passthrough();

export type Settings = z.infer<typeof settingsSchema>;
type MatcherGroup = z.infer<typeof matcherGroupSchema>;

export function isHookName(value: string): value is HookName {
  return (SUPPORTED_HOOKS as readonly string[]).includes(value);
}

export function hookCommand(command: string, hook: HookName): string {
  return `${command} ${hook}`;
}

export interface MergeResult {
  settings: Settings;
  added: HookName[];
  present: HookName[];
}

/**
 * Add a relay command for each hook that does not already run it. Everything
 * else in the settings is kept as it was.
 */
export function mergeHookSettings(settings: Settings, hooks: readonly HookName[], command = DEFAULT_COMMAND): MergeResult {
  const existing = settings.hooks ?? {};
  const merged: Record<string, MatcherGroup[]> = { ...existing };
  const added: HookName[] = [];
  const present: HookName[] = [];

  for (const hook of hooks) {
    const groups = merged[hook] ?? [];
    const wanted = hookCommand(command, hook);

    if (groups.some(group => group.hooks.some(entry => entry.command === wanted))) {
      present.push(hook);
      continue;
    }

    const group: MatcherGroup = {
      ...(TOOL_HOOKS.has(hook) ? { matcher: '*' } : {}),
      hooks: [{ type: 'command', command: wanted }],
    };
    merged[hook] = [...groups, group];
    added.push(hook);
  }

  return { settings: { ...settings, hooks: merged }, added, present };
}

export function settingsPath(projectDir: string, local: boolean): string {
  return path.join(projectDir, '.claude', local ? 'settings.local.json' : 'settings.json');
}

/**
 * Read a settings file. A missing file reads as empty settings.
 *
 * @throws SettingsFileError when the file is not a settings object
 */
export async function readSettings(filePath: string): Promise<Settings> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      return {};
    }
    throw err;
  }

  if (!content.trim()) return {};

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new SettingsFileError(filePath, err instanceof Error ? err.message : 'invalid JSON');
  }

  const result = settingsSchema.safeParse(json);
  if (!result.success) {
    throw new SettingsFileError(
      filePath,
      result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
    );
  }
  return result.data;
}

export interface InstallOptions {
  projectDir: string;
  local: boolean;
  hooks: readonly HookName[];
  command: string;
}

export interface InstallResult extends MergeResult {
  settingsPath: string;
  written: boolean;
}

/**
 * Register the relay's hook commands in the project's assistant settings.
 * The file is only rewritten when something was added.
 */
export async function installHooks(options: InstallOptions): Promise<InstallResult> {
  const filePath = settingsPath(options.projectDir, options.local);
  const current = await readSettings(filePath);
  const result = mergeHookSettings(current, options.hooks, options.command);

  if (result.added.length === 0) {
    return { ...result, settingsPath: filePath, written: false };
  }

  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(result.settings, null, 2)}\n`, 'utf-8');

  return { ...result, settingsPath: filePath, written: true };
}
