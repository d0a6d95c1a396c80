import os from 'os';
import path from 'path';
import { z } from 'zod';

const configSchema = z.object({
  slack: z.object({
    botToken: z.string().startsWith('xoxb-', { message: 'Bot token must start with xoxb-' }).optional(),
    userId: z.string().min(1).optional(),
    routing: z.enum(['channel', 'dm']).default('channel'),
    timeoutMs: z.number().int().positive().default(5000),
  }),

  summary: z.object({
    apiKey: z.string().min(1).optional(),
    model: z.string().default('claude-3-5-haiku-latest'),
    timeoutMs: z.number().int().positive().default(3000),
  }),

  description: z.object({
    shortThreshold: z.number().int().positive().default(500),
    condenseTarget: z.number().int().positive().default(300),
    maxLength: z.number().int().positive().default(1000),
  }).refine(d => d.condenseTarget <= d.maxLength && d.shortThreshold <= d.maxLength, {
    message: 'Thresholds must not exceed the maximum description length',
  }),

  notifications: z.object({
    logPath: z.string().default(path.join(os.tmpdir(), 'claude-notifications.jsonl')),
  }),

  cache: z.object({
    path: z.string().default(path.join(os.homedir(), '.cache', 'session-relay', 'channels.db')),
  }),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
    pretty: z.boolean().default(false),
    file: z.string().optional(),
  }),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

type RawConfig = Record<string, Record<string, string | number | boolean | undefined>>;

function parseEnvInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  return parseInt(value, 10);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

function readEnv(env: Env): RawConfig {
  return {
    slack: {
      botToken: nonEmpty(env.SLACK_BOT_TOKEN),
      userId: nonEmpty(env.SLACK_USER_ID),
      routing: nonEmpty(env.SLACK_ROUTING),
      timeoutMs: parseEnvInt(env.SLACK_TIMEOUT_MS),
    },
    summary: {
      apiKey: nonEmpty(env.ANTHROPIC_API_KEY),
      model: nonEmpty(env.SUMMARY_MODEL),
      timeoutMs: parseEnvInt(env.SUMMARY_TIMEOUT_MS),
    },
    description: {
      shortThreshold: parseEnvInt(env.DESCRIPTION_SHORT_THRESHOLD),
      condenseTarget: parseEnvInt(env.DESCRIPTION_CONDENSE_TARGET),
      maxLength: parseEnvInt(env.DESCRIPTION_MAX_LENGTH),
    },
    notifications: {
      logPath: nonEmpty(env.NOTIFICATION_LOG_PATH),
    },
    cache: {
      path: nonEmpty(env.CHANNEL_CACHE_PATH),
    },
    logging: {
      level: nonEmpty(env.LOG_LEVEL)?.toLowerCase(),
      pretty: env.LOG_PRETTY === 'true',
      file: nonEmpty(env.LOG_FILE),
    },
  };
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Build the relay configuration from environment variables.
 * Credentials are optional; leaving one out disables the path that needs it.
 *
 * @throws ConfigError listing every invalid value
 */
export function loadConfig(env: Env = process.env): Config {
  const result = configSchema.safeParse(readEnv(env));

  if (!result.success) {
    throw new ConfigError(describeIssues(result.error));
  }

  return result.data;
}

export interface ResolvedConfig {
  config: Config;
  issues: string[];
}

/**
 * Like `loadConfig`, but an invalid value is dropped instead of rejected: the
 * setting falls back to its default, or to unset for credentials, which turns
 * off the path that needs it. A section-wide issue resets the whole section.
 */
export function resolveConfig(env: Env = process.env): ResolvedConfig {
  const raw = readEnv(env);
  const first = configSchema.safeParse(raw);
  if (first.success) {
    return { config: first.data, issues: [] };
  }

  for (const issue of first.error.issues) {
    const section = issue.path.length > 0 ? String(issue.path[0]) : undefined;
    const field = issue.path.length > 1 ? String(issue.path[1]) : undefined;
    if (section === undefined) continue;

    const values = raw[section];
    if (field !== undefined && values) {
      values[field] = undefined;
    } else {
      raw[section] = {};
    }
  }

  const issues = describeIssues(first.error);
  const second = configSchema.safeParse(raw);
  if (!second.success) {
    throw new ConfigError([...issues, ...describeIssues(second.error)]);
  }

  return { config: second.data, issues };
}

function loadConfigOrWarn(): Config {
  const { config: resolved, issues } = resolveConfig();
  if (issues.length > 0) {
    console.error('Ignoring invalid configuration values:');
    for (const issue of issues) {
      console.error(`  - ${issue}`);
    }
  }
  return resolved;
}

export const config = loadConfigOrWarn();
