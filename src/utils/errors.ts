import type { HookEvent } from '../hooks/types.js';

export class RelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

/**
 * Raised when the hook input lacks a required field. Carries an event built
 * from placeholders so the log sink can still record something.
 */
export class MalformedEventError extends RelayError {
  constructor(
    public readonly missingFields: string[],
    public readonly placeholder: HookEvent
  ) {
    super(
      `Hook input is missing required fields: ${missingFields.join(', ')}`,
      'MALFORMED_EVENT',
      { missingFields }
    );
    this.name = 'MalformedEventError';
  }
}

export class UnknownEventKindError extends RelayError {
  constructor(label: string) {
    super(
      `Unrecognised hook event: ${label || '(none)'}`,
      'UNKNOWN_EVENT_KIND',
      { label }
    );
    this.name = 'UnknownEventKindError';
  }
}

export class RepositoryNotFoundError extends RelayError {
  constructor(workingDirectory: string) {
    super(
      'No enclosing git repository',
      'REPOSITORY_NOT_FOUND',
      { workingDirectory }
    );
    this.name = 'RepositoryNotFoundError';
  }
}

export class ChatPlatformError extends RelayError {
  constructor(operation: string, cause?: unknown) {
    super(
      `Chat platform call failed: ${operation}`,
      'CHAT_PLATFORM_ERROR',
      { operation, cause: describeCause(cause) }
    );
    this.name = 'ChatPlatformError';
  }
}

export class ChannelUnavailableError extends RelayError {
  constructor(channelKey: string, cause?: unknown) {
    super(
      `Channel unavailable: ${channelKey}`,
      'CHANNEL_UNAVAILABLE',
      { channelKey, cause: describeCause(cause) }
    );
    this.name = 'ChannelUnavailableError';
  }
}

export class CondenseTimeoutError extends RelayError {
  constructor(timeoutMs: number) {
    super(
      `Condensation timed out after ${timeoutMs}ms`,
      'CONDENSE_TIMEOUT',
      { timeoutMs }
    );
    this.name = 'CondenseTimeoutError';
  }
}

export class CondenseUnavailableError extends RelayError {
  constructor(reason: string) {
    super(
      `Condensation unavailable: ${reason}`,
      'CONDENSE_UNAVAILABLE',
      { reason }
    );
    this.name = 'CondenseUnavailableError';
  }
}

export class LogWriteFailedError extends RelayError {
  constructor(logPath: string, cause?: unknown) {
    super(
      `Failed to append notification to ${logPath}`,
      'LOG_WRITE_FAILED',
      { logPath, cause: describeCause(cause) }
    );
    this.name = 'LogWriteFailedError';
  }
}

export function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}

export class SettingsFileError extends RelayError {
  constructor(settingsPath: string, reason: string) {
    super(
      `Cannot update ${settingsPath}: ${reason}`,
      'SETTINGS_INVALID',
      { settingsPath, reason }
    );
    this.name = 'SettingsFileError';
  }
}
