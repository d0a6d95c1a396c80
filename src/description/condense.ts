import { CondenseTimeoutError, CondenseUnavailableError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'condense' });

export const ELLIPSIS = '...';

export type CondenseOutcome =
  | { status: 'ok'; text: string }
  | { status: 'timeout'; error: CondenseTimeoutError }
  | { status: 'unavailable'; error: CondenseUnavailableError }
  | { status: 'error'; error: Error };

/**
 * External text-condensing capability. Implementations resolve with an outcome
 * rather than rejecting.
 */
export interface Summarizer {
  condense(text: string, targetLength: number, timeoutMs: number): Promise<CondenseOutcome>;
}

export interface LengthPolicy {
  shortThreshold: number;
  condenseTarget: number;
  maxLength: number;
}

export const DEFAULT_LENGTH_POLICY: LengthPolicy = {
  shortThreshold: 500,
  condenseTarget: 300,
  maxLength: 1000,
};

export type DescriptionMethod = 'verbatim' | 'condensed' | 'truncated';

export interface ChatDescription {
  text: string;
  method: DescriptionMethod;
}

// Lengths count code points so a cut never splits a surrogate pair.
export function charLength(text: string): number {
  return Array.from(text).length;
}

export function hardTruncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  return chars.length <= maxLength ? text : chars.slice(0, maxLength).join('');
}

/**
 * Cut text to at most `maxLength` characters, the last of which are the ellipsis marker.
 */
export function truncateWithEllipsis(text: string, maxLength: number): string {
  if (charLength(text) <= maxLength) {
    return text;
  }
  return `${hardTruncate(text, Math.max(0, maxLength - ELLIPSIS.length))}${ELLIPSIS}`;
}

/**
 * Decide the chat description from the original text and, for long text, the
 * condensation outcome (`null` when no summarizer is configured).
 */
export function applyLengthPolicy(
  text: string,
  outcome: CondenseOutcome | null,
  policy: LengthPolicy = DEFAULT_LENGTH_POLICY
): ChatDescription {
  if (charLength(text) <= policy.shortThreshold) {
    return { text: hardTruncate(text, policy.maxLength), method: 'verbatim' };
  }

  if (outcome?.status === 'ok') {
    const condensed = outcome.text.trim();
    if (condensed) {
      return { text: hardTruncate(condensed, policy.maxLength), method: 'condensed' };
    }
  }

  return {
    text: hardTruncate(truncateWithEllipsis(text, policy.shortThreshold), policy.maxLength),
    method: 'truncated',
  };
}

function timeoutAfter(timeoutMs: number): { promise: Promise<CondenseOutcome>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<CondenseOutcome>((resolve) => {
    timer = setTimeout(() => {
      resolve({ status: 'timeout', error: new CondenseTimeoutError(timeoutMs) });
    }, timeoutMs);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

/**
 * Ask the summarizer for a condensed version of `text`, bounded by `timeoutMs`
 * whatever the summarizer itself does.
 */
export async function requestCondensation(
  text: string,
  summarizer: Summarizer | null,
  targetLength: number,
  timeoutMs: number
): Promise<CondenseOutcome> {
  if (!summarizer) {
    return { status: 'unavailable', error: new CondenseUnavailableError('no summarization credential configured') };
  }

  const deadline = timeoutAfter(timeoutMs);
  try {
    return await Promise.race([
      summarizer.condense(text, targetLength, timeoutMs),
      deadline.promise,
    ]);
  } catch (err) {
    return { status: 'error', error: err instanceof Error ? err : new Error(String(err)) };
  } finally {
    deadline.cancel();
  }
}

/**
 * Resolve the description sent to chat: verbatim when short, otherwise
 * condensed, falling back to an ellipsis-truncated cut.
 */
export async function resolveChatDescription(
  text: string,
  summarizer: Summarizer | null,
  policy: LengthPolicy,
  timeoutMs: number
): Promise<ChatDescription> {
  if (charLength(text) <= policy.shortThreshold) {
    return applyLengthPolicy(text, null, policy);
  }

  const outcome = await requestCondensation(text, summarizer, policy.condenseTarget, timeoutMs);
  if (outcome.status !== 'ok') {
    log.info({ status: outcome.status, err: outcome.error, length: charLength(text) }, 'Condensation skipped, truncating');
  }

  return applyLengthPolicy(text, outcome, policy);
}
