import { createHash } from 'crypto';
import type { RepositoryIdentity } from '../repository/identity.js';
import type { ChannelCache } from '../storage/channel-cache.js';
import type { ChannelMapping, ChatPlatform, RouteResult } from './types.js';
import { ChannelUnavailableError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'channel-router' });

// Slack channel names: lowercase letters, digits, hyphens, at most 80 characters.
export const MAX_CHANNEL_NAME_LENGTH = 80;

function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Deterministic channel name for a user and repository. A display name with no
 * usable characters is replaced by a short digest of itself.
 */
export function channelKey(userId: string, displayName: string): string {
  const name = slugify(displayName)
    || `repo-${createHash('sha256').update(displayName).digest('hex').slice(0, 8)}`;
  const key = slugify(`${userId}-${name}`)
    .slice(0, MAX_CHANNEL_NAME_LENGTH)
    .replace(/-+$/, '');
  return key || 'repo';
}

export interface Router {
  route(userId: string, identity: RepositoryIdentity): Promise<RouteResult>;
  // Drop a mapping whose channel could not be posted to.
  invalidate(mapping: ChannelMapping): void;
}

/**
 * One private channel per (user, repository), created and provisioned on first use.
 */
export class ChannelRouter implements Router {
  constructor(
    private platform: ChatPlatform,
    private cache: ChannelCache
  ) {}

  async route(userId: string, identity: RepositoryIdentity): Promise<RouteResult> {
    const key = channelKey(userId, identity.displayName);

    const cached = this.cache.get(key);
    if (cached?.created) {
      log.debug({ channelKey: key }, 'Channel cache hit');
      return { ok: true, mapping: cached };
    }

    try {
      const mapping = await this.provision(key, userId);
      this.cache.set(mapping);
      return { ok: true, mapping };
    } catch (err) {
      log.warn({ err, channelKey: key }, 'Channel unavailable');
      return { ok: false, error: new ChannelUnavailableError(key, err) };
    }
  }

  private async provision(key: string, userId: string): Promise<ChannelMapping> {
    const handle = await this.locateOrCreate(key);
    // Runs on every provisioning, so a failed invite is retried by the next event.
    await this.platform.inviteUser(handle, userId);
    return { channelKey: key, channelHandle: handle, created: true };
  }

  private async locateOrCreate(key: string): Promise<string> {
    const existing = await this.platform.findChannelByName(key);
    if (existing.found) {
      return existing.handle;
    }

    const created = await this.platform.createPrivateChannel(key);
    if (created.status === 'created') {
      log.info({ channelKey: key, channelHandle: created.handle }, 'Created channel');
      return created.handle;
    }

    // Another invocation created it between our lookup and create.
    const raced = await this.platform.findChannelByName(key);
    if (raced.found) {
      return raced.handle;
    }

    const archived = await this.platform.findChannelByName(key, { includeArchived: true });
    if (archived.found) {
      log.warn(
        { channelKey: key, channelHandle: archived.handle },
        'Channel name is held by an archived channel; unarchive or rename it'
      );
      throw new ChannelUnavailableError(key, `archived channel ${archived.handle} holds the name`);
    }

    throw new ChannelUnavailableError(key, 'channel exists but is not visible');
  }

  invalidate(mapping: ChannelMapping): void {
    this.cache.delete(mapping.channelKey);
    log.debug({ channelKey: mapping.channelKey }, 'Channel cache entry dropped');
  }
}

/**
 * Sends everything to the user's direct-message conversation.
 */
export class DirectMessageRouter implements Router {
  async route(userId: string): Promise<RouteResult> {
    return { ok: true, mapping: { channelKey: userId, channelHandle: userId, created: true } };
  }

  invalidate(): void {}
}
