import Database from 'better-sqlite3';
import { describe, expect, it } from 'vitest';
import { channelKey, ChannelRouter, DirectMessageRouter, MAX_CHANNEL_NAME_LENGTH } from './router.js';
import { MemoryChannelCache, SqliteChannelCache } from '../storage/channel-cache.js';
import { FakeChatPlatform } from '../testing/fake-chat-platform.js';
import { ChannelUnavailableError } from '../utils/errors.js';

const identity = { rootPath: '/code/widgets', displayName: 'widgets' };

describe('channelKey', () => {
  it('is deterministic', () => {
    expect(channelKey('U0TEST', 'widgets')).toBe('u0test-widgets');
    expect(channelKey('U0TEST', 'widgets')).toBe(channelKey('U0TEST', 'widgets'));
  });

  it('ignores case', () => {
    expect(channelKey('U0TEST', 'Widgets')).toBe(channelKey('U0TEST', 'widgets'));
  });

  it('collapses runs of other characters into one hyphen', () => {
    expect(channelKey('U0TEST', '--My Repo__v2..final--')).toBe('u0test-my-repo-v2-final');
  });

  it('gives names with no usable characters distinct keys', () => {
    const first = channelKey('U0TEST', 'проект');
    const second = channelKey('U0TEST', 'リポジトリ');

    expect(first).toMatch(/^u0test-repo-[0-9a-f]{8}$/);
    expect(second).toMatch(/^u0test-repo-[0-9a-f]{8}$/);
    expect(first).not.toBe(second);
    expect(channelKey('U0TEST', 'проект')).toBe(first);
  });

  it('keeps within the platform length limit without a trailing hyphen', () => {
    const key = channelKey('U0TEST', `${'a'.repeat(72)} tail`);

    expect(key.length).toBeLessThanOrEqual(MAX_CHANNEL_NAME_LENGTH);
    expect(key).toBe(`u0test-${'a'.repeat(72)}`);
  });
});

describe('ChannelRouter', () => {
  it('creates the channel and invites the user on first use', async () => {
    const platform = new FakeChatPlatform();
    const router = new ChannelRouter(platform, new MemoryChannelCache());

    const result = await router.route('U0TEST', identity);

    expect(result).toEqual({
      ok: true,
      mapping: { channelKey: 'u0test-widgets', channelHandle: 'C0001', created: true },
    });
    expect(platform.calls).toEqual([
      { method: 'findChannelByName', name: 'u0test-widgets' },
      { method: 'createPrivateChannel', name: 'u0test-widgets' },
      { method: 'inviteUser', channelHandle: 'C0001', userId: 'U0TEST' },
    ]);
  });

  it('answers a repeat route from the cache with no platform calls', async () => {
    const platform = new FakeChatPlatform();
    const router = new ChannelRouter(platform, new MemoryChannelCache());

    await router.route('U0TEST', identity);
    const callsAfterFirst = platform.calls.length;
    const second = await router.route('U0TEST', identity);

    expect(second.ok && second.mapping.channelHandle).toBe('C0001');
    expect(platform.calls).toHaveLength(callsAfterFirst);
    expect(platform.callCount('createPrivateChannel')).toBe(1);
  });

  it('reuses an existing channel and makes sure the user is in it', async () => {
    const platform = new FakeChatPlatform();
    platform.channels.set('u0test-widgets', 'C9999');
    const router = new ChannelRouter(platform, new MemoryChannelCache());

    const result = await router.route('U0TEST', identity);

    expect(result.ok && result.mapping.channelHandle).toBe('C9999');
    expect(platform.callCount('createPrivateChannel')).toBe(0);
    expect(platform.members.get('C9999')).toEqual(['U0TEST']);
  });

  it('invites the user on the next event when the first invite failed', async () => {
    const platform = new FakeChatPlatform();
    platform.failInvites = 1;
    const cache = new MemoryChannelCache();
    const router = new ChannelRouter(platform, cache);

    const first = await router.route('U0TEST', identity);

    expect(first.ok).toBe(false);
    expect(cache.get('u0test-widgets')).toBeNull();

    const second = await router.route('U0TEST', identity);

    expect(second.ok && second.mapping.channelHandle).toBe('C0001');
    expect(platform.members.get('C0001')).toEqual(['U0TEST']);
    expect(platform.callCount('createPrivateChannel')).toBe(1);
    expect(platform.callCount('inviteUser')).toBe(2);
  });

  it('reports a name held by an archived channel', async () => {
    const platform = new FakeChatPlatform();
    platform.channels.set('u0test-widgets', 'C0042');
    platform.archived.add('u0test-widgets');
    const router = new ChannelRouter(platform, new MemoryChannelCache());

    const result = await router.route('U0TEST', identity);

    expect(result.ok).toBe(false);
    expect(result.ok ? null : result.error).toBeInstanceOf(ChannelUnavailableError);
    expect(platform.calls).toEqual([
      { method: 'findChannelByName', name: 'u0test-widgets' },
      { method: 'createPrivateChannel', name: 'u0test-widgets' },
      { method: 'findChannelByName', name: 'u0test-widgets' },
      { method: 'findChannelByName', name: 'u0test-widgets', includeArchived: true },
    ]);
  });

  it('falls back to lookup when another process created the channel first', async () => {
    const platform = new FakeChatPlatform();
    platform.createRacesWithOtherProcess = true;
    const router = new ChannelRouter(platform, new MemoryChannelCache());

    const result = await router.route('U0TEST', identity);

    expect(result).toEqual({
      ok: true,
      mapping: { channelKey: 'u0test-widgets', channelHandle: 'C0001', created: true },
    });
    expect(platform.callCount('findChannelByName')).toBe(2);
    expect(platform.members.get('C0001')).toEqual(['U0TEST']);
  });

  it('reports the channel unavailable when the platform fails, and retries next time', async () => {
    const platform = new FakeChatPlatform();
    platform.failLookups = true;
    const router = new ChannelRouter(platform, new MemoryChannelCache());

    const failed = await router.route('U0TEST', identity);

    expect(failed.ok).toBe(false);
    expect(failed.ok ? null : failed.error).toBeInstanceOf(ChannelUnavailableError);

    platform.failLookups = false;
    const recovered = await router.route('U0TEST', identity);

    expect(recovered.ok).toBe(true);
    expect(platform.callCount('findChannelByName')).toBe(2);
  });

  it('looks the channel up again after an invalidation', async () => {
    const platform = new FakeChatPlatform();
    const router = new ChannelRouter(platform, new MemoryChannelCache());

    const first = await router.route('U0TEST', identity);
    if (!first.ok) throw first.error;
    router.invalidate(first.mapping);
    const second = await router.route('U0TEST', identity);

    expect(second.ok && second.mapping.channelHandle).toBe(first.mapping.channelHandle);
    expect(platform.callCount('findChannelByName')).toBe(2);
    expect(platform.callCount('createPrivateChannel')).toBe(1);
  });

  it('shares provisioned channels across routers through the SQLite cache', async () => {
    const db = new Database(':memory:');
    const first = new FakeChatPlatform();
    await new ChannelRouter(first, new SqliteChannelCache(db)).route('U0TEST', identity);

    const second = new FakeChatPlatform();
    const result = await new ChannelRouter(second, new SqliteChannelCache(db)).route('U0TEST', identity);

    expect(result.ok && result.mapping.channelHandle).toBe('C0001');
    expect(second.calls).toEqual([]);
    db.close();
  });
});

describe('DirectMessageRouter', () => {
  it('routes to the user directly', async () => {
    await expect(new DirectMessageRouter().route('U0TEST')).resolves.toEqual({
      ok: true,
      mapping: { channelKey: 'U0TEST', channelHandle: 'U0TEST', created: true },
    });
  });
});
