/**
 * Binds a (user, repository) pair to a chat channel.
 */
export interface ChannelMapping {
  channelKey: string;
  channelHandle: string;
  // Whether lookup/provisioning already ran for this key.
  created: boolean;
}

export type ChannelLookup =
  | { found: true; handle: string }
  | { found: false };

export interface LookupOptions {
  // Archived channels still hold their name.
  includeArchived?: boolean;
}

export type CreateChannelResult =
  | { status: 'created'; handle: string }
  | { status: 'exists' };

/**
 * The chat-platform calls the relay depends on. Implementations throw
 * `ChatPlatformError` on failure.
 */
export interface ChatPlatform {
  findChannelByName(name: string, options?: LookupOptions): Promise<ChannelLookup>;
  createPrivateChannel(name: string): Promise<CreateChannelResult>;
  inviteUser(channelHandle: string, userId: string): Promise<void>;
  postMessage(channelHandle: string, text: string): Promise<void>;
}

export type RouteResult =
  | { ok: true; mapping: ChannelMapping }
  | { ok: false; error: Error };
