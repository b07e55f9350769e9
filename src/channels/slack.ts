/**
 * Slack Platform Client
 *
 * Reads channel lists and message history through the Slack Web API and
 * hands them to the indexing pipeline as plain source items.
 *
 * MAPPING:
 * --------
 * - guild   → Slack workspace (team)
 * - channel → public or private channel the bot is a member of
 * - item id → `<channelId>:<ts>` (a bare ts is only unique per channel)
 *
 * System messages (joins, topic changes) and bot posts are kept as items with
 * empty content, so a page keeps its length and the paginator's cursor stays
 * on the real oldest message.
 */

import { WebClient } from '@slack/web-api';
import { createModuleLogger } from '../utils/logger.js';
import type { Channel, FetchHistoryOptions, SourcePlatformClient } from './types.js';

const logger = createModuleLogger('slack');

const CHANNEL_PAGE_SIZE = 200;

export interface SlackPlatformClientOptions {
  // Workspace name used when team.info is not permitted for the token
  fallbackTeamName?: string;
}

interface WorkspaceInfo {
  id: string;
  name: string;
}

export function toMessageKey(channelId: string, ts: string): string {
  return `${channelId}:${ts}`;
}

export function tsFromMessageKey(key: string): string {
  const separator = key.lastIndexOf(':');
  return separator === -1 ? key : key.slice(separator + 1);
}

/**
 * Turn Slack's mrkdwn tokens into plain text.
 *
 * @example
 * normalizeSlackText('ping <@U123ABC> in <#C42|general>') // 'ping @user in #general'
 */
export function normalizeSlackText(text: string): string {
  let processed = text;

  // User mentions (<@U123ABC>)
  processed = processed.replace(/<@[A-Z0-9]+(?:\|[^>]+)?>/g, '@user');

  // Channel mentions (<#C123ABC|channel-name>)
  processed = processed.replace(/<#[A-Z0-9]+\|([^>]+)>/g, '#$1');
  processed = processed.replace(/<#[A-Z0-9]+>/g, '#channel');

  // Special mentions (<!here>, <!channel>)
  processed = processed.replace(/<!(\w+)(?:\|[^>]*)?>/g, '@$1');

  // Links: keep the label when there is one, otherwise the bare URL
  processed = processed.replace(/<(https?:\/\/[^|>]+)\|([^>]+)>/g, '$2');
  processed = processed.replace(/<(https?:\/\/[^>]+)>/g, '$1');

  // Emoji codes :emoji_name:, never all digits so clock times survive
  processed = processed.replace(/(?<!\w):[a-z0-9_+-]*[a-z_+-][a-z0-9_+-]*:(?!\w)/g, '');

  return processed;
}

function slackErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('data' in error)) return undefined;
  const { data } = error;
  if (typeof data !== 'object' || data === null || !('error' in data)) return undefined;
  return typeof data.error === 'string' ? data.error : undefined;
}

function describeSlackError(error: unknown, channelId: string): Error {
  const code = slackErrorCode(error);
  const errorMessages: Record<string, string> = {
    channel_not_found: `Channel ${channelId} not found or bot does not have access`,
    not_in_channel: `Bot is not a member of channel ${channelId}`,
    missing_scope: 'Missing permission: add channels:history and groups:history scopes',
    invalid_auth: 'Invalid bot token. Check SLACK_BOT_TOKEN in .env file.',
    ratelimited: 'Slack rate limit exhausted',
  };

  if (code) {
    return new Error(errorMessages[code] ?? `Slack API error: ${code}`, { cause: error });
  }
  return error instanceof Error ? error : new Error(String(error));
}

export class SlackPlatformClient implements SourcePlatformClient {
  private readonly client: WebClient;
  private readonly options: SlackPlatformClientOptions;
  private readonly userNames = new Map<string, string>();
  private workspace: WorkspaceInfo | null = null;

  constructor(client: WebClient, options: SlackPlatformClientOptions = {}) {
    this.client = client;
    this.options = options;
  }

  /**
   * List the channels the bot can read in a workspace.
   */
  async listChannels(guildId: string): Promise<Channel[]> {
    const channels: Channel[] = [];
    let cursor: string | undefined;

    do {
      const result = await this.client.conversations.list({
        types: 'public_channel,private_channel',
        exclude_archived: true,
        limit: CHANNEL_PAGE_SIZE,
        team_id: guildId || undefined,
        cursor,
      });

      for (const c of result.channels ?? []) {
        // History is only readable where the bot is a member
        if (!c.id || !c.is_member) continue;
        channels.push({ id: c.id, name: c.name ?? c.id, isText: true });
      }

      cursor = result.response_metadata?.next_cursor || undefined;
    } while (cursor);

    logger.info(`Found ${channels.length} channels where bot is member`);
    return channels;
  }

  /**
   * Fetch up to `limit` messages older than `before`, most recent first.
   * Slack may return short pages while `has_more` is set, so this follows
   * its cursor until the page is full or history runs out.
   */
  async fetchHistory(channel: Channel, options: FetchHistoryOptions): Promise<unknown[]> {
    const workspace = await this.getWorkspace();
    const items: unknown[] = [];
    let cursor: string | undefined;

    try {
      do {
        const result = await this.client.conversations.history({
          channel: channel.id,
          limit: options.limit - items.length,
          latest: options.before ? tsFromMessageKey(options.before) : undefined,
          inclusive: false,
          cursor,
        });

        for (const msg of result.messages ?? []) {
          if (!msg.ts) continue;

          const authorId = msg.user ?? msg.bot_id ?? 'unknown';
          const isConversation = !msg.subtype && !msg.bot_id;

          items.push({
            id: toMessageKey(channel.id, msg.ts),
            authorId,
            authorName: msg.user ? await this.getUserName(msg.user) : 'unknown',
            channelId: channel.id,
            channelName: channel.name,
            guildId: workspace.id,
            guildName: workspace.name,
            createdAt: new Date(parseFloat(msg.ts) * 1000),
            content: isConversation ? normalizeSlackText(msg.text ?? '') : '',
          });
        }

        cursor = result.has_more ? result.response_metadata?.next_cursor || undefined : undefined;
      } while (cursor && items.length < options.limit);
    } catch (error) {
      throw describeSlackError(error, channel.id);
    }

    logger.debug(`Got ${items.length} messages from channel ${channel.name}`);
    return items;
  }

  private async getWorkspace(): Promise<WorkspaceInfo> {
    if (this.workspace) return this.workspace;

    try {
      const result = await this.client.team.info();
      this.workspace = {
        id: result.team?.id ?? '',
        name: result.team?.name ?? this.options.fallbackTeamName ?? 'unknown',
      };
    } catch (error) {
      logger.warn(`Could not read workspace info: ${slackErrorCode(error) ?? String(error)}`);
      this.workspace = { id: '', name: this.options.fallbackTeamName ?? 'unknown' };
    }

    return this.workspace;
  }

  private async getUserName(userId: string): Promise<string> {
    const cached = this.userNames.get(userId);
    if (cached) return cached;

    let name = 'unknown';
    try {
      const result = await this.client.users.info({ user: userId });
      name = result.user?.profile?.display_name || result.user?.real_name || result.user?.name || 'unknown';
    } catch (error) {
      logger.warn(`Failed to get user info for ${userId}`, { error: slackErrorCode(error) ?? String(error) });
    }

    this.userNames.set(userId, name);
    return name;
  }
}
