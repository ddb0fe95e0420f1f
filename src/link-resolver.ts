/**
 * Permalink resolution with a deterministic fallback.
 *
 * `chat.getPermalink` is authoritative; when it fails the link is built from
 * a template so analysis never stalls on a missing link.
 */

import type { ThreadClient } from './slack-client.js';
import { describeError } from './errors.js';

export const DEFAULT_PERMALINK_TEMPLATE = 'https://slack.com/archives/{channel}/p{message}';

export interface PermalinkTarget {
  channelId: string;
  messageTs: string;
  teamId?: string;
}

/**
 * Fill a permalink template. `{message}` is the ts without its dot
 * ("1700000000.123456" → "1700000000123456").
 */
export function buildFallbackPermalink(template: string, target: PermalinkTarget): string {
  const messageId = target.messageTs.replace('.', '');
  return template
    .replace(/\{team\}/g, target.teamId ?? '')
    .replace(/\{channel\}/g, target.channelId)
    .replace(/\{message\}/g, messageId);
}

export class LinkResolver {
  constructor(
    private readonly client: Pick<ThreadClient, 'resolvePermalink'>,
    private readonly fallbackTemplate: string = DEFAULT_PERMALINK_TEMPLATE
  ) {}

  /**
   * Never rejects.
   */
  async resolve(channelId: string, messageTs: string, teamId?: string): Promise<string> {
    try {
      const permalink = await this.client.resolvePermalink(channelId, messageTs);
      if (permalink) return permalink;
    } catch (error) {
      console.warn(`[Links] getPermalink failed for ${channelId}/${messageTs}: ${describeError(error)}; using fallback`);
      return buildFallbackPermalink(this.fallbackTemplate, { channelId, messageTs, teamId });
    }
    console.warn(`[Links] Empty permalink for ${channelId}/${messageTs}; using fallback`);
    return buildFallbackPermalink(this.fallbackTemplate, { channelId, messageTs, teamId });
  }
}
