/**
 * Thread-level Slack operations used by the analyzer and reply sequencer.
 *
 * The pipeline only depends on `ThreadClient`; `SlackThreadClient` backs it
 * with the Bolt app's WebClient.
 */

import type { App } from '@slack/bolt';
import { Errors } from './errors.js';

type WebClient = App['client'];

/**
 * A reply in a Slack thread, reduced to what the pipeline reads.
 */
export interface ThreadMessage {
  ts: string;        // Platform timestamp, unique within the thread
  user: string;      // Author ID, 'Unknown' when Slack omits it
  text: string;
  threadTs?: string; // Thread root ts (absent on unthreaded messages)
}

export interface ThreadClient {
  fetchThreadReplies(channelId: string, threadTs: string, limit: number): Promise<ThreadMessage[]>;
  /** Returns the ts of the posted message. */
  postMessage(channelId: string, text: string, threadTs?: string): Promise<string>;
  postEphemeral(channelId: string, userId: string, text: string, threadTs?: string): Promise<void>;
  updateMessage(channelId: string, messageTs: string, text: string): Promise<void>;
  deleteMessage(channelId: string, messageTs: string): Promise<void>;
  resolvePermalink(channelId: string, messageTs: string): Promise<string>;
}

export class SlackThreadClient implements ThreadClient {
  constructor(private readonly client: WebClient) {}

  async fetchThreadReplies(channelId: string, threadTs: string, limit: number): Promise<ThreadMessage[]> {
    const result = await this.client.conversations.replies({
      channel: channelId,
      ts: threadTs,
      limit,
    });

    const messages: ThreadMessage[] = [];
    for (const msg of result.messages ?? []) {
      // Nothing to link to without a ts
      if (!msg.ts) continue;
      messages.push({
        ts: msg.ts,
        user: msg.user || 'Unknown',
        text: msg.text || '',
        threadTs: msg.thread_ts,
      });
    }
    return messages;
  }

  async postMessage(channelId: string, text: string, threadTs?: string): Promise<string> {
    const result = await this.client.chat.postMessage({
      channel: channelId,
      thread_ts: threadTs,
      text,
      unfurl_links: false,
      unfurl_media: false,
    });
    if (!result.ts) {
      throw Errors.slackApiError('chat.postMessage returned no message ts');
    }
    return result.ts;
  }

  async postEphemeral(channelId: string, userId: string, text: string, threadTs?: string): Promise<void> {
    await this.client.chat.postEphemeral({
      channel: channelId,
      user: userId,
      thread_ts: threadTs,
      text,
    });
  }

  async updateMessage(channelId: string, messageTs: string, text: string): Promise<void> {
    await this.client.chat.update({ channel: channelId, ts: messageTs, text });
  }

  async deleteMessage(channelId: string, messageTs: string): Promise<void> {
    await this.client.chat.delete({ channel: channelId, ts: messageTs });
  }

  async resolvePermalink(channelId: string, messageTs: string): Promise<string> {
    const result = await this.client.chat.getPermalink({ channel: channelId, message_ts: messageTs });
    if (!result.permalink) {
      throw Errors.slackApiError('chat.getPermalink returned no permalink');
    }
    return result.permalink;
  }
}
