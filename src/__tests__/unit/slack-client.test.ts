/**
 * Unit tests for the WebClient-backed thread client.
 */

import { describe, it, expect, vi } from 'vitest';
import type { App } from '@slack/bolt';
import { SlackThreadClient } from '../../slack-client.js';
import { ThreadBotError } from '../../errors.js';

function createMockWebClient() {
  return {
    conversations: {
      replies: vi.fn().mockResolvedValue({ ok: true, messages: [] }),
    },
    chat: {
      postMessage: vi.fn().mockResolvedValue({ ok: true, ts: '1800000000.000001' }),
      postEphemeral: vi.fn().mockResolvedValue({ ok: true }),
      update: vi.fn().mockResolvedValue({ ok: true }),
      delete: vi.fn().mockResolvedValue({ ok: true }),
      getPermalink: vi.fn().mockResolvedValue({ ok: true, permalink: 'https://acme.slack.com/archives/C1/p1' }),
    },
  };
}

function wrap(mock: ReturnType<typeof createMockWebClient>): SlackThreadClient {
  return new SlackThreadClient(mock as unknown as App['client']);
}

describe('SlackThreadClient', () => {
  it('fetches replies with the page limit and normalizes messages', async () => {
    const mock = createMockWebClient();
    mock.conversations.replies.mockResolvedValueOnce({
      ok: true,
      messages: [
        { ts: '1700000000.000100', user: 'U1', text: 'root', thread_ts: '1700000000.000100' },
        { ts: '1700000000.000200', bot_id: 'B1' },
        { text: 'no ts' },
      ],
    });

    const replies = await wrap(mock).fetchThreadReplies('C1', '1700000000.000100', 1000);

    expect(mock.conversations.replies).toHaveBeenCalledWith({ channel: 'C1', ts: '1700000000.000100', limit: 1000 });
    expect(replies).toEqual([
      { ts: '1700000000.000100', user: 'U1', text: 'root', threadTs: '1700000000.000100' },
      { ts: '1700000000.000200', user: 'Unknown', text: '', threadTs: undefined },
    ]);
  });

  it('posts into the thread without unfurling links and returns the ts', async () => {
    const mock = createMockWebClient();

    const ts = await wrap(mock).postMessage('C1', 'hello', '1700000000.000100');

    expect(ts).toBe('1800000000.000001');
    expect(mock.chat.postMessage).toHaveBeenCalledWith({
      channel: 'C1',
      thread_ts: '1700000000.000100',
      text: 'hello',
      unfurl_links: false,
      unfurl_media: false,
    });
  });

  it('throws when Slack returns no ts for a post', async () => {
    const mock = createMockWebClient();
    mock.chat.postMessage.mockResolvedValueOnce({ ok: true });

    await expect(wrap(mock).postMessage('C1', 'hello')).rejects.toBeInstanceOf(ThreadBotError);
  });

  it('maps ephemeral, update and delete calls', async () => {
    const mock = createMockWebClient();
    const client = wrap(mock);

    await client.postEphemeral('C1', 'U1', 'only you', '1700000000.000100');
    await client.updateMessage('C1', '1800000000.000001', 'edited');
    await client.deleteMessage('C1', '1800000000.000001');

    expect(mock.chat.postEphemeral).toHaveBeenCalledWith({
      channel: 'C1',
      user: 'U1',
      thread_ts: '1700000000.000100',
      text: 'only you',
    });
    expect(mock.chat.update).toHaveBeenCalledWith({ channel: 'C1', ts: '1800000000.000001', text: 'edited' });
    expect(mock.chat.delete).toHaveBeenCalledWith({ channel: 'C1', ts: '1800000000.000001' });
  });

  it('resolves permalinks and rejects empty ones', async () => {
    const mock = createMockWebClient();
    const client = wrap(mock);

    await expect(client.resolvePermalink('C1', '1700000000.000100')).resolves.toBe(
      'https://acme.slack.com/archives/C1/p1'
    );
    expect(mock.chat.getPermalink).toHaveBeenCalledWith({ channel: 'C1', message_ts: '1700000000.000100' });

    mock.chat.getPermalink.mockResolvedValueOnce({ ok: true });
    await expect(client.resolvePermalink('C1', '1700000000.000100')).rejects.toThrow(
      'chat.getPermalink returned no permalink'
    );
  });

  it('propagates Slack API errors', async () => {
    const mock = createMockWebClient();
    mock.conversations.replies.mockRejectedValueOnce({ data: { error: 'thread_not_found' } });

    await expect(wrap(mock).fetchThreadReplies('C1', '1', 10)).rejects.toEqual({ data: { error: 'thread_not_found' } });
  });
});
