/**
 * Slack bot for extracting issue reports from threads.
 *
 * Uses Slack Bolt, with Socket Mode when an app token is configured and the
 * HTTP receiver otherwise. The "Extract Issues from Thread" message shortcut
 * runs the analyzer on the clicked message's thread.
 */

import { App, LogLevel, type MessageShortcut } from '@slack/bolt';
import type { BotConfig } from './config.js';
import { SlackThreadClient, type ThreadClient } from './slack-client.js';
import { KeywordMatcher } from './keyword-matcher.js';
import { LinkResolver } from './link-resolver.js';
import { createTimestampFormatter } from './timestamp-formatter.js';
import { ThreadAnalyzer } from './thread-analyzer.js';
import { ReplySequencer, type DeliverySummary, type Sleep } from './reply-sequencer.js';
import { MENTION_REPLY_TEXT } from './report-builder.js';
import { describeError, type Result } from './errors.js';

export const ISSUE_SHORTCUT_CALLBACK_ID = 'extract_thread_issues';

export interface BotServices {
  analyzer: ThreadAnalyzer;
  sequencer: ReplySequencer;
}

export interface ThreadAnalysisRequest {
  channelId: string;
  threadTs: string;
  userId: string;
  teamId?: string;
}

/**
 * The parts of a message shortcut payload the bot reads.
 */
export interface IssueShortcutPayload {
  channel: { id: string };
  user: { id: string };
  team?: { id: string } | null;
  message: { ts: string; thread_ts?: unknown };
}

let app: App | undefined;

/**
 * Wire the pipeline over a thread client.
 */
export function createServices(client: ThreadClient, config: BotConfig, sleep?: Sleep): BotServices {
  const analyzer = new ThreadAnalyzer({
    client,
    matcher: new KeywordMatcher(config.keywords),
    links: new LinkResolver(client, config.permalinkTemplate),
    formatTime: createTimestampFormatter(config.timeZone),
    pageLimit: config.pageLimit,
  });
  const sequencer = new ReplySequencer(client, {
    statusMode: config.statusMode,
    layout: config.layout,
    postDelayMs: config.postDelayMs,
    cleanupDelayMs: config.cleanupDelayMs,
    sleep,
  });
  return { analyzer, sequencer };
}

/**
 * Shortcut on a reply analyzes its parent thread; on a top-level message,
 * the thread it starts.
 */
export function parseIssueShortcut(shortcut: IssueShortcutPayload): ThreadAnalysisRequest {
  const { thread_ts: threadTs, ts } = shortcut.message;
  return {
    channelId: shortcut.channel.id,
    threadTs: typeof threadTs === 'string' && threadTs ? threadTs : ts,
    userId: shortcut.user.id,
    teamId: shortcut.team?.id,
  };
}

/**
 * Announce, analyze and deliver for one shortcut invocation.
 * Failures have already been reported to the requester when this resolves.
 * Runs share nothing but the services, so runs on one thread may interleave.
 */
export async function runThreadAnalysis(
  services: BotServices,
  request: ThreadAnalysisRequest
): Promise<Result<DeliverySummary>> {
  const { channelId, threadTs, userId, teamId } = request;
  const session = services.sequencer.open({ channelId, threadTs, userId });

  const announced = await session.announce();
  if (!announced.ok) {
    return announced;
  }

  const analysis = await services.analyzer.analyze({ channelId, threadTs, teamId });
  if (!analysis.ok) {
    await session.fail(analysis.error);
    return analysis;
  }

  return session.deliver(analysis.value);
}

/**
 * Set up Slack event handlers.
 */
export function registerHandlers(target: App, services: BotServices): void {
  target.shortcut<MessageShortcut>(
    { callback_id: ISSUE_SHORTCUT_CALLBACK_ID, type: 'message_action' },
    async ({ shortcut, ack }) => {
      await ack();

      const request = parseIssueShortcut(shortcut);
      console.log(`[Bot] Extract issues requested by ${request.userId} on ${request.channelId}/${request.threadTs}`);

      try {
        const result = await runThreadAnalysis(services, request);
        if (!result.ok) {
          console.error(`[Bot] Thread analysis failed (${result.error.code}): ${result.error.message}`);
        }
      } catch (error) {
        console.error('[Bot] Error handling shortcut:', error);
      }
    }
  );

  // Mentions get a static description, no analysis
  target.event('app_mention', async ({ event, say }) => {
    try {
      await say({ thread_ts: event.thread_ts ?? event.ts, text: MENTION_REPLY_TEXT });
    } catch (error) {
      console.error(`[Bot] Failed to answer app_mention: ${describeError(error)}`);
    }
  });

  target.error(async (error) => {
    console.error('[Bot] Unhandled Bolt error:', error);
  });
}

/**
 * Start the Slack bot.
 */
export async function startBot(config: BotConfig): Promise<void> {
  const socketMode = Boolean(config.appToken);

  app = new App({
    token: config.botToken,
    appToken: config.appToken,
    signingSecret: config.signingSecret,
    socketMode,
    logLevel: LogLevel.INFO,
    // Failures surface to the requester instead of being retried
    clientOptions: { retryConfig: { retries: 0 } },
  });

  const services = createServices(new SlackThreadClient(app.client), config);
  registerHandlers(app, services);

  await app.start(config.port);
  console.log(
    `[Bot] Thread issue scanner is running (${socketMode ? 'socket mode' : `port ${config.port}`}), tracking ${config.keywords.length} keyword(s)`
  );
}

/**
 * Stop the Slack bot.
 */
export async function stopBot(): Promise<void> {
  console.log('[Bot] Stopping thread issue scanner...');
  await app?.stop();
  app = undefined;
  console.log('[Bot] Thread issue scanner stopped.');
}
