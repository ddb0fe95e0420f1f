/**
 * Thread analyzer: fetches a thread's replies and flags the ones that
 * mention a tracked keyword.
 */

import type { ThreadClient, ThreadMessage } from './slack-client.js';
import type { KeywordMatcher } from './keyword-matcher.js';
import type { LinkResolver } from './link-resolver.js';
import type { TimestampFormatter } from './timestamp-formatter.js';
import { Errors, ErrorCode, ok, err, toBotError, type Result } from './errors.js';

// conversations.replies accepts at most 1000 per page
export const DEFAULT_PAGE_LIMIT = 1000;

export interface AnalysisRequest {
  channelId: string;
  threadTs: string;
  teamId?: string;
}

/**
 * A thread message that contains at least one tracked keyword.
 */
export interface FlaggedMessage {
  ts: string;
  user: string;
  text: string;
  keywords: string[];   // Keyword-set order
  displayTime: string;
  link: string;
}

export type AnalysisResult = FlaggedMessage[];

export interface ThreadAnalyzerDeps {
  client: Pick<ThreadClient, 'fetchThreadReplies'>;
  matcher: KeywordMatcher;
  links: LinkResolver;
  formatTime: TimestampFormatter;
  pageLimit?: number;
}

export class ThreadAnalyzer {
  private readonly pageLimit: number;

  constructor(private readonly deps: ThreadAnalyzerDeps) {
    this.pageLimit = deps.pageLimit ?? DEFAULT_PAGE_LIMIT;
  }

  async analyze(request: AnalysisRequest): Promise<Result<AnalysisResult>> {
    const { channelId, threadTs, teamId } = request;

    let replies: ThreadMessage[];
    try {
      replies = await this.deps.client.fetchThreadReplies(channelId, threadTs, this.pageLimit);
    } catch (error) {
      console.error(`[Analyzer] Failed to fetch replies for ${channelId}/${threadTs}:`, error);
      return err(Errors.threadFetchFailed(error));
    }

    // A full page may mean the thread was cut off; accepted as-is.
    if (replies.length >= this.pageLimit) {
      console.warn(
        `[Analyzer] Thread ${channelId}/${threadTs} returned ${replies.length} replies (limit ${this.pageLimit}); results may be truncated`
      );
    }

    const flagged: FlaggedMessage[] = [];
    try {
      for (const reply of replies) {
        const keywords = this.deps.matcher.match(reply.text);
        if (keywords.length === 0) continue;

        flagged.push({
          ts: reply.ts,
          user: reply.user,
          text: reply.text,
          keywords,
          displayTime: this.deps.formatTime(reply.ts),
          link: await this.deps.links.resolve(channelId, reply.ts, teamId),
        });
      }
    } catch (error) {
      return err(toBotError(error, ErrorCode.INVALID_TIMESTAMP));
    }

    console.log(
      `[Analyzer] Thread ${channelId}/${threadTs}: ${flagged.length} of ${replies.length} message(s) flagged`
    );
    return ok(flagged);
  }
}
