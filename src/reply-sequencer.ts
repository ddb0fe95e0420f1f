/**
 * Reply sequencer: posts analysis results back into the thread.
 *
 * Each invocation gets its own ReplySession, which owns the status message.
 *
 * Session state transitions:
 * - pending:   announce() posts the "analyzing" notice
 * - empty:     no flagged messages; one "no issues" reply (or status update)
 * - reporting: header + one post per flagged message, paced by postDelayMs
 * - cleanup:   status -> complete, wait cleanupDelayMs, delete status
 * - done
 * - failed:    private notice to the requester; remaining posts dropped
 */

import type { ThreadClient } from './slack-client.js';
import type { AnalysisResult } from './thread-analyzer.js';
import { Errors, ThreadBotError, describeError, ok, err, type Err, type Result } from './errors.js';
import {
  ANALYZING_TEXT,
  NO_ISSUES_TEXT,
  COMPLETE_TEXT,
  formatReportHeader,
  formatFlaggedMessage,
  formatConsolidatedReport,
  formatFailureNotice,
} from './report-builder.js';

export type StatusMode = 'ephemeral' | 'thread';
export type ReplyLayout = 'per-message' | 'consolidated';
export type ReplyState = 'pending' | 'empty' | 'reporting' | 'cleanup' | 'done' | 'failed';

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_POST_DELAY_MS = 1000;
export const DEFAULT_CLEANUP_DELAY_MS = 5000;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface ReplySequencerOptions {
  statusMode?: StatusMode;
  layout?: ReplyLayout;
  postDelayMs?: number;    // Minimum gap between consecutive posts
  cleanupDelayMs?: number; // Grace period before the status message is deleted
  sleep?: Sleep;
}

export interface ReplyTarget {
  channelId: string;
  threadTs: string;
  userId: string;   // Requester, receives private notices
}

export interface DeliverySummary {
  posted: number;   // Messages posted into the thread (status message excluded)
}

export class ReplySequencer {
  private readonly options: Required<ReplySequencerOptions>;

  constructor(
    private readonly client: ThreadClient,
    options: ReplySequencerOptions = {}
  ) {
    this.options = {
      statusMode: options.statusMode ?? 'ephemeral',
      layout: options.layout ?? 'per-message',
      postDelayMs: options.postDelayMs ?? DEFAULT_POST_DELAY_MS,
      cleanupDelayMs: options.cleanupDelayMs ?? DEFAULT_CLEANUP_DELAY_MS,
      sleep: options.sleep ?? sleep,
    };
  }

  open(target: ReplyTarget): ReplySession {
    return new ReplySession(this.client, target, this.options);
  }
}

export class ReplySession {
  private currentState: ReplyState = 'pending';
  private statusTs?: string;
  private announced = false;

  constructor(
    private readonly client: ThreadClient,
    private readonly target: ReplyTarget,
    private readonly options: Required<ReplySequencerOptions>
  ) {}

  get state(): ReplyState {
    return this.currentState;
  }

  /** Ts of the visible status message, if one is live. */
  get statusMessageTs(): string | undefined {
    return this.statusTs;
  }

  /**
   * Post the "analyzing" notice. Ephemeral mode only the requester sees it;
   * thread mode posts the status message that cleanup later deletes.
   */
  async announce(): Promise<Result<void>> {
    if (this.currentState !== 'pending' || this.announced) {
      return err(Errors.invalidInput('reply session was already announced'));
    }
    this.announced = true;

    const { channelId, threadTs, userId } = this.target;
    try {
      if (this.options.statusMode === 'thread') {
        this.statusTs = await this.client.postMessage(channelId, ANALYZING_TEXT, threadTs);
      } else {
        await this.client.postEphemeral(channelId, userId, ANALYZING_TEXT, threadTs);
      }
      return ok(undefined);
    } catch (error) {
      return this.abort(Errors.deliveryFailed(error), 'announce');
    }
  }

  async deliver(result: AnalysisResult): Promise<Result<DeliverySummary>> {
    if (this.currentState !== 'pending') {
      return err(Errors.invalidInput(`reply session is already ${this.currentState}`));
    }

    const { channelId, threadTs } = this.target;
    let posted = 0;

    try {
      if (result.length === 0) {
        this.currentState = 'empty';
        if (this.statusTs) {
          await this.client.updateMessage(channelId, this.statusTs, NO_ISSUES_TEXT);
          await this.cleanup(false);
        } else {
          await this.client.postMessage(channelId, NO_ISSUES_TEXT, threadTs);
          posted = 1;
        }
        this.currentState = 'done';
        return ok({ posted });
      }

      this.currentState = 'reporting';
      const texts =
        this.options.layout === 'consolidated'
          ? [formatConsolidatedReport(result)]
          : [formatReportHeader(result.length), ...result.map((m, i) => formatFlaggedMessage(m, i + 1))];

      for (const text of texts) {
        if (posted > 0) {
          await this.options.sleep(this.options.postDelayMs);
        }
        await this.client.postMessage(channelId, text, threadTs);
        posted++;
      }

      await this.cleanup(true);
      this.currentState = 'done';
      console.log(`[Reply] Posted ${posted} message(s) to ${channelId}/${threadTs}`);
      return ok({ posted });
    } catch (error) {
      return this.abort(Errors.deliveryFailed(error), this.currentState, posted);
    }
  }

  /**
   * Move to `failed` and tell the requester privately. Messages already in
   * the thread stay; the status message is removed.
   */
  async fail(error: ThreadBotError): Promise<void> {
    this.currentState = 'failed';
    const { channelId, threadTs, userId } = this.target;

    try {
      await this.client.postEphemeral(channelId, userId, formatFailureNotice(error), threadTs);
    } catch (notifyError) {
      console.error(`[Reply] Failed to notify ${userId} about "${error.message}": ${describeError(notifyError)}`);
    }

    await this.deleteStatus();
  }

  private async abort(error: ThreadBotError, step: string, posted = 0): Promise<Err> {
    console.error(`[Reply] Delivery failed during ${step} after ${posted} post(s): ${error.message}`);
    await this.fail(error);
    return err(error);
  }

  private async cleanup(markComplete: boolean): Promise<void> {
    if (!this.statusTs) return;
    this.currentState = 'cleanup';

    if (markComplete) {
      await this.client.updateMessage(this.target.channelId, this.statusTs, COMPLETE_TEXT);
    }
    await this.options.sleep(this.options.cleanupDelayMs);
    await this.deleteStatus();
  }

  /**
   * Best-effort; a failed delete is only logged.
   */
  private async deleteStatus(): Promise<void> {
    if (!this.statusTs) return;
    const ts = this.statusTs;
    this.statusTs = undefined;

    try {
      await this.client.deleteMessage(this.target.channelId, ts);
    } catch (error) {
      const cleanupError = Errors.cleanupFailed(error);
      console.warn(`[Reply] Could not delete status message ${this.target.channelId}/${ts}: ${cleanupError.message}`);
    }
  }
}
