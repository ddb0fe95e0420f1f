/**
 * Message texts posted by the bot.
 * Centralizes the mrkdwn formatting of status, report and error messages.
 */

import type { FlaggedMessage } from './thread-analyzer.js';
import { toUserMessage } from './errors.js';

export const ANALYZING_TEXT = ':mag: Analyzing thread for issues... This may take a moment.';
export const NO_ISSUES_TEXT = ':white_check_mark: No issues found! No messages contained the tracked keywords.';
export const COMPLETE_TEXT = ':white_check_mark: Thread analysis complete.';
export const MENTION_REPLY_TEXT =
  ":wave: I'm running! Use the *Extract Issues from Thread* shortcut on any message to scan its thread for issue keywords.";

export const DIVIDER = '━'.repeat(30);

/**
 * Header posted before the per-message results.
 */
export function formatReportHeader(count: number): string {
  return [
    ':clipboard: *Thread Analysis Results*',
    `Found *${count}* message(s) with issue keywords.`,
    '_Keyword matches can be noisy or duplicated. Review each one before acting on it._',
  ].join('\n');
}

/**
 * `"bug", "not working"`
 */
export function formatKeywordList(keywords: readonly string[]): string {
  return keywords.map((k) => `"${k}"`).join(', ');
}

/**
 * One flagged message. `index` is 1-based.
 */
export function formatFlaggedMessage(message: FlaggedMessage, index: number): string {
  return [
    `*MESSAGE #${index}* (${message.displayTime})`,
    `Keywords: ${formatKeywordList(message.keywords)}`,
    `:link: <${message.link}|View message>`,
    `"${message.text}"`,
  ].join('\n');
}

/**
 * Header and every flagged message in a single post.
 */
export function formatConsolidatedReport(messages: readonly FlaggedMessage[]): string {
  const sections = [formatReportHeader(messages.length), DIVIDER];
  messages.forEach((message, i) => {
    sections.push(formatFlaggedMessage(message, i + 1), DIVIDER);
  });
  return sections.join('\n');
}

export function formatFailureNotice(error: unknown): string {
  return `:x: Error analyzing thread: ${toUserMessage(error)}`;
}
