import { type JsonRecord, arrayField, asRecord, numberField, recordField, stringField } from './fields.js';
import type { FetchResult } from './mastodon-client-types.js';
import { DEFAULT_OUTPUT, type OutputConfig, formatBoostLine, formatStatsLine, formatUrlLine } from './output.js';
import { stripHtml } from './strip-html.js';

export const NO_POSTS_MESSAGE = 'No posts found.';
export const NO_MENTIONS_MESSAGE = 'No mentions found.';

export interface DisplayPost {
  authorUsername: string;
  authorDisplayName: string;
  createdAt: string;
  content: string;
  replyCount: number;
  reblogCount: number;
  favouriteCount: number;
  url: string;
  /** Username of the account that boosted the post, when the record is a boost. */
  boostedBy?: string;
}

export interface DisplayMention {
  username: string;
  displayName: string;
  createdAt: string;
  content: string;
}

export type ResultEnvelope = { success: true; data: unknown } | { success: false; error: string };

export function renderEnvelope(data: unknown): string {
  const envelope: ResultEnvelope = { success: true, data };
  return JSON.stringify(envelope);
}

export function renderFailure(message: string): string {
  const envelope: ResultEnvelope = { success: false, error: message };
  return JSON.stringify(envelope);
}

/**
 * Project a status record into display fields. For a boost the post itself
 * comes from `reblog` and only the booster is read from the outer record.
 */
export function toDisplayPost(status: unknown): DisplayPost {
  const outer = asRecord(status);
  const reblog = recordField(outer, 'reblog');
  const post = reblog ?? outer;
  const author = recordField(post, 'account');

  const display: DisplayPost = {
    authorUsername: stringField(author, 'username'),
    authorDisplayName: stringField(author, 'display_name'),
    createdAt: stringField(post, 'created_at'),
    content: stripHtml(stringField(post, 'content')),
    replyCount: Math.trunc(numberField(post, 'replies_count')),
    reblogCount: Math.trunc(numberField(post, 'reblogs_count')),
    favouriteCount: Math.trunc(numberField(post, 'favourites_count')),
    url: stringField(post, 'url'),
  };
  if (reblog) {
    display.boostedBy = stringField(recordField(outer, 'account'), 'username');
  }
  return display;
}

export function toDisplayMention(notification: unknown): DisplayMention {
  const record = asRecord(notification);
  const account = recordField(record, 'account');
  return {
    username: stringField(account, 'username'),
    displayName: stringField(account, 'display_name'),
    // the notification's own timestamp, not the status'
    createdAt: stringField(record, 'created_at'),
    content: stripHtml(stringField(recordField(record, 'status'), 'content')),
  };
}

export function renderStatuses(statuses: readonly unknown[], output: OutputConfig = DEFAULT_OUTPUT): string {
  if (statuses.length === 0) {
    return NO_POSTS_MESSAGE;
  }

  const lines: string[] = [];
  statuses.forEach((status, index) => {
    const post = toDisplayPost(status);
    lines.push(`--- Post ${index + 1} ---`);
    if (post.boostedBy !== undefined) {
      lines.push(formatBoostLine(post.boostedBy, output));
    }
    lines.push(`@${post.authorUsername} (${post.authorDisplayName})`);
    lines.push(post.createdAt);
    lines.push('', post.content, '');
    lines.push(
      formatStatsLine({ replies: post.replyCount, reblogs: post.reblogCount, favourites: post.favouriteCount }, output),
    );
    lines.push(formatUrlLine(post.url, output));
    lines.push('');
  });
  return lines.join('\n');
}

export function renderMentions(notifications: readonly unknown[]): string {
  if (notifications.length === 0) {
    return NO_MENTIONS_MESSAGE;
  }

  const lines: string[] = [];
  notifications.forEach((notification, index) => {
    const mention = toDisplayMention(notification);
    lines.push(`--- Mention ${index + 1} ---`);
    lines.push(`@${mention.username} (${mention.displayName}) mentioned you`);
    lines.push(mention.createdAt);
    lines.push('', mention.content, '');
  });
  return lines.join('\n');
}

export function renderSearchResults(result: JsonRecord, output: OutputConfig = DEFAULT_OUTPUT): string {
  const statuses = arrayField(result, 'statuses');
  if (!statuses || statuses.length === 0) {
    return NO_POSTS_MESSAGE;
  }
  return renderStatuses(statuses.map(asRecord), output);
}

export function renderText(result: FetchResult, output: OutputConfig = DEFAULT_OUTPUT): string {
  switch (result.kind) {
    case 'statuses':
      return renderStatuses(result.statuses, output);
    case 'notifications':
      return renderMentions(result.notifications);
    case 'search':
      return renderSearchResults(result.result, output);
  }
}
