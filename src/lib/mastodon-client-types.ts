import type { ScoutError } from './errors.js';
import type { JsonRecord } from './fields.js';

export type CommandName = 'home' | 'user-tweets' | 'mentions' | 'search';

export const COMMAND_NAMES: readonly CommandName[] = ['home', 'user-tweets', 'mentions', 'search'];

export type ClientFailure = {
  success: false;
  error: ScoutError;
};

export type StatusesSuccess = { success: true; statuses: unknown[] };
export type StatusesResult = StatusesSuccess | ClientFailure;

export type NotificationsSuccess = { success: true; notifications: unknown[] };
export type NotificationsResult = NotificationsSuccess | ClientFailure;

export type SearchSuccess = { success: true; result: JsonRecord };
export type SearchResult = SearchSuccess | ClientFailure;


/** Decoded payload tagged by the command that produced it. */
export type FetchResult =
  | { command: 'home' | 'user-tweets'; kind: 'statuses'; statuses: unknown[] }
  | { command: 'mentions'; kind: 'notifications'; notifications: unknown[] }
  | { command: 'search'; kind: 'search'; result: JsonRecord };

/** The raw API value for a fetch result, as it goes into the JSON envelope. */
export function payloadOf(result: FetchResult): unknown {
  switch (result.kind) {
    case 'statuses':
      return result.statuses;
    case 'notifications':
      return result.notifications;
    case 'search':
      return result.result;
  }
}

export function isCommandName(value: string): value is CommandName {
  return (COMMAND_NAMES as readonly string[]).includes(value);
}
