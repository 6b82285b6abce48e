/**
 * Read-only Mastodon REST client
 */

import { MastodonClientBase, type MastodonClientOptions } from './mastodon-client-base.js';
import { withNotifications } from './mastodon-client-notifications.js';
import { withSearch } from './mastodon-client-search.js';
import { withTimelines } from './mastodon-client-timelines.js';

export type { MastodonClientOptions } from './mastodon-client-base.js';
export type {
  ClientFailure,
  CommandName,
  FetchResult,
  NotificationsResult,
  SearchResult,
  StatusesResult,
} from './mastodon-client-types.js';

export class MastodonClient extends withSearch(withNotifications(withTimelines(MastodonClientBase))) {
  constructor(options: MastodonClientOptions) {
    super(options);
  }
}
