import type { AbstractConstructor, Mixin, MastodonClientBase } from './mastodon-client-base.js';
import { API_PATHS, DEFAULT_LIMIT } from './mastodon-client-constants.js';
import type { NotificationsResult, NotificationsSuccess } from './mastodon-client-types.js';

export interface MastodonClientNotificationMethods {
  getMentions(limit?: number): Promise<NotificationsResult>;
}

export function withNotifications<TBase extends AbstractConstructor<MastodonClientBase>>(
  Base: TBase,
): Mixin<TBase, MastodonClientNotificationMethods> {
  abstract class MastodonClientNotifications extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    /**
     * Notifications filtered server-side to mentions
     */
    async getMentions(limit = DEFAULT_LIMIT): Promise<NotificationsResult> {
      return this.withDeadline<NotificationsSuccess>(async (signal) => ({
        success: true,
        notifications: await this.getArray(`${API_PATHS.notifications}?limit=${limit}&types[]=mention`, signal),
      }));
    }
  }

  return MastodonClientNotifications;
}
