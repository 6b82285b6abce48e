import { AuthError } from './errors.js';
import type { AbstractConstructor, Mixin, MastodonClientBase } from './mastodon-client-base.js';
import { API_PATHS, DEFAULT_LIMIT } from './mastodon-client-constants.js';
import type { StatusesResult, StatusesSuccess } from './mastodon-client-types.js';

export interface MastodonClientTimelineMethods {
  getHomeTimeline(limit?: number): Promise<StatusesResult>;
  getOwnStatuses(limit?: number): Promise<StatusesResult>;
}

export function withTimelines<TBase extends AbstractConstructor<MastodonClientBase>>(
  Base: TBase,
): Mixin<TBase, MastodonClientTimelineMethods> {
  abstract class MastodonClientTimelines extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    /**
     * Home timeline of the authenticated account
     */
    async getHomeTimeline(limit = DEFAULT_LIMIT): Promise<StatusesResult> {
      return this.withDeadline<StatusesSuccess>(async (signal) => ({
        success: true,
        statuses: await this.getArray(`${API_PATHS.homeTimeline}?limit=${limit}`, signal),
      }));
    }

    /**
     * Statuses posted by the authenticated account. Resolves the account id
     * first; both requests share one deadline.
     */
    async getOwnStatuses(limit = DEFAULT_LIMIT): Promise<StatusesResult> {
      return this.withDeadline<StatusesSuccess>(async (signal) => {
        const account = await this.getRecord(API_PATHS.verifyCredentials, signal);
        const accountId = account.id;
        if (typeof accountId !== 'string') {
          throw new AuthError('account ID not found');
        }
        const statuses = await this.getArray(`${API_PATHS.accountStatuses(accountId)}?limit=${limit}`, signal);
        return { success: true, statuses };
      });
    }
  }

  return MastodonClientTimelines;
}
