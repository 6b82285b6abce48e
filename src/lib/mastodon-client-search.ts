import type { AbstractConstructor, Mixin, MastodonClientBase } from './mastodon-client-base.js';
import { API_PATHS, DEFAULT_LIMIT } from './mastodon-client-constants.js';
import type { SearchResult, SearchSuccess } from './mastodon-client-types.js';

export interface MastodonClientSearchMethods {
  searchStatuses(query: string, limit?: number): Promise<SearchResult>;
}

export function withSearch<TBase extends AbstractConstructor<MastodonClientBase>>(
  Base: TBase,
): Mixin<TBase, MastodonClientSearchMethods> {
  abstract class MastodonClientSearch extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    /**
     * Full-text status search. The response is an object; statuses live under
     * its `statuses` key.
     */
    async searchStatuses(query: string, limit = DEFAULT_LIMIT): Promise<SearchResult> {
      const params = new URLSearchParams({
        q: query,
        type: 'statuses',
        limit: String(limit),
      });

      return this.withDeadline<SearchSuccess>(async (signal) => ({
        success: true,
        result: await this.getRecord(`${API_PATHS.search}?${params.toString()}`, signal),
      }));
    }
  }

  return MastodonClientSearch;
}
