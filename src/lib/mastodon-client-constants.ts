export const DEFAULT_INSTANCE_URL = 'https://mastodon.social';
export const DEFAULT_LIMIT = 20;
export const DEFAULT_TIMEOUT_SECONDS = 30;
// setTimeout takes a signed 32-bit millisecond delay
export const MAX_TIMEOUT_SECONDS = Math.floor(0x7fffffff / 1000);

export const API_PATHS = {
  homeTimeline: '/api/v1/timelines/home',
  verifyCredentials: '/api/v1/accounts/verify_credentials',
  accountStatuses: (accountId: string) => `/api/v1/accounts/${encodeURIComponent(accountId)}/statuses`,
  notifications: '/api/v1/notifications',
  search: '/api/v2/search',
} as const;
