export const aliceStatus = {
  id: '111',
  created_at: '2026-01-02T03:04:05.000Z',
  content: '<p>Hello &amp; welcome</p><p>to the timeline</p>',
  replies_count: 1,
  reblogs_count: 2,
  favourites_count: 3,
  url: 'https://example.social/@alice/111',
  account: { id: '1', username: 'alice', display_name: 'Alice A' },
  reblog: null,
};

export const boostOfCarol = {
  id: '222',
  created_at: '2026-01-03T00:00:00.000Z',
  content: '',
  replies_count: 0,
  reblogs_count: 0,
  favourites_count: 0,
  url: 'https://example.social/@bob/222',
  account: { id: '2', username: 'bob', display_name: 'Bob' },
  reblog: {
    id: '333',
    created_at: '2026-01-01T12:00:00.000Z',
    content: '<p>Original thought<br />second line</p>',
    replies_count: 4,
    reblogs_count: 5.9,
    favourites_count: 6,
    url: 'https://other.example/@carol/333',
    account: { id: '3', username: 'carol', display_name: 'Carol C' },
  },
};

export const mentionFromDave = {
  id: '9',
  type: 'mention',
  created_at: '2026-02-03T10:00:00.000Z',
  account: { id: '4', username: 'dave', display_name: 'Dave' },
  status: {
    created_at: '2026-02-03T09:59:00.000Z',
    content:
      '<p><span class="h-card"><a href="https://example.social/@me" class="u-url mention">@<span>me</span></a></span> ping</p>',
  },
};
