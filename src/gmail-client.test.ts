import { describe, test, expect } from 'vitest'
import { OAuth2Client } from 'google-auth-library'
import type { gmail_v1 } from 'googleapis'
import { ApiError, AuthError, NotFoundError } from './api-utils.js'
import { GmailClient, type GmailUsersApi } from './gmail-client.js'
import { RateLimiter } from './rate-limit.js'

describe('GmailClient.parseRawLabels', () => {
  test('maps label type and skips labels without an id', () => {
    expect(
      GmailClient.parseRawLabels([
        { id: 'INBOX', name: 'INBOX', type: 'system' },
        { id: 'Label_1', name: 'Work', type: 'user' },
        { id: 'Label_2' },
        { name: 'orphan' },
      ]),
    ).toEqual([
      { id: 'INBOX', name: 'INBOX', type: 'system' },
      { id: 'Label_1', name: 'Work', type: 'user' },
      { id: 'Label_2', name: 'Label_2', type: 'user' },
    ])
  })
})

describe('GmailClient.parseRawThreadPage', () => {
  test('collects thread ids and the next page token', () => {
    expect(
      GmailClient.parseRawThreadPage({ threads: [{ id: 't1' }, {}, { id: 't2' }], nextPageToken: 'abc' }),
    ).toEqual({ threadIds: ['t1', 't2'], nextPageToken: 'abc' })
  })

  test('an empty token ends the listing', () => {
    expect(GmailClient.parseRawThreadPage({ nextPageToken: '' })).toEqual({ threadIds: [], nextPageToken: null })
  })
})

describe('GmailClient.parseRawThreadMessages', () => {
  test('reads per-message labels', () => {
    expect(
      GmailClient.parseRawThreadMessages('t1', {
        id: 't1',
        messages: [
          { id: 'm1', labelIds: ['INBOX', 'Label_1', 'INBOX'] },
          { id: 'm2' },
          { labelIds: ['Label_2'] },
        ],
      }),
    ).toEqual({
      id: 't1',
      messages: [
        { id: 'm1', labelIds: ['INBOX', 'Label_1'] },
        { id: 'm2', labelIds: [] },
      ],
    })
  })
})

// ---------------------------------------------------------------------------
// Calls through the error boundary, retry and rate limiter
// ---------------------------------------------------------------------------

function httpError(code: number, message: string): Error & { code: number } {
  return Object.assign(new Error(message), { code })
}

function fakeUsers(overrides: {
  threadsList?: () => Promise<{ data: gmail_v1.Schema$ListThreadsResponse }>
  threadsGet?: () => Promise<{ data: gmail_v1.Schema$Thread }>
  labelsList?: () => Promise<{ data: gmail_v1.Schema$ListLabelsResponse }>
}): GmailUsersApi {
  return {
    getProfile: async () => ({ data: { emailAddress: 'test@example.com' } }),
    labels: { list: overrides.labelsList ?? (async () => ({ data: { labels: [] } })) },
    threads: {
      list: overrides.threadsList ?? (async () => ({ data: {} })),
      get: overrides.threadsGet ?? (async () => ({ data: {} })),
    },
    messages: { batchModify: async () => ({}) },
  }
}

function clientWith(users: GmailUsersApi, maxAttempts = 3) {
  const delays: number[] = []
  const limiter = new RateLimiter({ rate: 250, now: () => 0, sleep: async () => {} })
  const client = new GmailClient({
    auth: new OAuth2Client(),
    email: 'test@example.com',
    users,
    limiter,
    retry: { maxAttempts, baseDelayMs: 1000, maxDelayMs: 60_000, sleep: async (ms) => { delays.push(ms) } },
  })
  return { client, delays, limiter }
}

describe('GmailClient calls', () => {
  test('retries a rate-limited call and returns the value', async () => {
    let calls = 0
    const { client, delays, limiter } = clientWith(
      fakeUsers({
        threadsList: async () => {
          calls++
          if (calls === 1) throw httpError(429, 'Too Many Requests')
          return { data: { threads: [{ id: 't1' }] } }
        },
      }),
    )

    expect(await client.listThreads({ labelId: 'Label_1' })).toEqual({ threadIds: ['t1'], nextPageToken: null })
    expect(calls).toBe(2)
    expect(delays).toEqual([1000])
    // each attempt spends threads.list quota
    expect(limiter.available).toBe(230)
  })

  test('exhausted retries come back as ApiError', async () => {
    let calls = 0
    const { client, delays } = clientWith(
      fakeUsers({
        labelsList: async () => {
          calls++
          throw httpError(503, 'Backend Error')
        },
      }),
    )

    const result = await client.listLabels()
    expect(result).toBeInstanceOf(ApiError)
    expect(result instanceof Error && result.message).toBe('API call failed: Backend Error')
    expect(calls).toBe(3)
    expect(delays).toEqual([1000, 2000])
  })

  test('a 404 thread comes back as NotFoundError', async () => {
    const { client, delays } = clientWith(
      fakeUsers({
        threadsGet: async () => {
          throw httpError(404, 'Requested entity was not found.')
        },
      }),
    )

    const result = await client.getThreadMessages({ threadId: 't9' })
    expect(result).toBeInstanceOf(NotFoundError)
    expect(result instanceof Error && result.message).toBe('thread t9 not found')
    expect(delays).toEqual([])
  })

  test('a 401 comes back as AuthError without retrying', async () => {
    let calls = 0
    const { client, delays } = clientWith(
      fakeUsers({
        threadsGet: async () => {
          calls++
          throw httpError(401, 'Invalid Credentials')
        },
      }),
    )

    const result = await client.getThreadMessages({ threadId: 't1' })
    expect(result).toBeInstanceOf(AuthError)
    expect(result instanceof Error && result.message).toBe('Authentication failed for test@example.com: Invalid Credentials')
    expect(calls).toBe(1)
    expect(delays).toEqual([])
  })
})
