import { describe, test, expect } from 'vitest'
import { ApiError, AuthError, EnumerationError } from './api-utils.js'
import { MemoryMailbox } from './memory-mailbox.test-helper.js'
import { listLabeledThreads } from './thread-enumerator.js'
import type { MailboxSession, ThreadPage } from './mailbox.js'

async function collect(session: MailboxSession, labelIds: string[], query?: string): Promise<string[]> {
  const ids: string[] = []
  for await (const id of listLabeledThreads(session, { labelIds, query })) ids.push(id)
  return ids
}

describe('listLabeledThreads', () => {
  test('follows page tokens to the end', async () => {
    const mailbox = new MemoryMailbox({
      labels: [],
      pageSize: 2,
      threads: {
        T1: { M1: ['A'] },
        T2: { M2: ['A'] },
        T3: { M3: ['A'] },
        T4: { M4: ['A'] },
        T5: { M5: ['A'] },
      },
    })
    expect(await collect(mailbox, ['A'])).toEqual(['T1', 'T2', 'T3', 'T4', 'T5'])
    expect(mailbox.callsOf('listThreads').map((c) => c.pageToken)).toEqual([undefined, '2', '4'])
  })

  test('yields a thread reachable through several labels once', async () => {
    const mailbox = new MemoryMailbox({
      labels: [],
      threads: {
        T1: { M1: ['A'], M2: ['B'] },
        T2: { M3: ['B'] },
      },
    })
    expect(await collect(mailbox, ['A', 'B'])).toEqual(['T1', 'T2'])
  })

  test('passes the query to every listing', async () => {
    const mailbox = new MemoryMailbox({ labels: [], threads: { T1: { M1: ['A', 'B'] } } })
    await collect(mailbox, ['A', 'B'], 'after:2024/01/01')
    expect(mailbox.callsOf('listThreads').map((c) => c.query)).toEqual(['after:2024/01/01', 'after:2024/01/01'])
  })

  test('keeps going past an empty page that carries a token', async () => {
    const pages: ThreadPage[] = [
      { threadIds: [], nextPageToken: 'next' },
      { threadIds: ['T9'], nextPageToken: null },
    ]
    let call = 0
    const session: MailboxSession = {
      email: 'test@example.com',
      listLabels: async () => [],
      listThreads: async () => pages[call++] ?? { threadIds: [], nextPageToken: null },
      getThreadMessages: async ({ threadId }) => ({ id: threadId, messages: [] }),
      addLabels: async () => {},
    }
    expect(await collect(session, ['A'])).toEqual(['T9'])
    expect(call).toBe(2)
  })

  test('wraps page failures in EnumerationError', async () => {
    const mailbox = new MemoryMailbox({
      labels: [],
      threads: { T1: { M1: ['A'] } },
      faults: { listThreads: ({ labelId }) => (labelId === 'B' ? new ApiError({ reason: 'backend down' }) : undefined) },
    })
    const seen: string[] = []
    const run = async () => {
      for await (const id of listLabeledThreads(mailbox, { labelIds: ['A', 'B'] })) seen.push(id)
    }
    await expect(run()).rejects.toThrow(EnumerationError)
    await expect(run()).rejects.toThrow('Failed to list threads for label B: API call failed: backend down')
    expect(seen).toEqual(['T1', 'T1'])
  })

  test('throws AuthError as-is', async () => {
    const mailbox = new MemoryMailbox({
      labels: [],
      threads: {},
      faults: { listThreads: () => new AuthError({ email: 'test@example.com', reason: 'token revoked' }) },
    })
    await expect(collect(mailbox, ['A'])).rejects.toBeInstanceOf(AuthError)
  })

  test('is restartable', async () => {
    const mailbox = new MemoryMailbox({ labels: [], threads: { T1: { M1: ['A'] }, T2: { M2: ['A'] } } })
    expect(await collect(mailbox, ['A'])).toEqual(['T1', 'T2'])
    expect(await collect(mailbox, ['A'])).toEqual(['T1', 'T2'])
  })
})
