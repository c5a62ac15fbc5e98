import { describe, test, expect } from 'vitest'
import { NotFoundError } from './api-utils.js'
import { createLabelPolicy, INHERIT_ALL } from './label-policy.js'
import { MemoryMailbox } from './memory-mailbox.test-helper.js'
import { computeMissingLabels, countMissing, reconcile, threadLabelUnion, type MissingLabels } from './reconciler.js'

function plain(missing: MissingLabels): Record<string, string[]> {
  return Object.fromEntries([...missing].map(([id, labels]) => [id, [...labels]]))
}

describe('threadLabelUnion', () => {
  test('collects every label in first-seen order', () => {
    const union = threadLabelUnion([
      { id: 'm1', labelIds: ['Work', 'INBOX'] },
      { id: 'm2', labelIds: ['INBOX', 'Urgent'] },
    ])
    expect([...union]).toEqual(['Work', 'INBOX', 'Urgent'])
  })
})

describe('computeMissingLabels', () => {
  test('each message gets the labels other messages carry', () => {
    const { eligible, missing } = computeMissingLabels(
      [
        { id: 'M1', labelIds: ['Work'] },
        { id: 'M2', labelIds: [] },
        { id: 'M3', labelIds: ['Work', 'Urgent'] },
      ],
      INHERIT_ALL,
    )
    expect([...eligible]).toEqual(['Work', 'Urgent'])
    expect(plain(missing)).toEqual({
      M1: ['Urgent'],
      M2: ['Work', 'Urgent'],
    })
  })

  test('single-message thread has nothing to inherit', () => {
    const { missing } = computeMissingLabels([{ id: 'M1', labelIds: ['Work'] }], INHERIT_ALL)
    expect(missing.size).toBe(0)
  })

  test('fully labeled thread yields no changes', () => {
    const { missing } = computeMissingLabels(
      [
        { id: 'M1', labelIds: ['Work', 'Urgent'] },
        { id: 'M2', labelIds: ['Urgent', 'Work'] },
      ],
      INHERIT_ALL,
    )
    expect(missing.size).toBe(0)
  })

  test('system labels stay per-message under the default policy', () => {
    const { eligible, missing } = computeMissingLabels(
      [
        { id: 'M1', labelIds: ['INBOX', 'UNREAD', 'Label_1'] },
        { id: 'M2', labelIds: ['SENT'] },
      ],
      createLabelPolicy(),
    )
    expect([...eligible]).toEqual(['Label_1'])
    expect(plain(missing)).toEqual({ M2: ['Label_1'] })
  })

  test('thread with only excluded labels yields no changes', () => {
    const { missing } = computeMissingLabels(
      [
        { id: 'M1', labelIds: ['INBOX'] },
        { id: 'M2', labelIds: ['UNREAD'] },
      ],
      createLabelPolicy(),
    )
    expect(missing.size).toBe(0)
  })

  test('applying the result leaves nothing missing', () => {
    const messages = [
      { id: 'M1', labelIds: ['A'] },
      { id: 'M2', labelIds: ['B'] },
      { id: 'M3', labelIds: [] },
    ]
    const { missing } = computeMissingLabels(messages, INHERIT_ALL)
    const after = messages.map((m) => ({ id: m.id, labelIds: [...m.labelIds, ...(missing.get(m.id) ?? [])] }))
    expect(computeMissingLabels(after, INHERIT_ALL).missing.size).toBe(0)
  })
})

describe('reconcile', () => {
  test('reads the thread through the session', async () => {
    const mailbox = new MemoryMailbox({
      labels: [],
      threads: { T1: { M1: ['A'], M2: ['B'] } },
    })
    const result = await reconcile(mailbox, 'T1', INHERIT_ALL)
    if (result instanceof Error) throw result
    expect(result.threadId).toBe('T1')
    expect(result.messageCount).toBe(2)
    expect(plain(result.missing)).toEqual({ M1: ['B'], M2: ['A'] })
    expect(countMissing(result.missing)).toBe(2)
  })

  test('returns NotFoundError for a thread that vanished', async () => {
    const mailbox = new MemoryMailbox({ labels: [], threads: {} })
    const result = await reconcile(mailbox, 'gone', INHERIT_ALL)
    expect(result).toBeInstanceOf(NotFoundError)
    expect(result instanceof Error && result.message).toBe('thread gone not found')
  })
})
