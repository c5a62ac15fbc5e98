// In-memory MailboxSession for tests.
// Threads are listed the way Gmail does it: a thread matches a label when any
// of its messages carries it. Page tokens are offsets. Failures are injected
// per call through hooks that return an error value.

import { ApiError, NotFoundError, type AuthError } from './api-utils.js'
import type { MailboxSession, MailLabel, ThreadMessages, ThreadPage } from './mailbox.js'

/** threadId -> messageId -> labelIds */
export type MailboxState = Record<string, Record<string, string[]>>

export type MailboxCall =
  | { method: 'listLabels' }
  | { method: 'listThreads'; labelId: string; query?: string; pageToken?: string }
  | { method: 'getThreadMessages'; threadId: string }
  | { method: 'addLabels'; messageIds: string[]; labelIds: string[] }

export interface MailboxFaults {
  listLabels?: () => AuthError | ApiError | undefined
  listThreads?: (params: { labelId: string; pageToken?: string }) => AuthError | ApiError | undefined
  getThreadMessages?: (threadId: string) => AuthError | ApiError | undefined
  addLabels?: (params: { messageIds: string[]; labelIds: string[] }) => AuthError | ApiError | undefined
}

export class MemoryMailbox implements MailboxSession {
  readonly email: string
  readonly calls: MailboxCall[] = []
  faults: MailboxFaults
  private labels: MailLabel[]
  private threads: Map<string, Map<string, Set<string>>>
  private pageSize: number

  constructor({
    email = 'test@example.com',
    labels,
    threads,
    pageSize = 2,
    faults = {},
  }: {
    email?: string
    labels: MailLabel[]
    threads: MailboxState
    pageSize?: number
    faults?: MailboxFaults
  }) {
    this.email = email
    this.labels = labels
    this.pageSize = pageSize
    this.faults = faults
    this.threads = new Map(
      Object.entries(threads).map(([threadId, messages]) => [
        threadId,
        new Map(Object.entries(messages).map(([messageId, labelIds]) => [messageId, new Set(labelIds)])),
      ]),
    )
  }

  async listLabels(): Promise<MailLabel[] | AuthError | ApiError> {
    this.calls.push({ method: 'listLabels' })
    return this.faults.listLabels?.() ?? this.labels.map((l) => ({ ...l }))
  }

  async listThreads({ labelId, query, pageToken }: { labelId: string; query?: string; pageToken?: string }): Promise<ThreadPage | AuthError | ApiError> {
    this.calls.push({ method: 'listThreads', labelId, query, pageToken })
    const fault = this.faults.listThreads?.({ labelId, pageToken })
    if (fault) return fault

    const matching = [...this.threads.entries()]
      .filter(([, messages]) => [...messages.values()].some((labels) => labels.has(labelId)))
      .map(([threadId]) => threadId)

    const offset = pageToken ? Number(pageToken) : 0
    if (!Number.isInteger(offset) || offset < 0) return new ApiError({ reason: `bad page token ${pageToken}` })
    const end = offset + this.pageSize
    return {
      threadIds: matching.slice(offset, end),
      nextPageToken: end < matching.length ? String(end) : null,
    }
  }

  async getThreadMessages({ threadId }: { threadId: string }): Promise<ThreadMessages | NotFoundError | AuthError | ApiError> {
    this.calls.push({ method: 'getThreadMessages', threadId })
    const fault = this.faults.getThreadMessages?.(threadId)
    if (fault) return fault

    const messages = this.threads.get(threadId)
    if (!messages) return new NotFoundError({ resource: `thread ${threadId}` })
    return {
      id: threadId,
      messages: [...messages.entries()].map(([id, labels]) => ({ id, labelIds: [...labels] })),
    }
  }

  async addLabels({ messageIds, labelIds }: { messageIds: string[]; labelIds: string[] }): Promise<void | AuthError | ApiError> {
    this.calls.push({ method: 'addLabels', messageIds: [...messageIds], labelIds: [...labelIds] })
    const fault = this.faults.addLabels?.({ messageIds, labelIds })
    if (fault) return fault

    for (const messageId of messageIds) {
      const labels = this.findMessage(messageId)
      if (!labels) return new ApiError({ reason: `message ${messageId} not found` })
      for (const id of labelIds) labels.add(id)
    }
  }

  private findMessage(messageId: string): Set<string> | undefined {
    for (const messages of this.threads.values()) {
      const labels = messages.get(messageId)
      if (labels) return labels
    }
    return undefined
  }

  /** Current state with label ids sorted, for assertions. */
  snapshot(): MailboxState {
    const state: MailboxState = {}
    for (const [threadId, messages] of this.threads) {
      const entry: Record<string, string[]> = {}
      for (const [messageId, labels] of messages) entry[messageId] = [...labels].sort()
      state[threadId] = entry
    }
    return state
  }

  callsOf<M extends MailboxCall['method']>(method: M): Extract<MailboxCall, { method: M }>[] {
    return this.calls.filter((c): c is Extract<MailboxCall, { method: M }> => c.method === method)
  }
}
