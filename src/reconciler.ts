// Reconciler: computes which labels each message of a thread is missing.
// The thread's label set is recomputed as a fold over its messages' own
// label sets; thread-level summaries from the API are never trusted for
// per-message state.

import type { MailboxSession, MessageLabels } from './mailbox.js'
import type { AuthError, ApiError, NotFoundError } from './api-utils.js'
import { filterInheritable, type LabelPolicy } from './label-policy.js'

/** Message id -> labels to add. Only messages with something missing appear. */
export type MissingLabels = Map<string, Set<string>>

export interface ThreadReconciliation {
  threadId: string
  messageCount: number
  /** Labels the thread confers on its messages, after policy filtering. */
  eligible: Set<string>
  missing: MissingLabels
}

/** Union of all message label sets. */
export function threadLabelUnion(messages: readonly MessageLabels[]): Set<string> {
  const union = new Set<string>()
  for (const message of messages) {
    for (const id of message.labelIds) union.add(id)
  }
  return union
}

export function computeMissingLabels(
  messages: readonly MessageLabels[],
  policy: LabelPolicy,
): { eligible: Set<string>; missing: MissingLabels } {
  const eligible = filterInheritable(threadLabelUnion(messages), policy)
  const missing: MissingLabels = new Map()

  // A single message has nothing to inherit from.
  if (messages.length < 2 || eligible.size === 0) return { eligible, missing }

  for (const message of messages) {
    const have = new Set(message.labelIds)
    const lacking = new Set<string>()
    for (const id of eligible) {
      if (!have.has(id)) lacking.add(id)
    }
    if (lacking.size > 0) {
      const existing = missing.get(message.id)
      missing.set(message.id, existing ? new Set([...existing, ...lacking]) : lacking)
    }
  }

  return { eligible, missing }
}

/** Fetch a thread's messages and compute the missing labels.
 *  Fetch failures come back as error values so the caller can skip the thread. */
export async function reconcile(
  session: MailboxSession,
  threadId: string,
  policy: LabelPolicy,
): Promise<ThreadReconciliation | NotFoundError | AuthError | ApiError> {
  const thread = await session.getThreadMessages({ threadId })
  if (thread instanceof Error) return thread

  const { eligible, missing } = computeMissingLabels(thread.messages, policy)
  return {
    threadId,
    messageCount: thread.messages.length,
    eligible,
    missing,
  }
}

/** Total number of (message, label) pairs to add. */
export function countMissing(missing: MissingLabels): number {
  let total = 0
  for (const labels of missing.values()) total += labels.size
  return total
}
