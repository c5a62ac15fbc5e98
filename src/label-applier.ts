// Label applier: turns a thread's missing-label map into batched,
// strictly additive label-add calls.
// Messages missing the same label set share a call; each group is chunked
// to the provider's batch ceiling (messages.batchModify takes 1000 ids).

import { AuthError } from './api-utils.js'
import type { MailboxSession } from './mailbox.js'
import type { MissingLabels } from './reconciler.js'

export const DEFAULT_BATCH_SIZE = 1000

export interface LabelBatch {
  messageIds: string[]
  labelIds: string[]
}

export interface FailedBatch extends LabelBatch {
  reason: string
}

export interface ApplyResult {
  batches: number
  messagesModified: number
  /** (message, label) pairs added. */
  labelsAdded: number
  failedBatches: FailedBatch[]
  /** Set when the session lost authentication; remaining batches were not sent. */
  authError: AuthError | null
}

/** Group messages by identical missing set, then chunk to `batchSize`.
 *  Label ids within a batch are sorted so grouping is stable. */
export function planBatches(missing: MissingLabels, batchSize = DEFAULT_BATCH_SIZE): LabelBatch[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`)
  }

  const groups = new Map<string, LabelBatch>()
  for (const [messageId, labels] of missing) {
    if (labels.size === 0) continue
    const labelIds = [...labels].sort()
    const key = labelIds.join('\u0000')
    const group = groups.get(key)
    if (group) {
      group.messageIds.push(messageId)
    } else {
      groups.set(key, { messageIds: [messageId], labelIds })
    }
  }

  const batches: LabelBatch[] = []
  for (const group of groups.values()) {
    for (let i = 0; i < group.messageIds.length; i += batchSize) {
      batches.push({ messageIds: group.messageIds.slice(i, i + batchSize), labelIds: group.labelIds })
    }
  }
  return batches
}

/** Send each batch serially. A failed batch is recorded and the rest continue. */
export async function applyMissingLabels(
  session: MailboxSession,
  missing: MissingLabels,
  { batchSize = DEFAULT_BATCH_SIZE }: { batchSize?: number } = {},
): Promise<ApplyResult> {
  const result: ApplyResult = {
    batches: 0,
    messagesModified: 0,
    labelsAdded: 0,
    failedBatches: [],
    authError: null,
  }

  for (const batch of planBatches(missing, batchSize)) {
    result.batches++
    const res = await session.addLabels({ messageIds: batch.messageIds, labelIds: batch.labelIds })
    if (res instanceof AuthError) {
      result.failedBatches.push({ ...batch, reason: res.message })
      result.authError = res
      break
    }
    if (res instanceof Error) {
      result.failedBatches.push({ ...batch, reason: res.message })
      continue
    }
    result.messagesModified += batch.messageIds.length
    result.labelsAdded += batch.messageIds.length * batch.labelIds.length
  }

  return result
}
