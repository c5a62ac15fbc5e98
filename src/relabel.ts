// Relabel runner: label inheritance for a whole mailbox.
// Enumerates labeled threads, reconciles each one and applies the missing
// labels, one thread at a time. Per-thread failures are recorded and the run
// moves on; an auth failure or a failed thread listing stops it.
// Every thread's reconcile+apply cycle is self-contained, so stopping between
// threads leaves nothing half-written and a re-run picks up the rest.

import { AuthError, ApiError, EnumerationError } from './api-utils.js'
import type { MailboxSession, MailLabel } from './mailbox.js'
import { createLabelPolicy, resolveLabelNames, unrecognizedSystemLabels, type LabelPolicy } from './label-policy.js'
import { listLabeledThreads } from './thread-enumerator.js'
import { reconcile, countMissing } from './reconciler.js'
import { applyMissingLabels, DEFAULT_BATCH_SIZE } from './label-applier.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RelabelLogger {
  debug(msg: string): void
  info(msg: string): void
  warn(msg: string): void
}

const silentLogger: RelabelLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
}

export interface RelabelOptions {
  /** Label ids never inherited. */
  exclude?: readonly string[]
  /** System label ids inherited anyway. */
  inherit?: readonly string[]
  /** Restrict inheritance to these label names (or ids). */
  labels?: readonly string[]
  /** Gmail search query narrowing the thread listing (date window). */
  query?: string
  batchSize?: number
  dryRun?: boolean
  signal?: AbortSignal
  logger?: RelabelLogger
}

export type ThreadOutcome = 'unchanged' | 'reconciled' | 'partial' | 'failed'

export interface RunFailure {
  stage: 'enumerate' | 'reconcile' | 'apply' | 'auth'
  threadId?: string
  reason: string
}

export interface LabelChange {
  threadId: string
  messageId: string
  /** Label names (falling back to ids for labels missing from the label list). */
  add: string[]
}

export interface RelabelSummary {
  dryRun: boolean
  labelsConsidered: number
  threadsScanned: number
  /** Threads that now satisfy inheritance, including ones that already did. */
  threadsReconciled: number
  threadsPartial: number
  threadsFailed: number
  messagesModified: number
  labelsAdded: number
  interrupted: boolean
  /** The thread listing stopped early (enumeration or auth failure). */
  aborted: boolean
  failures: RunFailure[]
  /** Planned additions, filled in dry-run mode only. */
  changes: LabelChange[]
  ok: boolean
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/** Resolve which labels the run inherits and enumerates by. */
export function selectCandidateLabels(
  labels: readonly MailLabel[],
  { exclude, inherit, names }: { exclude?: readonly string[]; inherit?: readonly string[]; names?: readonly string[] } = {},
): { policy: LabelPolicy; labelIds: string[]; unknown: string[] } {
  const resolved = names && names.length > 0 ? resolveLabelNames(names, labels) : null
  const policy = createLabelPolicy({ exclude, inherit, only: resolved?.ids, labels })
  const labelIds = labels.filter((l) => policy.isInheritable(l.id)).map((l) => l.id)
  return { policy, labelIds, unknown: resolved?.unknown ?? [] }
}

export function isSuccessful(summary: Omit<RelabelSummary, 'ok'>): boolean {
  return summary.threadsFailed === 0 && summary.threadsPartial === 0 && !summary.aborted && !summary.interrupted
}

export async function relabel(
  session: MailboxSession,
  options: RelabelOptions,
): Promise<RelabelSummary | AuthError | ApiError> {
  const log = options.logger ?? silentLogger
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
  const dryRun = options.dryRun ?? false

  const labels = await session.listLabels()
  if (labels instanceof Error) return labels

  const candidates = selectCandidateLabels(labels, {
    exclude: options.exclude,
    inherit: options.inherit,
    names: options.labels,
  })
  for (const name of candidates.unknown) log.warn(`Unknown label: ${name}`)
  for (const label of unrecognizedSystemLabels(labels)) {
    if (!candidates.policy.isInheritable(label.id)) log.warn(`Unrecognized system label ${label.name} (${label.id}), not inherited`)
  }
  log.info(`${candidates.labelIds.length} label(s) to inherit`)

  const names = new Map(labels.map((l) => [l.id, l.name]))
  const displayName = (id: string) => names.get(id) ?? id
  for (const id of candidates.labelIds) log.debug(`  ${displayName(id)} (${id})`)

  const summary: Omit<RelabelSummary, 'ok'> = {
    dryRun,
    labelsConsidered: candidates.labelIds.length,
    threadsScanned: 0,
    threadsReconciled: 0,
    threadsPartial: 0,
    threadsFailed: 0,
    messagesModified: 0,
    labelsAdded: 0,
    interrupted: false,
    aborted: false,
    failures: [],
    changes: [],
  }

  const record = (outcome: ThreadOutcome) => {
    if (outcome === 'failed') summary.threadsFailed++
    else if (outcome === 'partial') summary.threadsPartial++
    else summary.threadsReconciled++
  }

  /** Returns an AuthError when the session died and the run must stop. */
  async function processThread(threadId: string): Promise<AuthError | null> {
    summary.threadsScanned++

    const result = await reconcile(session, threadId, candidates.policy)
    if (result instanceof Error) {
      summary.failures.push({ stage: result instanceof AuthError ? 'auth' : 'reconcile', threadId, reason: result.message })
      record('failed')
      log.warn(`thread ${threadId}: ${result.message}`)
      return result instanceof AuthError ? result : null
    }

    log.debug(`thread ${threadId}: ${result.missing.size}/${result.messageCount} message(s) missing labels`)
    if (result.missing.size === 0) {
      record('unchanged')
      return null
    }

    if (dryRun) {
      for (const [messageId, add] of result.missing) {
        summary.changes.push({ threadId, messageId, add: [...add].sort().map(displayName) })
      }
      summary.messagesModified += result.missing.size
      summary.labelsAdded += countMissing(result.missing)
      record('reconciled')
      return null
    }

    const applied = await applyMissingLabels(session, result.missing, { batchSize })
    summary.messagesModified += applied.messagesModified
    summary.labelsAdded += applied.labelsAdded

    applied.failedBatches.forEach((batch, i) => {
      // Only the last failed batch can be the one that hit the auth error.
      const lostAuth = applied.authError !== null && i === applied.failedBatches.length - 1
      summary.failures.push({
        stage: lostAuth ? 'auth' : 'apply',
        threadId,
        reason: `${batch.reason} (messages: ${batch.messageIds.join(', ')})`,
      })
      log.warn(`thread ${threadId}: failed to add ${batch.labelIds.map(displayName).join(', ')}: ${batch.reason}`)
    })

    if (applied.failedBatches.length === 0) record('reconciled')
    else if (applied.messagesModified === 0) record('failed')
    else record('partial')

    return applied.authError
  }

  const threads = listLabeledThreads(session, { labelIds: candidates.labelIds, query: options.query })

  try {
    for await (const threadId of threads) {
      if (options.signal?.aborted) {
        summary.interrupted = true
        break
      }
      const fatal = await processThread(threadId)
      if (fatal) {
        summary.aborted = true
        break
      }
    }
  } catch (err) {
    if (err instanceof AuthError) {
      summary.failures.push({ stage: 'auth', reason: err.message })
    } else if (err instanceof EnumerationError) {
      summary.failures.push({ stage: 'enumerate', reason: err.message })
    } else {
      throw err
    }
    summary.aborted = true
    log.warn(err.message)
  }

  return { ...summary, ok: isSuccessful(summary) }
}

/** 0 on full success, 130 when interrupted, 1 when anything failed. */
export function exitCodeFor(summary: RelabelSummary): number {
  if (summary.interrupted) return 130
  return summary.ok ? 0 : 1
}
