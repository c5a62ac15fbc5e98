import { describe, test, expect } from 'vitest'
import { summaryDocument, summaryLine, toYaml } from './output.js'
import type { RelabelSummary } from './relabel.js'

function summary(overrides: Partial<RelabelSummary> = {}): RelabelSummary {
  return {
    dryRun: false,
    labelsConsidered: 3,
    threadsScanned: 2,
    threadsReconciled: 2,
    threadsPartial: 0,
    threadsFailed: 0,
    messagesModified: 2,
    labelsAdded: 3,
    interrupted: false,
    aborted: false,
    failures: [],
    changes: [],
    ok: true,
    ...overrides,
  }
}

describe('toYaml', () => {
  test('dumps block style without wrapping', () => {
    expect(toYaml({ a: 1, list: ['x'] })).toBe('a: 1\nlist:\n  - x\n')
  })
})

describe('summaryDocument', () => {
  test('snake-cases the counters and omits empty sections', () => {
    expect(summaryDocument(summary())).toEqual({
      dry_run: false,
      labels_considered: 3,
      threads_scanned: 2,
      threads_reconciled: 2,
      threads_partial: 0,
      threads_failed: 0,
      messages_modified: 2,
      labels_added: 3,
    })
  })

  test('includes failures, changes and stop flags when present', () => {
    const doc = summaryDocument(
      summary({
        aborted: true,
        changes: [{ threadId: 'T1', messageId: 'M1', add: ['Work'] }],
        failures: [
          { stage: 'enumerate', reason: 'quota' },
          { stage: 'apply', threadId: 'T1', reason: 'boom' },
        ],
      }),
    )
    expect(doc.aborted).toBe(true)
    expect(doc.interrupted).toBeUndefined()
    expect(doc.changes).toEqual([{ thread_id: 'T1', message_id: 'M1', add: ['Work'] }])
    expect(doc.failures).toEqual([
      { stage: 'enumerate', reason: 'quota' },
      { stage: 'apply', thread_id: 'T1', reason: 'boom' },
    ])
  })
})

describe('summaryLine', () => {
  test('reports what was done', () => {
    expect(summaryLine(summary())).toBe('Scanned 2 thread(s), modified 2 message(s), added 3 label(s)')
  })

  test('dry run wording', () => {
    expect(summaryLine(summary({ dryRun: true }))).toBe('Scanned 2 thread(s), would modify 2 message(s), would add 3 label(s)')
  })

  test('reports failed and partial threads separately', () => {
    expect(summaryLine(summary({ threadsFailed: 1, threadsPartial: 2 }))).toBe(
      'Scanned 2 thread(s), modified 2 message(s), added 3 label(s); threads 1 failed, 2 partial',
    )
    expect(summaryLine(summary({ threadsPartial: 1 }))).toBe(
      'Scanned 2 thread(s), modified 2 message(s), added 3 label(s); threads 1 partial',
    )
  })
})
