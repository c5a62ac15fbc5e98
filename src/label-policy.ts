// Label inheritance policy.
// Decides which labels a thread passes on to its messages. By default only
// user labels are inherited: Gmail's system labels are per-message state
// (UNREAD, STARRED, SENT) or placement (INBOX, TRASH, CATEGORY_*).
// The policy is a plain predicate so callers and tests can swap it out.

import type { MailLabel } from './mailbox.js'

export interface LabelPolicy {
  isInheritable(labelId: string): boolean
}

/** Gmail gives every user-created label an id with this prefix. */
export const USER_LABEL_PREFIX = 'Label_'

/** System labels Gmail is known to apply. Others still count as system but get a warning. */
export const KNOWN_SYSTEM_LABEL_IDS: readonly string[] = [
  'CHAT',
  'SENT',
  'INBOX',
  'IMPORTANT',
  'TRASH',
  'DRAFT',
  'SPAM',
  'STARRED',
  'UNREAD',
  'MUTED',
  'CATEGORY_FORUMS',
  'CATEGORY_UPDATES',
  'CATEGORY_PERSONAL',
  'CATEGORY_PROMOTIONS',
  'CATEGORY_SOCIAL',
]

/** Inherit everything. Mostly useful in tests. */
export const INHERIT_ALL: LabelPolicy = { isInheritable: () => true }

/**
 * Build the exclusion policy.
 * - only user labels are inherited; a label is a user label when the label
 *   list says so, or, for ids missing from it, when the id has the user prefix
 * - `exclude` drops ids, `inherit` re-admits system ids (exclude wins)
 * - `only`, when given, restricts inheritance to exactly those ids
 */
export function createLabelPolicy({
  exclude = [],
  inherit = [],
  only,
  labels = [],
}: {
  exclude?: readonly string[]
  inherit?: readonly string[]
  only?: readonly string[]
  labels?: readonly MailLabel[]
} = {}): LabelPolicy {
  const excluded = new Set(exclude)
  const inherited = new Set(inherit)
  const allowed = only ? new Set(only) : null
  const types = new Map(labels.map((l) => [l.id, l.type]))

  return {
    isInheritable(labelId) {
      if (allowed && !allowed.has(labelId)) return false
      if (excluded.has(labelId)) return false
      if (inherited.has(labelId)) return true
      const type = types.get(labelId)
      return type ? type === 'user' : labelId.startsWith(USER_LABEL_PREFIX)
    },
  }
}

/** System labels Gmail reports that are not in KNOWN_SYSTEM_LABEL_IDS. */
export function unrecognizedSystemLabels(labels: readonly MailLabel[]): MailLabel[] {
  return labels.filter((l) => l.type === 'system' && !KNOWN_SYSTEM_LABEL_IDS.includes(l.id))
}

/** Keep the labels of a set that the policy lets a thread pass on. */
export function filterInheritable(labelIds: Iterable<string>, policy: LabelPolicy): Set<string> {
  const result = new Set<string>()
  for (const id of labelIds) {
    if (policy.isInheritable(id)) result.add(id)
  }
  return result
}

/**
 * Resolve `--label` names (or ids) to label ids.
 * Matching is case-insensitive on the name; ids match exactly.
 */
export function resolveLabelNames(
  names: readonly string[],
  labels: readonly MailLabel[],
): { ids: string[]; unknown: string[] } {
  const ids: string[] = []
  const unknown: string[] = []

  for (const name of names) {
    const lower = name.toLowerCase()
    const match = labels.find((l) => l.id === name) ?? labels.find((l) => l.name.toLowerCase() === lower)
    if (!match) {
      unknown.push(name)
      continue
    }
    if (!ids.includes(match.id)) ids.push(match.id)
  }

  return { ids, unknown }
}
