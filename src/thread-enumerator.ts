// Thread enumerator: lazily yields ids of threads carrying any of the given
// labels. Lists threads one label at a time and follows page tokens until the
// listing is exhausted. A thread reachable through several labels is yielded
// once per enumeration.

import { AuthError, EnumerationError } from './api-utils.js'
import type { MailboxSession } from './mailbox.js'

export interface EnumerateOptions {
  labelIds: readonly string[]
  /** Gmail search query applied to every listing, e.g. `after:2024/01/01`. */
  query?: string
}

/**
 * Each call starts a fresh listing, so the sequence is restartable.
 * Throws AuthError as-is (fatal) and wraps any other page failure in an
 * EnumerationError. Retries for transient failures happen inside the session.
 */
export async function* listLabeledThreads(
  session: MailboxSession,
  { labelIds, query }: EnumerateOptions,
): AsyncGenerator<string, void, undefined> {
  const seen = new Set<string>()

  for (const labelId of labelIds) {
    let pageToken: string | undefined

    do {
      const page = await session.listThreads({ labelId, query, pageToken })
      if (page instanceof AuthError) throw page
      if (page instanceof Error) throw new EnumerationError({ labelId, reason: page.message, cause: page })

      for (const threadId of page.threadIds) {
        if (seen.has(threadId)) continue
        seen.add(threadId)
        yield threadId
      }

      // Empty pages can still carry a token; only a missing token ends the listing.
      pageToken = page.nextPageToken ?? undefined
    } while (pageToken)
  }
}
