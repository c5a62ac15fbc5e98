// Mailbox session: the three capabilities the relabel core needs from a mail
// provider (list threads by label, read per-message labels, add labels) plus
// label listing. GmailClient implements it over the Gmail API; tests use an
// in-memory mailbox.

import type { AuthError, ApiError, NotFoundError } from './api-utils.js'

export interface MailLabel {
  id: string
  name: string
  type: 'system' | 'user'
}

export interface MessageLabels {
  id: string
  labelIds: string[]
}

export interface ThreadMessages {
  id: string
  messages: MessageLabels[]
}

export interface ThreadPage {
  threadIds: string[]
  nextPageToken: string | null
}

export interface MailboxSession {
  /** Account the session is authenticated as, for messages. */
  readonly email: string
  listLabels(): Promise<MailLabel[] | AuthError | ApiError>
  listThreads(params: { labelId: string; query?: string; pageToken?: string }): Promise<ThreadPage | AuthError | ApiError>
  getThreadMessages(params: { threadId: string }): Promise<ThreadMessages | NotFoundError | AuthError | ApiError>
  /** Strictly additive: never removes labels. */
  addLabels(params: { messageIds: string[]; labelIds: string[] }): Promise<void | AuthError | ApiError>
}
